// VersionStore - The Commit Boundary
//
// All mutations of versioned entities MUST go through the VersionStore.
// Each write runs in one serializable store transaction that:
// 1. Opens a transaction in the transaction log
// 2. Appends to shadow history and updates the live row
// 3. Hashes the new state and registers the digest
// 4. Refreshes the live row's cached hash
// A conflict reruns the whole sequence; every outcome is returned as a
// typed result.

import { randomUUID } from 'node:crypto';
import type {
  ActorContext,
  Entity,
  EntityKind,
  EntityTypeDefinition,
  EntityTypeRegistry,
  HistoricalState,
  HistoryOptions,
  Id,
  JsonObject,
  ShadowRecord,
  Transaction,
  VersionHash,
  VersionHistory,
} from '@strata/protocol';
import { entityTypes, parseAttributes } from '@strata/protocol';
import type { RepositoryContext, TransactionalRepositoryContext } from '@strata/repositories';
import { ContentHasher } from '../hashing/index.js';
import { NotFoundError, ValidationError, toVersioningError } from '../errors.js';
import type { Logger } from '../logging.js';
import { consoleLogger } from '../logging.js';
import { withConflictRetry } from '../retry.js';
import { openTransaction } from './transaction-log.js';
import { appendShadowRecord, checkShadowRanges } from './shadow-history.js';
import { assertContentHash, registerVersionHash, resolveVersionHash } from './hash-registry.js';
import {
  assertTagName,
  createTag,
  moveTag,
  removeTagsForHashes,
  resolveTag,
} from './tag-registry.js';
import { TimeTravelReader } from './reader.js';
import type {
  BatchOutcome,
  CommitOptions,
  DeleteOutcome,
  EntityMutation,
  ReadOptions,
  ReconcileReport,
  ResolvedTag,
  RevertOptions,
  TagHistory,
  TagOutcome,
  VersioningResult,
  WriteInput,
  WriteOutcome,
} from './types.js';

/**
 * How a mutation's attributes combine with the live state
 */
type MutationMode = 'merge' | 'replace';

/**
 * Options for creating a VersionStore.
 */
export type VersionStoreOptions = {
  repos: TransactionalRepositoryContext;

  /** Attribute definitions per kind (defaults to the built-in catalog) */
  registry?: EntityTypeRegistry;

  logger?: Logger;

  /** Attempts per write before a conflict is reported (default 3) */
  writeMaxAttempts?: number;

  /** Delay before the n-th retry is n times this value (default 10) */
  retryBackoffMs?: number;

  /** Id generator for new entities (defaults to random UUIDs) */
  generateId?: () => Id;
};

/**
 * VersionStore - entry point for versioned entity catalogs
 *
 * @example
 * ```ts
 * const store = createVersionStore({
 *   repos: createTransactionalPgRepositoryContext(db),
 * });
 *
 * const result = await store.write({
 *   kind: 'dataset',
 *   attributes: { name: 'Iris', dataPath: 's3://bucket/iris.csv', format: 'csv' },
 *   actor: { actorId: 'user-1' },
 * });
 *
 * if (result.success) {
 *   console.log('Version', result.data.versionHash, 'at', result.data.transactionId);
 * }
 * ```
 */
export class VersionStore {
  private readonly repos: TransactionalRepositoryContext;
  private readonly registry: EntityTypeRegistry;
  private readonly hasher: ContentHasher;
  private readonly reader: TimeTravelReader;
  private readonly logger: Logger;
  private readonly writeMaxAttempts: number;
  private readonly retryBackoffMs: number;
  private readonly generateId: () => Id;

  constructor(options: VersionStoreOptions) {
    this.repos = options.repos;
    this.registry = options.registry ?? entityTypes;
    this.hasher = new ContentHasher(this.registry);
    this.reader = new TimeTravelReader({
      repos: options.repos,
      registry: this.registry,
      hasher: this.hasher,
    });
    this.logger = options.logger ?? consoleLogger;
    this.writeMaxAttempts = options.writeMaxAttempts ?? 3;
    this.retryBackoffMs = options.retryBackoffMs ?? 10;
    this.generateId = options.generateId ?? randomUUID;
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  /**
   * Create or update one entity.
   *
   * Creating needs `kind`; `entityId` is optional. Updating merges
   * `attributes` over the live state. `tags` are bound to the written version
   * and `message` is stored on the transaction, all in the same commit.
   */
  async write(input: WriteInput): Promise<VersioningResult<WriteOutcome>> {
    return this.execute('write', { entityId: input.entityId }, async () => {
      this.validateMutation(input);
      const outcome = await this.transact(
        'write',
        input.actor,
        (repos, transaction) => this.applyMutation(repos, transaction, input),
        input.message
      );
      this.logger.info('Entity written', { ...outcome });
      return outcome;
    });
  }

  /**
   * Apply several entity mutations under one transaction, all or nothing.
   * An entity may appear at most once.
   */
  async writeBatch(
    mutations: EntityMutation[],
    actor: ActorContext,
    options: CommitOptions = {}
  ): Promise<VersioningResult<BatchOutcome>> {
    return this.execute('writeBatch', { size: mutations.length }, async () => {
      if (mutations.length === 0) {
        throw new ValidationError('A batch needs at least one mutation');
      }
      const seen = new Set<Id>();
      for (const mutation of mutations) {
        this.validateMutation(mutation);
        if (mutation.entityId === undefined) continue;
        if (seen.has(mutation.entityId)) {
          throw new ValidationError(`Entity ${mutation.entityId} appears more than once`, {
            field: 'entityId',
          });
        }
        seen.add(mutation.entityId);
      }

      const outcome = await this.transact(
        'writeBatch',
        actor,
        async (repos, transaction) => {
          const writes: WriteOutcome[] = [];
          for (const mutation of mutations) {
            writes.push(await this.applyMutation(repos, transaction, mutation));
          }
          return { transactionId: transaction.id, writes };
        },
        options.message
      );
      this.logger.info('Batch written', {
        transactionId: outcome.transactionId,
        entityIds: outcome.writes.map((w) => w.entityId),
      });
      return outcome;
    });
  }

  /**
   * Restore an entity to the version a ref names (content hash, tag or
   * "~N"). The restored attributes are written as a new update, so content
   * seen before reuses its version hash.
   */
  async revert(
    entityId: Id,
    ref: string,
    actor: ActorContext,
    options: RevertOptions = {}
  ): Promise<VersioningResult<WriteOutcome>> {
    return this.execute('revert', { entityId, ref }, async () => {
      const mutation = { entityId, attributes: {}, tags: options.tags };
      this.validateMutation(mutation);

      const outcome = await this.transact(
        'revert',
        actor,
        async (repos, transaction) => {
          const reader = new TimeTravelReader({
            repos,
            registry: this.registry,
            hasher: this.hasher,
          });
          const { record } = await reader.resolveRecord(entityId, ref);
          if (record.operation === 'delete') {
            throw new NotFoundError('version', `${entityId}@${ref}`);
          }
          return this.applyMutation(
            repos,
            transaction,
            { ...mutation, attributes: this.restorable(record) },
            'replace'
          );
        },
        options.message
      );
      this.logger.info('Entity reverted', { ...outcome, ref });
      return outcome;
    });
  }

  /**
   * Delete an entity. History stays readable with `readAt`; the entity's
   * version hashes and tags are removed.
   */
  async delete(
    entityId: Id,
    actor: ActorContext,
    options: CommitOptions = {}
  ): Promise<VersioningResult<DeleteOutcome>> {
    return this.execute('delete', { entityId }, async () => {
      const outcome = await this.transact(
        'delete',
        actor,
        (repos, transaction) => this.deleteWith(repos, transaction, entityId),
        options.message
      );
      this.logger.info('Entity deleted', { ...outcome });
      return outcome;
    });
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  /**
   * Live state of an entity
   */
  async read(entityId: Id): Promise<VersioningResult<Entity>> {
    return this.execute('read', { entityId }, async () => {
      const entity = await this.repos.entities.get(entityId);
      if (!entity) throw new NotFoundError('entity', entityId);
      return entity;
    });
  }

  async readAt(
    entityId: Id,
    transactionId: number,
    options?: ReadOptions
  ): Promise<VersioningResult<HistoricalState>> {
    return this.execute('readAt', { entityId, transactionId }, () =>
      this.reader.stateAt(entityId, transactionId, options)
    );
  }

  async readByHash(
    contentHash: string,
    options?: ReadOptions
  ): Promise<VersioningResult<HistoricalState>> {
    return this.execute('readByHash', { contentHash }, () =>
      this.reader.stateByHash(contentHash, options)
    );
  }

  async readByTag(
    tagName: string,
    options?: ReadOptions
  ): Promise<VersioningResult<HistoricalState>> {
    return this.execute('readByTag', { tagName }, () => this.reader.stateByTag(tagName, options));
  }

  /**
   * Read a version by content hash, tag or "~N"
   */
  async readRef(
    entityId: Id,
    ref: string,
    options?: ReadOptions
  ): Promise<VersioningResult<HistoricalState>> {
    return this.execute('readRef', { entityId, ref }, () =>
      this.reader.resolveRef(entityId, ref, options)
    );
  }

  /**
   * Version history, newest first. `includeChangeset` adds each record's
   * attributes.
   */
  async history(
    entityId: Id,
    options?: HistoryOptions
  ): Promise<VersioningResult<VersionHistory>> {
    return this.execute('history', { entityId }, () => this.reader.history(entityId, options));
  }

  // ==========================================================================
  // Hashes and tags
  // ==========================================================================

  async tag(
    contentHash: string,
    tagName: string,
    actor: ActorContext
  ): Promise<VersioningResult<TagOutcome>> {
    return this.execute('tag', { contentHash, tagName }, async () => {
      assertContentHash(contentHash);
      assertTagName(tagName);

      const outcome = await this.transact('tag', actor, async (repos, transaction) => {
        const versionHash = await resolveVersionHash(repos, contentHash);
        const tag = await createTag(repos, versionHash, tagName, transaction);
        return { tag, versionHash, transactionId: transaction.id, previousVersionHashId: null };
      });
      this.logger.info('Tag created', {
        tagName,
        contentHash,
        transactionId: outcome.transactionId,
      });
      return outcome;
    });
  }

  /**
   * Move an existing tag to another version hash
   */
  async retag(
    tagName: string,
    contentHash: string,
    actor: ActorContext
  ): Promise<VersioningResult<TagOutcome>> {
    return this.execute('retag', { contentHash, tagName }, async () => {
      assertContentHash(contentHash);
      assertTagName(tagName);

      const outcome = await this.transact('retag', actor, async (repos, transaction) => {
        const versionHash = await resolveVersionHash(repos, contentHash);
        const { tag, previousVersionHashId } = await moveTag(
          repos,
          tagName,
          versionHash,
          transaction
        );
        return { tag, versionHash, transactionId: transaction.id, previousVersionHashId };
      });
      this.logger.info('Tag moved', {
        tagName,
        contentHash,
        previousVersionHashId: outcome.previousVersionHashId,
        transactionId: outcome.transactionId,
      });
      return outcome;
    });
  }

  async resolveTag(tagName: string): Promise<VersioningResult<ResolvedTag>> {
    return this.execute('resolveTag', { tagName }, () => resolveTag(this.repos, tagName));
  }

  async resolveHash(contentHash: string): Promise<VersioningResult<VersionHash>> {
    return this.execute('resolveHash', { contentHash }, () =>
      resolveVersionHash(this.repos, contentHash)
    );
  }

  /**
   * Every change made to a tag name, oldest first
   */
  async tagHistory(tagName: string): Promise<VersioningResult<TagHistory>> {
    return this.execute('tagHistory', { tagName }, async () => {
      assertTagName(tagName);
      const events = await this.repos.versionTags.listEvents(tagName);
      if (events.length === 0) throw new NotFoundError('tag', tagName);
      return { tagName, events };
    });
  }

  // ==========================================================================
  // Maintenance
  // ==========================================================================

  /**
   * Rebuild an entity's hash index from its shadow history.
   *
   * Re-registers digests missing from the registry (live entities only,
   * since deletion removes them on purpose), restores the live row's cached
   * hash and reports range violations. Opens no transaction in the log.
   */
  async reconcile(entityId: Id): Promise<VersioningResult<ReconcileReport>> {
    return this.execute('reconcile', { entityId }, async () => {
      const report = await withConflictRetry(
        () => this.repos.transaction((repos) => this.reconcileWith(repos, entityId)),
        this.retryOptions('reconcile')
      );
      if (report.violations.length > 0) {
        this.logger.error('Shadow history ranges are inconsistent', {
          entityId,
          violations: report.violations,
        });
      }
      if (report.restoredHashes.length > 0 || report.corrected) {
        this.logger.warn('Hash index reconciled', {
          entityId,
          restoredHashes: report.restoredHashes,
          corrected: report.corrected,
        });
      }
      return report;
    });
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private validateMutation(mutation: EntityMutation): void {
    if (mutation.entityId !== undefined && mutation.entityId.trim().length === 0) {
      throw new ValidationError('entityId must not be blank', { field: 'entityId' });
    }
    const tags = mutation.tags ?? [];
    for (const tagName of tags) {
      assertTagName(tagName);
    }
    if (new Set(tags).size !== tags.length) {
      throw new ValidationError('A tag may be bound only once per write', {
        field: 'tags',
        details: { tags },
      });
    }
  }

  /**
   * Attributes of a historical record that the current definition declares
   */
  private restorable(record: ShadowRecord): JsonObject {
    const fields = this.registry[record.kind].fields;
    return Object.fromEntries(
      Object.entries(record.attributes).filter(([name]) => Object.hasOwn(fields, name))
    );
  }

  private async applyMutation(
    repos: RepositoryContext,
    transaction: Transaction,
    mutation: EntityMutation,
    mode: MutationMode = 'merge'
  ): Promise<WriteOutcome> {
    this.validateMutation(mutation);
    const live =
      mutation.entityId !== undefined ? await repos.entities.get(mutation.entityId) : null;

    let entityId: Id;
    let kind: EntityKind;
    let candidate: Record<string, unknown>;
    let operation: WriteOutcome['operation'];

    if (live) {
      if (mutation.kind !== undefined && mutation.kind !== live.kind) {
        throw new ValidationError(`Entity ${live.id} is a ${live.kind}, not a ${mutation.kind}`, {
          field: 'kind',
        });
      }
      entityId = live.id;
      kind = live.kind;
      candidate =
        mode === 'merge' ? { ...live.attributes, ...mutation.attributes } : mutation.attributes;
      operation = 'update';
    } else {
      if (mutation.kind === undefined) {
        if (mutation.entityId !== undefined) {
          throw new NotFoundError('entity', mutation.entityId);
        }
        throw new ValidationError('kind is required to create an entity', { field: 'kind' });
      }
      entityId = mutation.entityId ?? this.generateId();
      kind = mutation.kind;
      candidate = mutation.attributes;
      operation = 'insert';
    }

    const definition = this.registry[kind];
    const attributes = this.parse(definition, candidate);

    await appendShadowRecord(repos, {
      kind,
      entityId,
      transaction,
      operation,
      schemaRevision: definition.revision,
      attributes,
    });

    if (live) {
      await repos.entities.update(entityId, attributes);
    } else {
      await repos.entities.create({ id: entityId, kind, attributes });
    }

    const contentHash = this.hasher.hash(kind, entityId, attributes);
    const { versionHash, reused } = await registerVersionHash(
      repos,
      entityId,
      transaction,
      contentHash
    );

    if (live) {
      const expected = this.hasher.hash(kind, entityId, live.attributes);
      if (live.currentVersionHash !== expected) {
        this.logger.warn('Cached version hash drifted; correcting', {
          entityId,
          cached: live.currentVersionHash,
          expected,
          transactionId: transaction.id,
        });
      }
    }
    await repos.entities.setCurrentVersionHash(entityId, contentHash);

    const tags: string[] = [];
    for (const tagName of mutation.tags ?? []) {
      await createTag(repos, versionHash, tagName, transaction);
      tags.push(tagName);
    }

    this.logger.debug('Mutation applied', {
      entityId,
      kind,
      operation,
      transactionId: transaction.id,
    });

    return {
      entityId,
      kind,
      transactionId: transaction.id,
      versionHash: contentHash,
      versionHashId: versionHash.id,
      operation,
      reused,
      tags,
    };
  }

  private async deleteWith(
    repos: RepositoryContext,
    transaction: Transaction,
    entityId: Id
  ): Promise<DeleteOutcome> {
    const live = await repos.entities.get(entityId);
    if (!live) throw new NotFoundError('entity', entityId);

    const open = await repos.shadows.findOpen(live.kind, entityId);
    if (!open) throw new NotFoundError('entity', entityId);

    await appendShadowRecord(repos, {
      kind: live.kind,
      entityId,
      transaction,
      operation: 'delete',
      schemaRevision: open.schemaRevision,
      attributes: open.attributes,
    });

    const hashes = await repos.versionHashes.listForEntity(entityId);
    const removedTags = await removeTagsForHashes(
      repos,
      hashes.map((h) => h.id),
      transaction
    );
    await repos.versionHashes.deleteForEntity(entityId);
    await repos.entities.delete(entityId);

    return {
      entityId,
      kind: live.kind,
      transactionId: transaction.id,
      removedVersionHashes: hashes.length,
      removedTags,
    };
  }

  private parse(definition: EntityTypeDefinition, candidate: Record<string, unknown>) {
    const parsed = parseAttributes(definition, candidate);
    if (!parsed.success) {
      throw new ValidationError(
        `Invalid ${definition.kind} attributes: ${parsed.issues.map((i) => i.path).join(', ')}`,
        { field: 'attributes', details: { issues: parsed.issues } }
      );
    }
    return parsed.attributes;
  }

  private async reconcileWith(repos: RepositoryContext, entityId: Id): Promise<ReconcileReport> {
    const kind = await repos.shadows.locate(entityId);
    if (!kind) throw new NotFoundError('entity', entityId);

    const records = await repos.shadows.list(kind, entityId);
    const violations = checkShadowRanges(records);
    const live = await repos.entities.get(entityId);

    const restoredHashes: string[] = [];
    if (live) {
      for (const record of records) {
        if (record.operation === 'delete') continue;
        const contentHash = this.hasher.hash(kind, entityId, record.attributes);
        const existing = await repos.versionHashes.findByHash(contentHash);
        if (existing) continue;
        await repos.versionHashes.insert({
          entityId,
          transactionId: record.transactionId,
          contentHash,
        });
        restoredHashes.push(contentHash);
      }
    }

    const open = records.find((r) => r.endTransactionId === null);
    const expected = live && open ? this.hasher.hash(kind, entityId, open.attributes) : null;

    let corrected = false;
    if (live && live.currentVersionHash !== expected) {
      await repos.entities.setCurrentVersionHash(entityId, expected);
      corrected = true;
    }

    return {
      entityId,
      kind,
      records: records.length,
      restoredHashes,
      currentVersionHash: expected,
      corrected,
      violations,
    };
  }

  private retryOptions(label: string) {
    return {
      maxAttempts: this.writeMaxAttempts,
      backoffMs: this.retryBackoffMs,
      logger: this.logger,
      label,
    };
  }

  /**
   * Run `fn` in a store transaction with a freshly opened log transaction,
   * retrying on conflict.
   */
  private transact<T>(
    label: string,
    actor: ActorContext,
    fn: (repos: RepositoryContext, transaction: Transaction) => Promise<T>,
    message?: string
  ): Promise<T> {
    return withConflictRetry(
      () =>
        this.repos.transaction(async (repos) => {
          const transaction = await openTransaction(repos, actor, message);
          return fn(repos, transaction);
        }),
      this.retryOptions(label)
    );
  }

  /**
   * Turn a thrown error into a failed result
   */
  private async execute<T>(
    operation: string,
    context: Record<string, unknown>,
    fn: () => Promise<T>
  ): Promise<VersioningResult<T>> {
    try {
      return { success: true, data: await fn() };
    } catch (thrown) {
      const error = toVersioningError(thrown);
      const entry = { ...context, code: error.code, error: error.message };
      if (error.code === 'SERVICE_UNAVAILABLE' || error.code === 'CONCURRENCY_CONFLICT') {
        this.logger.error(`${operation} failed`, entry);
      } else {
        this.logger.debug(`${operation} rejected`, entry);
      }
      return { success: false, error };
    }
  }
}

/**
 * Create a VersionStore
 */
export function createVersionStore(options: VersionStoreOptions): VersionStore {
  return new VersionStore(options);
}
