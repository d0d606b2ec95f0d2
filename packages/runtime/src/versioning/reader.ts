// Time-Travel Reader
//
// Reconstructs entity state as of any past transaction from shadow history.
// Reads take no locks: committed history never changes except for the open
// record being closed, which cannot change what an earlier transaction saw.

import type {
  EntityKind,
  EntityTypeRegistry,
  HistoricalState,
  HistoryOptions,
  Id,
  PageOptions,
  ShadowRecord,
  TransactionId,
  VersionHistory,
  VersionHistoryItem,
} from '@strata/protocol';
import { entityTypes, materializeAttributes, parseVersionRef } from '@strata/protocol';
import type { RepositoryContext } from '@strata/repositories';
import { ContentHasher } from '../hashing/index.js';
import { NotFoundError, SchemaInconsistencyError, ValidationError } from '../errors.js';
import { resolveVersionHash } from './hash-registry.js';
import { resolveTag } from './tag-registry.js';
import type { ReadOptions } from './types.js';

/**
 * A shadow record and the transaction it is read at
 */
export type ResolvedRecord = {
  record: ShadowRecord;
  asOf: TransactionId;
};

function validatePage(page: PageOptions): void {
  for (const key of ['offset', 'limit'] as const) {
    const value = page[key];
    if (value !== undefined && (!Number.isSafeInteger(value) || value < 0)) {
      throw new ValidationError(`${key} must be a non-negative integer`, {
        field: key,
        details: { [key]: value },
      });
    }
  }
}

export type TimeTravelReaderOptions = {
  repos: RepositoryContext;
  registry?: EntityTypeRegistry;
  hasher?: ContentHasher;
};

export class TimeTravelReader {
  private readonly repos: RepositoryContext;
  private readonly registry: EntityTypeRegistry;
  private readonly hasher: ContentHasher;

  constructor(options: TimeTravelReaderOptions) {
    this.repos = options.repos;
    this.registry = options.registry ?? entityTypes;
    this.hasher = options.hasher ?? new ContentHasher(this.registry);
  }

  /**
   * State of an entity as of transaction `transactionId`.
   *
   * @throws NotFoundError before the entity was created, at or after its
   * deletion, or for a transaction that has not happened yet
   */
  async stateAt(
    entityId: Id,
    transactionId: TransactionId,
    options: ReadOptions = {}
  ): Promise<HistoricalState> {
    const { record, asOf } = await this.recordAt(entityId, transactionId);
    return this.toState(record, asOf, options);
  }

  /**
   * State recorded under a content digest
   */
  async stateByHash(contentHash: string, options: ReadOptions = {}): Promise<HistoricalState> {
    const versionHash = await resolveVersionHash(this.repos, contentHash);
    return this.stateAt(versionHash.entityId, versionHash.transactionId, options);
  }

  /**
   * State of the version a tag points at
   */
  async stateByTag(tagName: string, options: ReadOptions = {}): Promise<HistoricalState> {
    const { versionHash } = await resolveTag(this.repos, tagName);
    return this.stateAt(versionHash.entityId, versionHash.transactionId, options);
  }

  /**
   * Resolve a version ref against one entity: a content hash, a tag, or
   * "~N" (0 = oldest, negative counts back from the newest).
   */
  async resolveRef(entityId: Id, ref: string, options: ReadOptions = {}): Promise<HistoricalState> {
    const { record, asOf } = await this.resolveRecord(entityId, ref);
    return this.toState(record, asOf, options);
  }

  /**
   * Shadow record a version ref names
   */
  async resolveRecord(entityId: Id, ref: string): Promise<ResolvedRecord> {
    const parsed = parseVersionRef(ref);
    if (!parsed) {
      throw new ValidationError(`Malformed version ref: "${ref}"`, { field: 'ref' });
    }

    switch (parsed.type) {
      case 'hash': {
        const versionHash = await resolveVersionHash(this.repos, parsed.contentHash);
        if (versionHash.entityId !== entityId) {
          throw new NotFoundError('version', `${entityId}@${ref}`);
        }
        return this.recordAt(entityId, versionHash.transactionId);
      }
      case 'tag': {
        const { versionHash } = await resolveTag(this.repos, parsed.tagName);
        if (versionHash.entityId !== entityId) {
          throw new NotFoundError('version', `${entityId}@${ref}`);
        }
        return this.recordAt(entityId, versionHash.transactionId);
      }
      case 'index': {
        const kind = await this.locate(entityId);
        const records = await this.repos.shadows.list(kind, entityId);
        const position = parsed.index >= 0 ? parsed.index : records.length + parsed.index;
        const record = records[position];
        if (position < 0 || !record) {
          throw new NotFoundError(
            'version',
            `${entityId}@${ref}`,
            `${entityId} has ${records.length} version(s); ${ref} is out of range`
          );
        }
        return { record, asOf: record.transactionId };
      }
    }
  }

  /**
   * Version history of an entity, newest first.
   *
   * @param options.includeChangeset also return each record's attributes
   */
  async history(entityId: Id, options: HistoryOptions = {}): Promise<VersionHistory> {
    validatePage(options);
    const kind = await this.locate(entityId);
    const records = await this.repos.shadows.list(kind, entityId);

    const offset = options.offset ?? 0;
    const newestFirst = records
      .map((record, index) => ({ record, index }))
      .reverse()
      .slice(offset, options.limit === undefined ? undefined : offset + options.limit);

    const versions: VersionHistoryItem[] = [];
    for (const { record, index } of newestFirst) {
      const item = await this.toHistoryItem(kind, record, index);
      versions.push(options.includeChangeset ? { ...item, changeset: record.attributes } : item);
    }

    return { entityId, kind, totalVersions: records.length, versions };
  }

  /**
   * Kind of the entity's history, surviving deletion
   */
  async locate(entityId: Id): Promise<EntityKind> {
    const kind = await this.repos.shadows.locate(entityId);
    if (!kind) throw new NotFoundError('entity', entityId);
    return kind;
  }

  /**
   * Digest of a shadow record's content, over the attributes as stored
   */
  recordHash(record: ShadowRecord): string {
    return this.hasher.hash(record.kind, record.entityId, record.attributes);
  }

  private async recordAt(entityId: Id, transactionId: TransactionId): Promise<ResolvedRecord> {
    if (!Number.isSafeInteger(transactionId) || transactionId < 1) {
      throw new ValidationError('Transaction id must be a positive integer', {
        field: 'transactionId',
        details: { transactionId },
      });
    }

    const latest = await this.repos.transactions.latestId();
    if (latest === null || transactionId > latest) {
      throw new NotFoundError(
        'version',
        `${entityId}@${transactionId}`,
        `Transaction ${transactionId} has not happened yet`
      );
    }

    const kind = await this.locate(entityId);
    const record = await this.repos.shadows.findContaining(kind, entityId, transactionId);
    if (!record) {
      throw new NotFoundError(
        'version',
        `${entityId}@${transactionId}`,
        `${entityId} did not exist at transaction ${transactionId}`
      );
    }

    return { record, asOf: transactionId };
  }

  private toState(
    record: ShadowRecord,
    asOf: TransactionId,
    options: ReadOptions
  ): HistoricalState {
    const { attributes, unknownFields } = materializeAttributes(
      this.registry[record.kind],
      record.attributes
    );
    if (options.strict && unknownFields.length > 0) {
      throw new SchemaInconsistencyError(record.entityId, unknownFields);
    }

    return {
      entityId: record.entityId,
      kind: record.kind,
      asOf,
      validFrom: record.transactionId,
      validTo: record.endTransactionId,
      operation: record.operation,
      attributes,
      unknownFields,
      contentHash: this.recordHash(record),
    };
  }

  private async toHistoryItem(
    kind: EntityKind,
    record: ShadowRecord,
    index: number
  ): Promise<VersionHistoryItem> {
    const transaction = await this.repos.transactions.get(record.transactionId);

    let contentHash: string | null = null;
    let tags: string[] = [];
    if (record.operation !== 'delete') {
      contentHash = this.hasher.hash(kind, record.entityId, record.attributes);
      const versionHash = await this.repos.versionHashes.findByHash(contentHash);
      if (versionHash) {
        tags = (await this.repos.versionTags.listForHash(versionHash.id)).map((t) => t.tagName);
      }
    }

    return {
      index,
      transactionId: record.transactionId,
      endTransactionId: record.endTransactionId,
      operation: record.operation,
      contentHash,
      tags,
      issuedAt: transaction?.issuedAt ?? null,
      actorId: transaction?.actorId ?? null,
      message: transaction?.message ?? null,
    };
  }
}
