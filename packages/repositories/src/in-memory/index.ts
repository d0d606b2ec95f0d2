// In-memory repository implementations for development and testing
//
// This module provides a complete in-memory implementation of all repositories,
// useful for:
// - Local development without a database
// - Fast unit testing
//
// Transactions are serialized. Each one works on a private copy of the data
// that replaces the committed data only when the callback resolves, so a
// rejected callback leaves nothing behind. Ids come from counters kept
// outside the data and are never handed out twice, like database sequences.
// Stored rows never leave the store: writes keep a copy of their input and
// reads return copies.
//
// Data does not persist between restarts.

import type {
  Entity,
  EntityKind,
  Id,
  ShadowRecord,
  TagEvent,
  Transaction,
  TransactionId,
  VersionHash,
  VersionTag,
} from '@strata/protocol';
import { ENTITY_KINDS, indexedColumns } from '@strata/protocol';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
  TransactionRepository,
  EntityRepository,
  ShadowHistoryRepository,
  VersionHashRepository,
  VersionTagRepository,
} from '../interfaces/index.js';
import { UniqueViolationError } from '../errors.js';
import { CONSTRAINTS } from '../shadow-tables.js';

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore {
  transactions: Map<TransactionId, Transaction>;
  entities: Map<Id, Entity>;
  shadows: Record<EntityKind, ShadowRecord[]>;
  versionHashes: Map<Id, VersionHash>;
  versionTags: Map<Id, VersionTag>;
  tagEvents: TagEvent[];
}

/**
 * Extended repository context with access to underlying data and clear function.
 */
export interface InMemoryRepositoryContext extends TransactionalRepositoryContext {
  /** Direct access to the committed data (for debugging/testing) */
  readonly _data: InMemoryDataStore;
  /** Clear all data and reset id counters */
  clear(): void;
}

type Sequences = {
  transaction: number;
  versionHash: number;
  versionTag: number;
  tagEvent: number;
};

function createDataStore(): InMemoryDataStore {
  return {
    transactions: new Map(),
    entities: new Map(),
    shadows: { dataset: [], trained_model: [], task: [] },
    versionHashes: new Map(),
    versionTags: new Map(),
    tagEvents: [],
  };
}

function createSequences(): Sequences {
  return { transaction: 0, versionHash: 0, versionTag: 0, tagEvent: 0 };
}

function copy<T>(value: T): T {
  return structuredClone(value);
}

function now(): string {
  return new Date().toISOString();
}

/**
 * Create a complete in-memory repository context.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 *
 * await repos.transaction(async (tx) => {
 *   const transaction = await tx.transactions.begin({ actorId: null, originAddress: null });
 *   await tx.entities.create({ id: 'ds-1', kind: 'dataset', attributes: { name: 'Iris' } });
 * });
 *
 * // Access committed data for debugging
 * console.log(repos._data.entities.size);
 * ```
 */
export function createInMemoryRepositoryContext(): InMemoryRepositoryContext {
  const state = { data: createDataStore(), sequences: createSequences() };
  const committed = createRepositories(() => state.data, state.sequences);

  // Tail of the transaction queue; never rejects
  let tail: Promise<void> = Promise.resolve();

  return {
    ...committed,
    async transaction<T>(fn: TransactionFn<T>): Promise<T> {
      const run = tail.then(async () => {
        const working = structuredClone(state.data);
        const result = await fn(createRepositories(() => working, state.sequences));
        state.data = working;
        return result;
      });
      tail = run.then(
        () => undefined,
        () => undefined
      );
      return run;
    },
    get _data() {
      return state.data;
    },
    clear() {
      state.data = createDataStore();
      Object.assign(state.sequences, createSequences());
    },
  };
}

function createRepositories(
  data: () => InMemoryDataStore,
  sequences: Sequences
): RepositoryContext {
  // Transaction repository
  const transactionRepo: TransactionRepository = {
    async begin(input) {
      sequences.transaction += 1;
      const transaction: Transaction = {
        id: sequences.transaction,
        issuedAt: now(),
        actorId: input.actorId,
        originAddress: input.originAddress,
        message: input.message ?? null,
      };
      data().transactions.set(transaction.id, transaction);
      return copy(transaction);
    },
    async get(id) {
      const transaction = data().transactions.get(id);
      return transaction ? copy(transaction) : null;
    },
    async latestId() {
      let latest: TransactionId | null = null;
      for (const id of data().transactions.keys()) {
        if (latest === null || id > latest) latest = id;
      }
      return latest;
    },
  };

  // Entity repository
  const entityRepo: EntityRepository = {
    async get(id) {
      const entity = data().entities.get(id);
      return entity ? copy(entity) : null;
    },
    async create(input) {
      const entities = data().entities;
      if (entities.has(input.id)) {
        throw new UniqueViolationError(CONSTRAINTS.entityPrimaryKey);
      }
      const timestamp = now();
      const entity: Entity = {
        id: input.id,
        kind: input.kind,
        ...indexedColumns(input.attributes),
        attributes: copy(input.attributes),
        currentVersionHash: null,
        createdAt: timestamp,
        updatedAt: timestamp,
      };
      entities.set(entity.id, entity);
      return copy(entity);
    },
    async update(id, attributes) {
      const entity = data().entities.get(id);
      if (!entity) return null;
      Object.assign(entity, indexedColumns(attributes));
      entity.attributes = copy(attributes);
      entity.updatedAt = now();
      return copy(entity);
    },
    async setCurrentVersionHash(id, contentHash) {
      const entity = data().entities.get(id);
      if (entity) entity.currentVersionHash = contentHash;
    },
    async delete(id) {
      return data().entities.delete(id);
    },
  };

  // Shadow history repository
  const recordsFor = (kind: EntityKind, entityId: Id) =>
    data().shadows[kind].filter((r) => r.entityId === entityId);

  const shadowRepo: ShadowHistoryRepository = {
    async locate(entityId) {
      return (
        ENTITY_KINDS.find((kind) => data().shadows[kind].some((r) => r.entityId === entityId)) ??
        null
      );
    },
    async findOpen(kind, entityId) {
      const open = recordsFor(kind, entityId).find((r) => r.endTransactionId === null);
      return open ? copy(open) : null;
    },
    async close(kind, entityId, endTransactionId) {
      const open = recordsFor(kind, entityId).find((r) => r.endTransactionId === null);
      if (!open) return null;
      open.endTransactionId = endTransactionId;
      return copy(open);
    },
    async insert(record) {
      const existing = recordsFor(record.kind, record.entityId);
      if (existing.some((r) => r.transactionId === record.transactionId)) {
        throw new UniqueViolationError(CONSTRAINTS.shadowPrimaryKey(record.kind));
      }
      if (record.endTransactionId === null && existing.some((r) => r.endTransactionId === null)) {
        throw new UniqueViolationError(CONSTRAINTS.shadowOpen(record.kind));
      }
      const stored = copy(record);
      data().shadows[record.kind].push(stored);
      return copy(stored);
    },
    async list(kind, entityId) {
      return recordsFor(kind, entityId)
        .sort((a, b) => a.transactionId - b.transactionId)
        .map(copy);
    },
    async findContaining(kind, entityId, transactionId) {
      const record = recordsFor(kind, entityId).find(
        (r) =>
          r.transactionId <= transactionId &&
          (r.endTransactionId === null || transactionId < r.endTransactionId)
      );
      return record ? copy(record) : null;
    },
  };

  // Version hash repository
  const versionHashRepo: VersionHashRepository = {
    async insert(input) {
      const hashes = data().versionHashes;
      for (const existing of hashes.values()) {
        if (existing.contentHash === input.contentHash) {
          throw new UniqueViolationError(CONSTRAINTS.contentHash);
        }
      }
      sequences.versionHash += 1;
      const versionHash: VersionHash = {
        id: `hash-${sequences.versionHash}`,
        entityId: input.entityId,
        transactionId: input.transactionId,
        contentHash: input.contentHash,
        createdAt: now(),
      };
      hashes.set(versionHash.id, versionHash);
      return copy(versionHash);
    },
    async get(id) {
      const versionHash = data().versionHashes.get(id);
      return versionHash ? copy(versionHash) : null;
    },
    async findByHash(contentHash) {
      for (const versionHash of data().versionHashes.values()) {
        if (versionHash.contentHash === contentHash) return copy(versionHash);
      }
      return null;
    },
    async listForEntity(entityId) {
      return Array.from(data().versionHashes.values())
        .filter((h) => h.entityId === entityId)
        .sort((a, b) => a.transactionId - b.transactionId)
        .map(copy);
    },
    async deleteForEntity(entityId) {
      const hashes = data().versionHashes;
      const removed = Array.from(hashes.values()).filter((h) => h.entityId === entityId);
      for (const versionHash of removed) {
        hashes.delete(versionHash.id);
      }
      return removed;
    },
  };

  // Version tag repository
  const findTag = (tagName: string) => {
    for (const tag of data().versionTags.values()) {
      if (tag.tagName === tagName) return tag;
    }
    return null;
  };

  const versionTagRepo: VersionTagRepository = {
    async findByName(tagName) {
      const tag = findTag(tagName);
      return tag ? copy(tag) : null;
    },
    async insert(input) {
      if (findTag(input.tagName)) {
        throw new UniqueViolationError(CONSTRAINTS.tagName);
      }
      sequences.versionTag += 1;
      const timestamp = now();
      const tag: VersionTag = {
        id: `tag-${sequences.versionTag}`,
        versionHashId: input.versionHashId,
        tagName: input.tagName,
        createdAt: timestamp,
        updatedAt: timestamp,
      };
      data().versionTags.set(tag.id, tag);
      return copy(tag);
    },
    async move(tagName, versionHashId) {
      const tag = findTag(tagName);
      if (!tag) return null;
      tag.versionHashId = versionHashId;
      tag.updatedAt = now();
      return copy(tag);
    },
    async listForHash(versionHashId) {
      return Array.from(data().versionTags.values())
        .filter((t) => t.versionHashId === versionHashId)
        .sort((a, b) => a.tagName.localeCompare(b.tagName))
        .map(copy);
    },
    async deleteForHashes(versionHashIds) {
      const tags = data().versionTags;
      const removed = Array.from(tags.values()).filter((t) =>
        versionHashIds.includes(t.versionHashId)
      );
      for (const tag of removed) {
        tags.delete(tag.id);
      }
      return removed;
    },
    async appendEvent(input) {
      sequences.tagEvent += 1;
      const event: TagEvent = {
        id: `tag-event-${sequences.tagEvent}`,
        tagName: input.tagName,
        fromVersionHashId: input.fromVersionHashId,
        toVersionHashId: input.toVersionHashId,
        transactionId: input.transactionId,
        createdAt: now(),
      };
      data().tagEvents.push(event);
      return copy(event);
    },
    async listEvents(tagName) {
      return data()
        .tagEvents.filter((e) => e.tagName === tagName)
        .sort((a, b) => a.transactionId - b.transactionId)
        .map(copy);
    },
  };

  return {
    transactions: transactionRepo,
    entities: entityRepo,
    shadows: shadowRepo,
    versionHashes: versionHashRepo,
    versionTags: versionTagRepo,
  };
}
