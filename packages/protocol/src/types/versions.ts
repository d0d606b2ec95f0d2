// Version types - shadow history, content hashes and tags

import type {
  ContentHash,
  Id,
  JsonObject,
  PageOptions,
  Timestamp,
  TransactionId,
} from './common.js';
import type { EntityKind } from './entities.js';

export const OPERATION_KINDS = ['insert', 'update', 'delete'] as const;

export type OperationKind = (typeof OPERATION_KINDS)[number];

/**
 * A ShadowRecord is one historical state of an entity, valid over the
 * half-open transaction range [transactionId, endTransactionId).
 *
 * The open record (endTransactionId = null) is the live version. A delete
 * record is a zero-width tombstone whose end equals its start.
 */
export type ShadowRecord = {
  entityId: Id;
  kind: EntityKind;
  transactionId: TransactionId;
  endTransactionId: TransactionId | null;
  operation: OperationKind;

  /**
   * Revision of the attribute definition the record was written with
   */
  schemaRevision: number;

  /**
   * Attributes exactly as written. Fields introduced later are absent.
   */
  attributes: JsonObject;
};

/**
 * Maps a content digest to the entity and transaction that first produced it.
 */
export type VersionHash = {
  id: Id;
  entityId: Id;
  transactionId: TransactionId;
  contentHash: ContentHash;
  createdAt: Timestamp;
};

/**
 * A human-readable name bound to one version hash at a time.
 */
export type VersionTag = {
  id: Id;
  versionHashId: Id;
  tagName: string;
  createdAt: Timestamp;
  updatedAt: Timestamp;
};

/**
 * Audit record of a tag being created, moved or removed.
 */
export type TagEvent = {
  id: Id;
  tagName: string;
  fromVersionHashId: Id | null;
  toVersionHashId: Id | null;
  transactionId: TransactionId;
  createdAt: Timestamp;
};

/**
 * An entity's state as of some transaction.
 */
export type HistoricalState = {
  entityId: Id;
  kind: EntityKind;

  /**
   * The transaction the state was requested at
   */
  asOf: TransactionId;

  validFrom: TransactionId;
  validTo: TransactionId | null;
  operation: OperationKind;

  /**
   * Complete attribute record; unknown fields are null
   */
  attributes: JsonObject;

  /**
   * Fields the historical row predates
   */
  unknownFields: string[];

  contentHash: ContentHash;
};

/**
 * One entry of an entity's version history.
 */
export type VersionHistoryItem = {
  /**
   * Position in history, 0 = oldest
   */
  index: number;
  transactionId: TransactionId;
  endTransactionId: TransactionId | null;
  operation: OperationKind;

  /**
   * Digest of the record's content (null for delete tombstones)
   */
  contentHash: ContentHash | null;
  tags: string[];
  issuedAt: Timestamp | null;
  actorId: Id | null;
  message: string | null;

  /**
   * Attributes as written by this record (only with `includeChangeset`)
   */
  changeset?: JsonObject;
};

export type HistoryOptions = PageOptions & {
  includeChangeset?: boolean;
};

export type VersionHistory = {
  entityId: Id;
  kind: EntityKind;
  totalVersions: number;
  versions: VersionHistoryItem[];
};
