// Versioning types - inputs and outcomes of the VersionStore

import type {
  ActorContext,
  ContentHash,
  EntityKind,
  Id,
  JsonObject,
  OperationKind,
  TagEvent,
  TransactionId,
  VersionHash,
  VersionTag,
} from '@strata/protocol';
import type { VersioningError } from '../errors.js';

/**
 * Result of a VersionStore call. Failures carry a typed error instead of
 * being thrown.
 */
export type VersioningResult<T> =
  | { success: true; data: T }
  | { success: false; error: VersioningError };

/**
 * One entity mutation. Without `entityId` (or with an id that has no
 * history) it creates an entity of `kind`; otherwise `attributes` are merged
 * over the live state.
 */
export type EntityMutation = {
  entityId?: Id;
  kind?: EntityKind;
  attributes: JsonObject;

  /**
   * Tag names to bind to the written version in the same transaction
   */
  tags?: string[];
};

export type WriteInput = EntityMutation & {
  actor: ActorContext;

  /**
   * Commit message stored on the transaction
   */
  message?: string;
};

export type CommitOptions = {
  message?: string;
};

export type RevertOptions = CommitOptions & {
  tags?: string[];
};

export type WriteOutcome = {
  entityId: Id;
  kind: EntityKind;
  transactionId: TransactionId;
  versionHash: ContentHash;
  versionHashId: Id;
  operation: Exclude<OperationKind, 'delete'>;

  /**
   * True when the digest was already registered by an earlier write
   */
  reused: boolean;

  /**
   * Tags bound to the version by this write
   */
  tags: string[];
};

export type BatchOutcome = {
  transactionId: TransactionId;
  writes: WriteOutcome[];
};

export type DeleteOutcome = {
  entityId: Id;
  kind: EntityKind;
  transactionId: TransactionId;
  removedVersionHashes: number;
  removedTags: string[];
};

export type TagOutcome = {
  tag: VersionTag;
  versionHash: VersionHash;
  transactionId: TransactionId;

  /**
   * Version hash the tag pointed at before (retag only)
   */
  previousVersionHashId: Id | null;
};

export type ResolvedTag = {
  tag: VersionTag;
  versionHash: VersionHash;
};

export type ReadOptions = {
  /**
   * Fail with SchemaInconsistencyError instead of reporting unknown fields
   */
  strict?: boolean;
};

export type ShadowRangeViolationKind =
  | 'missing_insert'
  | 'unexpected_insert'
  | 'gap'
  | 'overlap'
  | 'inverted_range'
  | 'closed_tail'
  | 'after_delete'
  | 'malformed_tombstone';

export type ShadowRangeViolation = {
  kind: ShadowRangeViolationKind;
  transactionId: TransactionId;
  message: string;
};

export type ReconcileReport = {
  entityId: Id;
  kind: EntityKind;
  records: number;

  /**
   * Digests that were missing from the registry and have been added back
   */
  restoredHashes: ContentHash[];

  currentVersionHash: ContentHash | null;

  /**
   * Whether the live row's cached hash had drifted and was corrected
   */
  corrected: boolean;

  violations: ShadowRangeViolation[];
};

export type TagHistory = {
  tagName: string;
  events: TagEvent[];
};
