// Entity versioning
export { VersionStore, createVersionStore, type VersionStoreOptions } from './store.js';
export {
  TimeTravelReader,
  type TimeTravelReaderOptions,
  type ResolvedRecord,
} from './reader.js';
export { openTransaction, getTransaction } from './transaction-log.js';
export {
  appendShadowRecord,
  checkShadowRanges,
  type AppendShadowInput,
} from './shadow-history.js';
export {
  registerVersionHash,
  resolveVersionHash,
  assertContentHash,
  type RegisteredHash,
} from './hash-registry.js';
export {
  createTag,
  moveTag,
  removeTagsForHashes,
  resolveTag,
  assertTagName,
} from './tag-registry.js';
export type {
  VersioningResult,
  EntityMutation,
  WriteInput,
  WriteOutcome,
  CommitOptions,
  RevertOptions,
  BatchOutcome,
  DeleteOutcome,
  TagOutcome,
  ResolvedTag,
  ReadOptions,
  ShadowRangeViolation,
  ShadowRangeViolationKind,
  ReconcileReport,
  TagHistory,
} from './types.js';
