// @strata/runtime
// Entity versioning core: transaction log, shadow history, content hashing,
// version hashes, tags and time-travel reads behind one commit boundary.

// VersionStore - The Commit Boundary
export {
  VersionStore,
  createVersionStore,
  TimeTravelReader,
  openTransaction,
  getTransaction,
  appendShadowRecord,
  checkShadowRanges,
  registerVersionHash,
  resolveVersionHash,
  assertContentHash,
  createTag,
  moveTag,
  removeTagsForHashes,
  resolveTag,
  assertTagName,
  type VersionStoreOptions,
  type TimeTravelReaderOptions,
  type ResolvedRecord,
  type AppendShadowInput,
  type RegisteredHash,
  type VersioningResult,
  type EntityMutation,
  type WriteInput,
  type WriteOutcome,
  type CommitOptions,
  type RevertOptions,
  type BatchOutcome,
  type DeleteOutcome,
  type TagOutcome,
  type ResolvedTag,
  type ReadOptions,
  type ShadowRangeViolation,
  type ShadowRangeViolationKind,
  type ReconcileReport,
  type TagHistory,
} from './versioning/index.js';

// Content hashing
export { ContentHasher, canonicalize, hashCanonical } from './hashing/index.js';

// Error types
export {
  VersioningError,
  ValidationError,
  NotFoundError,
  AlreadyExistsError,
  ConcurrencyConflictError,
  SchemaInconsistencyError,
  ServiceUnavailableError,
  isConflict,
  toVersioningError,
  type VersioningErrorCode,
  type VersionedResource,
} from './errors.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createConsoleLogger,
  createCapturingLogger,
  type Logger,
  type LogLevel,
  type LogEntry,
} from './logging.js';

// Configuration and wiring
export { loadConfig, type StrataConfig } from './config.js';
export { withConflictRetry, type RetryOptions } from './retry.js';
export { createPgVersionStore, type PgVersionStore } from './bootstrap.js';
