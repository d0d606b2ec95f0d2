// Storage error types
//
// Raised by every repository implementation so callers can tell a lost
// race from an unreachable store without knowing which backend is in use.

/**
 * Base class for storage failures.
 */
export class StorageError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
    this.code = code;
  }
}

/**
 * The store aborted the transaction because it conflicted with a concurrent
 * one (serialization failure, deadlock). Retrying is safe.
 */
export class StorageConflictError extends StorageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORAGE_CONFLICT', message, options);
    this.name = 'StorageConflictError';
  }
}

/**
 * A unique index rejected a row. Under concurrent writers this is how a lost
 * race on a content hash, tag name or open shadow record surfaces.
 */
export class UniqueViolationError extends StorageError {
  readonly constraint: string;

  constructor(constraint: string, options?: { cause?: unknown }) {
    super('UNIQUE_VIOLATION', `Unique constraint violated: ${constraint}`, options);
    this.name = 'UniqueViolationError';
    this.constraint = constraint;
  }
}

/**
 * The store could not be reached or refused the work.
 */
export class StorageUnavailableError extends StorageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORAGE_UNAVAILABLE', message, options);
    this.name = 'StorageUnavailableError';
  }
}
