// Versioning error types
//
// Every failure the versioning core reports is one of these classes, each
// with a stable `code`. The store turns them into `{ success: false, error }`
// results; nothing here terminates the process.

import {
  StorageConflictError,
  StorageUnavailableError,
  UniqueViolationError,
} from '@strata/repositories';

export type VersioningErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'ALREADY_EXISTS'
  | 'CONCURRENCY_CONFLICT'
  | 'SCHEMA_INCONSISTENCY'
  | 'SERVICE_UNAVAILABLE';

/**
 * Base class for all versioning errors.
 * Provides structured error information for debugging and logging.
 */
export class VersioningError extends Error {
  readonly code: VersioningErrorCode;

  constructor(code: VersioningErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'VersioningError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends VersioningError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown>; cause?: unknown }
  ) {
    super('VALIDATION_ERROR', message, { cause: options?.cause });
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

export type VersionedResource = 'entity' | 'version' | 'version_hash' | 'tag' | 'transaction';

/**
 * Error when a referenced entity, version, hash, tag or transaction does not
 * exist (or no longer exists).
 */
export class NotFoundError extends VersioningError {
  readonly resource: VersionedResource;
  readonly key: string;

  constructor(resource: VersionedResource, key: string, message?: string) {
    super('NOT_FOUND', message ?? `${resource} not found: ${key}`);
    this.name = 'NotFoundError';
    this.resource = resource;
    this.key = key;
  }
}

/**
 * Error when creating something whose identity is already taken.
 */
export class AlreadyExistsError extends VersioningError {
  readonly resource: VersionedResource;
  readonly key: string;

  constructor(resource: VersionedResource, key: string, message?: string) {
    super('ALREADY_EXISTS', message ?? `${resource} already exists: ${key}`);
    this.name = 'AlreadyExistsError';
    this.resource = resource;
    this.key = key;
  }
}

/**
 * Error when a write lost a race with a concurrent writer and retries did
 * not help.
 */
export class ConcurrencyConflictError extends VersioningError {
  readonly attempts: number;

  constructor(message: string, options?: { attempts?: number; cause?: unknown }) {
    super('CONCURRENCY_CONFLICT', message, { cause: options?.cause });
    this.name = 'ConcurrencyConflictError';
    this.attempts = options?.attempts ?? 1;
  }
}

/**
 * Error when a strict read meets a historical row that predates fields of
 * the current attribute definition.
 */
export class SchemaInconsistencyError extends VersioningError {
  readonly entityId: string;
  readonly fields: string[];

  constructor(entityId: string, fields: string[]) {
    super(
      'SCHEMA_INCONSISTENCY',
      `Historical state of ${entityId} has no value for: ${fields.join(', ')}`
    );
    this.name = 'SchemaInconsistencyError';
    this.entityId = entityId;
    this.fields = fields;
  }
}

/**
 * Error when the store cannot be reached or fails unexpectedly.
 */
export class ServiceUnavailableError extends VersioningError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SERVICE_UNAVAILABLE', message, options);
    this.name = 'ServiceUnavailableError';
  }
}

/**
 * Whether an error means a concurrent writer got in the way, so running the
 * whole write again may succeed.
 */
export function isConflict(error: unknown): boolean {
  return (
    error instanceof StorageConflictError ||
    error instanceof UniqueViolationError ||
    error instanceof ConcurrencyConflictError
  );
}

/**
 * Map anything thrown below the store onto a versioning error.
 */
export function toVersioningError(error: unknown): VersioningError {
  if (error instanceof VersioningError) return error;
  if (error instanceof StorageConflictError || error instanceof UniqueViolationError) {
    return new ConcurrencyConflictError(error.message, { cause: error });
  }
  if (error instanceof StorageUnavailableError) {
    return new ServiceUnavailableError(error.message, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ServiceUnavailableError(`Unexpected storage failure: ${message}`, { cause: error });
}
