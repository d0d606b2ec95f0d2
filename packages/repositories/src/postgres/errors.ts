// Postgres error translation
//
// Maps driver errors onto the storage error types by SQLSTATE, so callers
// above the repositories never look at driver internals.

import {
  StorageConflictError,
  StorageUnavailableError,
  UniqueViolationError,
} from '../errors.js';

const CONFLICT_CODES = new Set(['40001', '40P01']);

const UNIQUE_VIOLATION = '23505';

const UNAVAILABLE_CODES = new Set([
  '53300', // too_many_connections
  '57P01', // admin_shutdown
  '57P02', // crash_shutdown
  '57P03', // cannot_connect_now
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
  'CONNECT_TIMEOUT',
]);

type DriverErrorFields = {
  code: string;
  constraint: string | null;
  message: string;
};

function readDriverError(error: unknown): DriverErrorFields | null {
  if (typeof error !== 'object' || error === null) return null;

  if ('code' in error && typeof error.code === 'string') {
    return {
      code: error.code,
      constraint:
        'constraint_name' in error && typeof error.constraint_name === 'string'
          ? error.constraint_name
          : null,
      message: error instanceof Error ? error.message : error.code,
    };
  }

  // Query builders may wrap the driver error
  if ('cause' in error) return readDriverError(error.cause);
  return null;
}

/**
 * Translate an error thrown by postgres.js (directly or wrapped) into a
 * storage error. Errors that are not recognized are returned unchanged.
 */
export function translatePgError(error: unknown): unknown {
  const fields = readDriverError(error);
  if (!fields) return error;

  if (CONFLICT_CODES.has(fields.code)) {
    return new StorageConflictError(fields.message, { cause: error });
  }
  if (fields.code === UNIQUE_VIOLATION) {
    return new UniqueViolationError(fields.constraint ?? 'unknown', { cause: error });
  }
  if (UNAVAILABLE_CODES.has(fields.code) || fields.code.startsWith('08')) {
    return new StorageUnavailableError(fields.message, { cause: error });
  }
  return error;
}

/**
 * Run a database call, translating whatever it throws.
 */
export async function withPgErrors<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw translatePgError(error);
  }
}
