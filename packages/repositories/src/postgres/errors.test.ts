// Tests for Postgres error translation
// Driver errors are plain objects carrying postgres.js fields, so no
// database is needed.

import { describe, it, expect } from 'vitest';
import { translatePgError, withPgErrors } from './errors.js';
import {
  StorageConflictError,
  StorageUnavailableError,
  UniqueViolationError,
} from '../errors.js';

// --- Test Fixtures ---

function driverError(fields: Record<string, string>): Error {
  return Object.assign(new Error(fields.message ?? 'driver error'), fields);
}

// --- Tests ---

describe('translatePgError', () => {
  it('should map serialization failures to a conflict', () => {
    const translated = translatePgError(
      driverError({ code: '40001', message: 'could not serialize access' })
    );

    expect(translated).toBeInstanceOf(StorageConflictError);
    expect(translated).toMatchObject({
      code: 'STORAGE_CONFLICT',
      message: 'could not serialize access',
    });
  });

  it('should map deadlocks to a conflict', () => {
    expect(translatePgError(driverError({ code: '40P01' }))).toBeInstanceOf(StorageConflictError);
  });

  it('should carry the constraint of a unique violation', () => {
    const translated = translatePgError(
      driverError({ code: '23505', constraint_name: 'version_tags_name_idx' })
    );

    expect(translated).toBeInstanceOf(UniqueViolationError);
    expect(translated).toMatchObject({ constraint: 'version_tags_name_idx' });
  });

  it('should map connection failures to unavailable', () => {
    expect(translatePgError(driverError({ code: 'ECONNREFUSED' }))).toBeInstanceOf(
      StorageUnavailableError
    );
    expect(translatePgError(driverError({ code: '08006' }))).toBeInstanceOf(
      StorageUnavailableError
    );
    expect(translatePgError(driverError({ code: 'CONNECTION_CLOSED' }))).toBeInstanceOf(
      StorageUnavailableError
    );
  });

  it('should look through a wrapping error', () => {
    const wrapped = new Error('query failed', { cause: driverError({ code: '40001' }) });

    expect(translatePgError(wrapped)).toBeInstanceOf(StorageConflictError);
  });

  it('should keep the original as cause', () => {
    const original = driverError({ code: '40001' });

    expect(translatePgError(original)).toMatchObject({ cause: original });
  });

  it('should return unrecognized errors unchanged', () => {
    const syntax = driverError({ code: '42601' });
    const plain = new Error('plain');

    expect(translatePgError(syntax)).toBe(syntax);
    expect(translatePgError(plain)).toBe(plain);
    expect(translatePgError('text')).toBe('text');
  });
});

describe('withPgErrors', () => {
  it('should pass results through', async () => {
    await expect(withPgErrors(async () => 42)).resolves.toBe(42);
  });

  it('should translate rejections', async () => {
    await expect(
      withPgErrors(async () => {
        throw driverError({ code: '23505', constraint_name: 'entities_pkey' });
      })
    ).rejects.toMatchObject({ constraint: 'entities_pkey' });
  });
});
