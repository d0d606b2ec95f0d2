// Tests for shadow history appends and range checking

import { describe, it, expect, beforeEach } from 'vitest';
import type { ShadowRecord, Transaction } from '@strata/protocol';
import { createInMemoryRepositoryContext } from '@strata/repositories';
import type { InMemoryRepositoryContext } from '@strata/repositories';
import { appendShadowRecord, checkShadowRanges } from './shadow-history.js';
import { AlreadyExistsError, ConcurrencyConflictError, NotFoundError } from '../errors.js';

// --- Test Fixtures ---

function record(overrides: Partial<ShadowRecord>): ShadowRecord {
  return {
    entityId: 'ds-1',
    kind: 'dataset',
    transactionId: 1,
    endTransactionId: null,
    operation: 'update',
    schemaRevision: 3,
    attributes: {},
    ...overrides,
  };
}

// --- Tests ---

describe('appendShadowRecord', () => {
  let repos: InMemoryRepositoryContext;

  const begin = (): Promise<Transaction> =>
    repos.transactions.begin({ actorId: null, originAddress: null });

  const append = (transaction: Transaction, operation: ShadowRecord['operation'], name: string) =>
    appendShadowRecord(repos, {
      kind: 'dataset',
      entityId: 'ds-1',
      transaction,
      operation,
      schemaRevision: 3,
      attributes: { name },
    });

  beforeEach(() => {
    repos = createInMemoryRepositoryContext();
  });

  it('should open a record on insert', async () => {
    const created = await append(await begin(), 'insert', 'v1');

    expect(created).toMatchObject({ transactionId: 1, endTransactionId: null, operation: 'insert' });
  });

  it('should close the open record at the next transaction', async () => {
    await append(await begin(), 'insert', 'v1');
    await append(await begin(), 'update', 'v2');

    const records = await repos.shadows.list('dataset', 'ds-1');
    expect(records.map((r) => [r.transactionId, r.endTransactionId])).toEqual([
      [1, 2],
      [2, null],
    ]);
    expect(checkShadowRanges(records)).toEqual([]);
  });

  it('should append a zero-width tombstone on delete', async () => {
    await append(await begin(), 'insert', 'v1');
    const tombstone = await append(await begin(), 'delete', 'v1');

    expect(tombstone).toMatchObject({ transactionId: 2, endTransactionId: 2, operation: 'delete' });
    expect(await repos.shadows.findOpen('dataset', 'ds-1')).toBeNull();
    expect(checkShadowRanges(await repos.shadows.list('dataset', 'ds-1'))).toEqual([]);
  });

  it('should refuse to insert an id that has history', async () => {
    await append(await begin(), 'insert', 'v1');
    await append(await begin(), 'delete', 'v1');

    await expect(append(await begin(), 'insert', 'again')).rejects.toBeInstanceOf(
      AlreadyExistsError
    );
  });

  it('should refuse to update an entity without history', async () => {
    await expect(append(await begin(), 'update', 'v1')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should refuse to update a deleted entity', async () => {
    await append(await begin(), 'insert', 'v1');
    await append(await begin(), 'delete', 'v1');

    await expect(append(await begin(), 'update', 'v2')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should report a conflict when the open record is not older', async () => {
    const first = await begin();
    await append(first, 'insert', 'v1');

    await expect(append(first, 'update', 'v2')).rejects.toBeInstanceOf(ConcurrencyConflictError);
  });
});

describe('checkShadowRanges', () => {
  it('should accept a tiled history ending in a tombstone', () => {
    expect(
      checkShadowRanges([
        record({ transactionId: 4, endTransactionId: 4, operation: 'delete' }),
        record({ transactionId: 1, endTransactionId: 3, operation: 'insert' }),
        record({ transactionId: 3, endTransactionId: 4 }),
      ])
    ).toEqual([]);
  });

  it('should report gaps and overlaps', () => {
    const violations = checkShadowRanges([
      record({ transactionId: 1, endTransactionId: 2, operation: 'insert' }),
      record({ transactionId: 3, endTransactionId: 6 }),
      record({ transactionId: 5, endTransactionId: null }),
    ]);

    expect(violations.map((v) => [v.kind, v.transactionId])).toEqual([
      ['gap', 1],
      ['overlap', 3],
    ]);
  });

  it('should report an open record that is not the latest', () => {
    const violations = checkShadowRanges([
      record({ transactionId: 1, endTransactionId: null, operation: 'insert' }),
      record({ transactionId: 2, endTransactionId: null }),
    ]);

    expect(violations.map((v) => v.kind)).toEqual(['overlap']);
  });

  it('should report histories that do not start with an insert', () => {
    const violations = checkShadowRanges([record({ transactionId: 1 })]);

    expect(violations.map((v) => v.kind)).toEqual(['missing_insert']);
  });

  it('should report a closed latest record and records after a delete', () => {
    const closedTail = checkShadowRanges([
      record({ transactionId: 1, endTransactionId: 2, operation: 'insert' }),
    ]);
    const afterDelete = checkShadowRanges([
      record({ transactionId: 1, endTransactionId: 2, operation: 'insert' }),
      record({ transactionId: 2, endTransactionId: 2, operation: 'delete' }),
      record({ transactionId: 3, endTransactionId: null }),
    ]);

    expect(closedTail.map((v) => v.kind)).toEqual(['closed_tail']);
    expect(afterDelete.map((v) => v.kind)).toEqual(['after_delete']);
  });

  it('should report tombstones with a width', () => {
    const violations = checkShadowRanges([
      record({ transactionId: 1, endTransactionId: 2, operation: 'insert' }),
      record({ transactionId: 2, endTransactionId: 5, operation: 'delete' }),
    ]);

    expect(violations.map((v) => v.kind)).toEqual(['malformed_tombstone']);
  });
});
