// Tests for the transaction log

import { describe, it, expect, beforeEach } from 'vitest';
import type { Transaction } from '@strata/protocol';
import { createInMemoryRepositoryContext, StorageUnavailableError } from '@strata/repositories';
import type { InMemoryRepositoryContext, RepositoryContext } from '@strata/repositories';
import { getTransaction, openTransaction } from './transaction-log.js';
import { ConcurrencyConflictError, ServiceUnavailableError, ValidationError } from '../errors.js';

// --- Test Fixtures ---

/**
 * Repositories whose transaction repository misbehaves in a given way
 */
function withBegin(
  repos: RepositoryContext,
  begin: () => Promise<Transaction>
): RepositoryContext {
  return { ...repos, transactions: { ...repos.transactions, begin } };
}

// --- Tests ---

describe('openTransaction', () => {
  let repos: InMemoryRepositoryContext;

  beforeEach(() => {
    repos = createInMemoryRepositoryContext();
  });

  it('should allocate increasing ids stamped with the actor', async () => {
    const first = await openTransaction(repos, { actorId: 'user-1', originAddress: '10.0.0.1' });
    const second = await openTransaction(repos, { actorId: null });

    expect(first).toMatchObject({ id: 1, actorId: 'user-1', originAddress: '10.0.0.1' });
    expect(second).toMatchObject({ id: 2, actorId: null, originAddress: null });
  });

  it('should record the commit message', async () => {
    const transaction = await openTransaction(repos, { actorId: null }, 'Import Iris');

    expect(transaction.message).toBe('Import Iris');
    expect((await repos.transactions.get(transaction.id))?.message).toBe('Import Iris');
  });

  it('should reject a blank commit message', async () => {
    await expect(openTransaction(repos, { actorId: null }, ' ')).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      field: 'message',
    });
  });

  it('should reject a blank actor id', async () => {
    await expect(openTransaction(repos, { actorId: '  ' })).rejects.toBeInstanceOf(
      ValidationError
    );
  });

  it('should report a conflict when the new id does not follow the latest', async () => {
    await openTransaction(repos, { actorId: null });
    const stale = withBegin(repos, async () => ({
      id: 1,
      issuedAt: new Date().toISOString(),
      actorId: null,
      originAddress: null,
      message: null,
    }));

    await expect(openTransaction(stale, { actorId: null })).rejects.toBeInstanceOf(
      ConcurrencyConflictError
    );
  });

  it('should report the store as unavailable when no id can be allocated', async () => {
    const broken = withBegin(repos, async () => {
      throw new StorageUnavailableError('connection refused');
    });

    await expect(openTransaction(broken, { actorId: null })).rejects.toBeInstanceOf(
      ServiceUnavailableError
    );
  });
});

describe('getTransaction', () => {
  it('should report unknown transactions', async () => {
    const repos = createInMemoryRepositoryContext();

    await expect(getTransaction(repos, 7)).rejects.toMatchObject({
      code: 'NOT_FOUND',
      resource: 'transaction',
      key: '7',
    });
  });
});
