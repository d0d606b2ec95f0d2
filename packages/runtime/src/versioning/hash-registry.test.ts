// Tests for the version hash registry

import { describe, it, expect, beforeEach } from 'vitest';
import type { Transaction } from '@strata/protocol';
import { createInMemoryRepositoryContext } from '@strata/repositories';
import type { InMemoryRepositoryContext } from '@strata/repositories';
import { registerVersionHash, resolveVersionHash } from './hash-registry.js';

// --- Test Fixtures ---

const H1 = 'a'.repeat(64);
const H2 = 'b'.repeat(64);

// --- Tests ---

describe('version hash registry', () => {
  let repos: InMemoryRepositoryContext;
  let tx1: Transaction;
  let tx2: Transaction;

  beforeEach(async () => {
    repos = createInMemoryRepositoryContext();
    tx1 = await repos.transactions.begin({ actorId: 'user-1', originAddress: null });
    tx2 = await repos.transactions.begin({ actorId: 'user-1', originAddress: null });
  });

  it('should insert a new digest', async () => {
    const { versionHash, reused } = await registerVersionHash(repos, 'ds-1', tx1, H1);

    expect(reused).toBe(false);
    expect(versionHash).toMatchObject({ entityId: 'ds-1', transactionId: 1, contentHash: H1 });
  });

  it('should return the original row when the digest is registered again', async () => {
    const first = await registerVersionHash(repos, 'ds-1', tx1, H1);
    const second = await registerVersionHash(repos, 'ds-1', tx2, H1);

    expect(second.reused).toBe(true);
    expect(second.versionHash).toEqual(first.versionHash);
    expect(await repos.versionHashes.listForEntity('ds-1')).toHaveLength(1);
  });

  it('should refuse a digest owned by another entity', async () => {
    await registerVersionHash(repos, 'ds-1', tx1, H1);

    await expect(registerVersionHash(repos, 'ds-2', tx2, H1)).rejects.toMatchObject({
      code: 'ALREADY_EXISTS',
      resource: 'version_hash',
    });
  });

  it('should resolve a registered digest', async () => {
    await registerVersionHash(repos, 'ds-1', tx1, H1);

    await expect(resolveVersionHash(repos, H1)).resolves.toMatchObject({ entityId: 'ds-1' });
  });

  it('should report unknown and malformed digests', async () => {
    await expect(resolveVersionHash(repos, H2)).rejects.toMatchObject({ code: 'NOT_FOUND' });
    await expect(resolveVersionHash(repos, 'ABC')).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
    });
  });
});
