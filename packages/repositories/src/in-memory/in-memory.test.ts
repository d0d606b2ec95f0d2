// Tests for the in-memory repository context
// Verifies transaction isolation, rollback and the unique constraints the
// Postgres schema enforces.

import { describe, it, expect, beforeEach } from 'vitest';
import type { ShadowRecord } from '@strata/protocol';
import { createInMemoryRepositoryContext } from './index.js';
import type { InMemoryRepositoryContext } from './index.js';
import { UniqueViolationError } from '../errors.js';

// --- Test Fixtures ---

function shadow(overrides: Partial<ShadowRecord> = {}): ShadowRecord {
  return {
    entityId: 'ds-1',
    kind: 'dataset',
    transactionId: 1,
    endTransactionId: null,
    operation: 'insert',
    schemaRevision: 3,
    attributes: { name: 'Iris' },
    ...overrides,
  };
}

const anonymous = { actorId: null, originAddress: null };

// --- Tests ---

describe('InMemoryRepositoryContext', () => {
  let repos: InMemoryRepositoryContext;

  beforeEach(() => {
    repos = createInMemoryRepositoryContext();
  });

  describe('transaction', () => {
    it('should commit every change when the callback resolves', async () => {
      await repos.transaction(async (tx) => {
        await tx.transactions.begin(anonymous);
        await tx.entities.create({ id: 'ds-1', kind: 'dataset', attributes: { name: 'Iris' } });
        await tx.shadows.insert(shadow());
      });

      expect(repos._data.entities.size).toBe(1);
      expect(repos._data.shadows.dataset).toHaveLength(1);
      expect(await repos.transactions.latestId()).toBe(1);
    });

    it('should discard every change when the callback rejects', async () => {
      await expect(
        repos.transaction(async (tx) => {
          await tx.transactions.begin(anonymous);
          await tx.entities.create({ id: 'ds-1', kind: 'dataset', attributes: { name: 'Iris' } });
          await tx.shadows.insert(shadow());
          throw new Error('abort');
        })
      ).rejects.toThrow('abort');

      expect(repos._data.entities.size).toBe(0);
      expect(repos._data.shadows.dataset).toHaveLength(0);
      expect(repos._data.transactions.size).toBe(0);
      expect(await repos.transactions.latestId()).toBeNull();
    });

    it('should not reuse a transaction id after a rollback', async () => {
      await expect(
        repos.transaction(async (tx) => {
          await tx.transactions.begin(anonymous);
          throw new Error('abort');
        })
      ).rejects.toThrow('abort');

      const transaction = await repos.transaction((tx) => tx.transactions.begin(anonymous));

      expect(transaction.id).toBe(2);
    });

    it('should hide uncommitted changes from readers outside the transaction', async () => {
      let seenOutside: unknown = 'unset';

      await repos.transaction(async (tx) => {
        await tx.entities.create({ id: 'ds-1', kind: 'dataset', attributes: { name: 'Iris' } });
        seenOutside = await repos.entities.get('ds-1');
      });

      expect(seenOutside).toBeNull();
      expect(await repos.entities.get('ds-1')).not.toBeNull();
    });

    it('should run concurrent transactions one after another', async () => {
      const order: string[] = [];

      await Promise.all([
        repos.transaction(async (tx) => {
          order.push('a:start');
          await tx.transactions.begin(anonymous);
          await new Promise((resolve) => setTimeout(resolve, 5));
          order.push('a:end');
        }),
        repos.transaction(async (tx) => {
          order.push('b:start');
          await tx.transactions.begin(anonymous);
          order.push('b:end');
        }),
      ]);

      expect(order).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
      expect(await repos.transactions.latestId()).toBe(2);
    });

    it('should keep serving transactions after one rejects', async () => {
      const failed = repos.transaction(async () => {
        throw new Error('boom');
      });
      const next = repos.transaction((tx) => tx.transactions.begin(anonymous));

      await expect(failed).rejects.toThrow('boom');
      expect((await next).id).toBe(1);
    });
  });

  describe('entities', () => {
    it('should mirror name and isPrivate from attributes', async () => {
      const entity = await repos.entities.create({
        id: 'ds-1',
        kind: 'dataset',
        attributes: { name: 'Iris', isPrivate: true },
      });

      expect(entity.name).toBe('Iris');
      expect(entity.isPrivate).toBe(true);
      expect(entity.currentVersionHash).toBeNull();
    });

    it('should reject a duplicate id', async () => {
      await repos.entities.create({ id: 'ds-1', kind: 'dataset', attributes: {} });

      await expect(
        repos.entities.create({ id: 'ds-1', kind: 'task', attributes: {} })
      ).rejects.toBeInstanceOf(UniqueViolationError);
    });

    it('should keep stored rows apart from returned objects', async () => {
      const attributes = { name: 'Iris', format: 'csv' };
      const created = await repos.entities.create({ id: 'ds-1', kind: 'dataset', attributes });

      attributes.format = 'changed-input';
      created.attributes.format = 'changed-result';
      const read = await repos.entities.get('ds-1');
      if (read) read.attributes.format = 'changed-read';

      expect((await repos.entities.get('ds-1'))?.attributes.format).toBe('csv');
    });
  });

  describe('shadows', () => {
    it('should reject a second open record for the same entity', async () => {
      await repos.shadows.insert(shadow());

      await expect(
        repos.shadows.insert(shadow({ transactionId: 2, operation: 'update' }))
      ).rejects.toMatchObject({ constraint: 'datasets_version_open_idx' });
    });

    it('should reject a duplicate transaction for the same entity', async () => {
      await repos.shadows.insert(shadow({ endTransactionId: 2 }));

      await expect(repos.shadows.insert(shadow())).rejects.toMatchObject({
        constraint: 'datasets_version_pkey',
      });
    });

    it('should find the record whose range contains a transaction', async () => {
      await repos.shadows.insert(shadow({ endTransactionId: 3 }));
      await repos.shadows.insert(shadow({ transactionId: 3, operation: 'update' }));

      const atTwo = await repos.shadows.findContaining('dataset', 'ds-1', 2);
      const atThree = await repos.shadows.findContaining('dataset', 'ds-1', 3);

      expect(atTwo?.transactionId).toBe(1);
      expect(atThree?.transactionId).toBe(3);
    });

    it('should locate the kind holding an entity history', async () => {
      await repos.shadows.insert(shadow({ entityId: 'task-1', kind: 'task' }));

      expect(await repos.shadows.locate('task-1')).toBe('task');
      expect(await repos.shadows.locate('missing')).toBeNull();
    });

    it('should not share attributes between a record and its readers', async () => {
      const record = shadow({ attributes: { name: 'Iris' } });
      await repos.shadows.insert(record);
      await repos.entities.create({ id: 'ds-1', kind: 'dataset', attributes: record.attributes });

      const [listed] = await repos.shadows.list('dataset', 'ds-1');
      listed.attributes.name = 'changed';
      const live = await repos.entities.get('ds-1');
      if (live) live.attributes.name = 'changed';
      record.attributes.name = 'changed';

      expect((await repos.shadows.findContaining('dataset', 'ds-1', 1))?.attributes).toEqual({
        name: 'Iris',
      });
    });
  });

  describe('versionHashes and versionTags', () => {
    it('should reject a content hash that is already registered', async () => {
      const contentHash = 'a'.repeat(64);
      await repos.versionHashes.insert({ entityId: 'ds-1', transactionId: 1, contentHash });

      await expect(
        repos.versionHashes.insert({ entityId: 'ds-2', transactionId: 2, contentHash })
      ).rejects.toMatchObject({ constraint: 'version_hashes_content_hash_idx' });
    });

    it('should reject a tag name that is already bound', async () => {
      await repos.versionTags.insert({ versionHashId: 'hash-1', tagName: 'baseline' });

      await expect(
        repos.versionTags.insert({ versionHashId: 'hash-2', tagName: 'baseline' })
      ).rejects.toMatchObject({ constraint: 'version_tags_name_idx' });
    });

    it('should remove tags bound to deleted hashes', async () => {
      await repos.versionTags.insert({ versionHashId: 'hash-1', tagName: 'a' });
      await repos.versionTags.insert({ versionHashId: 'hash-2', tagName: 'b' });

      const removed = await repos.versionTags.deleteForHashes(['hash-1']);

      expect(removed.map((t) => t.tagName)).toEqual(['a']);
      expect(await repos.versionTags.findByName('a')).toBeNull();
      expect(await repos.versionTags.findByName('b')).not.toBeNull();
    });
  });

  describe('clear', () => {
    it('should drop all data and reset counters', async () => {
      await repos.transactions.begin(anonymous);
      repos.clear();

      expect(await repos.transactions.latestId()).toBeNull();
      expect((await repos.transactions.begin(anonymous)).id).toBe(1);
    });
  });
});
