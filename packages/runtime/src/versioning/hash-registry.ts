// Version Hash Registry
//
// Maps each digest to the entity and transaction that first produced it.
// Writing content that was seen before returns the original row.

import type { ContentHash, Id, Transaction, VersionHash } from '@strata/protocol';
import { isContentHash } from '@strata/protocol';
import type { RepositoryContext } from '@strata/repositories';
import { AlreadyExistsError, NotFoundError, ValidationError } from '../errors.js';

export type RegisteredHash = {
  versionHash: VersionHash;
  reused: boolean;
};

export function assertContentHash(value: string): ContentHash {
  if (!isContentHash(value)) {
    throw new ValidationError('Content hash must be 64 lowercase hex characters', {
      field: 'contentHash',
      details: { value },
    });
  }
  return value;
}

/**
 * Register a digest for an entity, reusing the existing row when the same
 * content was registered before.
 *
 * @throws AlreadyExistsError if the digest belongs to another entity
 */
export async function registerVersionHash(
  repos: RepositoryContext,
  entityId: Id,
  transaction: Transaction,
  contentHash: ContentHash
): Promise<RegisteredHash> {
  const existing = await repos.versionHashes.findByHash(contentHash);
  if (existing) {
    if (existing.entityId !== entityId) {
      throw new AlreadyExistsError(
        'version_hash',
        contentHash,
        `Content hash ${contentHash} is registered to entity ${existing.entityId}`
      );
    }
    return { versionHash: existing, reused: true };
  }

  const versionHash = await repos.versionHashes.insert({
    entityId,
    transactionId: transaction.id,
    contentHash,
  });
  return { versionHash, reused: false };
}

/**
 * @throws NotFoundError if the digest is not registered
 */
export async function resolveVersionHash(
  repos: RepositoryContext,
  contentHash: string
): Promise<VersionHash> {
  const versionHash = await repos.versionHashes.findByHash(assertContentHash(contentHash));
  if (!versionHash) throw new NotFoundError('version_hash', contentHash);
  return versionHash;
}
