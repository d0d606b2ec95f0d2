// Tag Registry
//
// Human-readable names for version hashes. A name is bound to one hash at a
// time; moving it takes an explicit retag. Every change is recorded as a
// TagEvent against the transaction that made it.

import type { Id, Transaction, VersionHash, VersionTag } from '@strata/protocol';
import { validateTagName } from '@strata/protocol';
import type { RepositoryContext } from '@strata/repositories';
import { AlreadyExistsError, NotFoundError, ValidationError } from '../errors.js';
import type { ResolvedTag } from './types.js';

export function assertTagName(tagName: string): string {
  const reason = validateTagName(tagName);
  if (reason) {
    throw new ValidationError(reason, { field: 'tagName', details: { tagName } });
  }
  return tagName;
}

/**
 * Bind a new tag name to a version hash.
 *
 * @throws AlreadyExistsError if the name is bound, to this hash or another
 */
export async function createTag(
  repos: RepositoryContext,
  versionHash: VersionHash,
  tagName: string,
  transaction: Transaction
): Promise<VersionTag> {
  assertTagName(tagName);

  const existing = await repos.versionTags.findByName(tagName);
  if (existing) {
    throw new AlreadyExistsError(
      'tag',
      tagName,
      existing.versionHashId === versionHash.id
        ? `Tag "${tagName}" is already bound to this version`
        : `Tag "${tagName}" is bound to another version; use retag to move it`
    );
  }

  const tag = await repos.versionTags.insert({ versionHashId: versionHash.id, tagName });
  await repos.versionTags.appendEvent({
    tagName,
    fromVersionHashId: null,
    toVersionHashId: versionHash.id,
    transactionId: transaction.id,
  });
  return tag;
}

/**
 * Point an existing tag at another version hash.
 *
 * @returns The tag and the hash it pointed at before
 */
export async function moveTag(
  repos: RepositoryContext,
  tagName: string,
  versionHash: VersionHash,
  transaction: Transaction
): Promise<{ tag: VersionTag; previousVersionHashId: Id }> {
  assertTagName(tagName);

  const existing = await repos.versionTags.findByName(tagName);
  if (!existing) throw new NotFoundError('tag', tagName);

  if (existing.versionHashId === versionHash.id) {
    return { tag: existing, previousVersionHashId: existing.versionHashId };
  }

  const tag = await repos.versionTags.move(tagName, versionHash.id);
  if (!tag) throw new NotFoundError('tag', tagName);

  await repos.versionTags.appendEvent({
    tagName,
    fromVersionHashId: existing.versionHashId,
    toVersionHashId: versionHash.id,
    transactionId: transaction.id,
  });
  return { tag, previousVersionHashId: existing.versionHashId };
}

/**
 * Remove every tag bound to the given hashes, recording each removal.
 *
 * @returns Names of the removed tags
 */
export async function removeTagsForHashes(
  repos: RepositoryContext,
  versionHashIds: Id[],
  transaction: Transaction
): Promise<string[]> {
  const removed = await repos.versionTags.deleteForHashes(versionHashIds);
  for (const tag of removed) {
    await repos.versionTags.appendEvent({
      tagName: tag.tagName,
      fromVersionHashId: tag.versionHashId,
      toVersionHashId: null,
      transactionId: transaction.id,
    });
  }
  return removed.map((tag) => tag.tagName).sort();
}

/**
 * @throws NotFoundError if the name is not bound
 */
export async function resolveTag(repos: RepositoryContext, tagName: string): Promise<ResolvedTag> {
  assertTagName(tagName);

  const tag = await repos.versionTags.findByName(tagName);
  if (!tag) throw new NotFoundError('tag', tagName);

  const versionHash = await repos.versionHashes.get(tag.versionHashId);
  if (!versionHash) throw new NotFoundError('version_hash', tag.versionHashId);

  return { tag, versionHash };
}
