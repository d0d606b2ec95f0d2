import type { Id, TagEvent, TransactionId, VersionTag } from '@strata/protocol';

/**
 * Input for binding a tag
 */
export type CreateVersionTagInput = {
  versionHashId: Id;
  tagName: string;
};

/**
 * Input for recording a tag change
 */
export type AppendTagEventInput = {
  tagName: string;
  fromVersionHashId: Id | null;
  toVersionHashId: Id | null;
  transactionId: TransactionId;
};

/**
 * Repository interface for version tags.
 *
 * A tag name is bound to one version hash at a time; inserting a name that
 * is already bound fails with UniqueViolationError.
 */
export interface VersionTagRepository {
  findByName(tagName: string): Promise<VersionTag | null>;

  insert(input: CreateVersionTagInput): Promise<VersionTag>;

  /**
   * Point an existing tag at another version hash
   * @returns Updated tag or null if the name is not bound
   */
  move(tagName: string, versionHashId: Id): Promise<VersionTag | null>;

  /**
   * Tags bound to a version hash, by name
   */
  listForHash(versionHashId: Id): Promise<VersionTag[]>;

  /**
   * Remove every tag bound to the given version hashes
   * @returns The removed tags
   */
  deleteForHashes(versionHashIds: Id[]): Promise<VersionTag[]>;

  appendEvent(input: AppendTagEventInput): Promise<TagEvent>;

  /**
   * Change history of a tag name, oldest first
   */
  listEvents(tagName: string): Promise<TagEvent[]>;
}
