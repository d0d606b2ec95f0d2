import type { ContentHash, Id, TransactionId, VersionHash } from '@strata/protocol';

/**
 * Input for registering a content hash
 */
export type CreateVersionHashInput = {
  entityId: Id;
  transactionId: TransactionId;
  contentHash: ContentHash;
};

/**
 * Repository interface for the version hash registry.
 *
 * Content hashes are globally unique; inserting a digest that already
 * exists fails with UniqueViolationError.
 */
export interface VersionHashRepository {
  insert(input: CreateVersionHashInput): Promise<VersionHash>;

  /**
   * Get a version hash by row ID
   */
  get(id: Id): Promise<VersionHash | null>;

  findByHash(contentHash: ContentHash): Promise<VersionHash | null>;

  /**
   * Version hashes of an entity ordered by transaction id ascending
   */
  listForEntity(entityId: Id): Promise<VersionHash[]>;

  /**
   * Remove every version hash of an entity
   * @returns The removed rows
   */
  deleteForEntity(entityId: Id): Promise<VersionHash[]>;
}
