import type { ContentHash, Entity, EntityKind, Id, JsonObject } from '@strata/protocol';

/**
 * Input for creating a live entity row
 */
export type CreateEntityInput = {
  id: Id;
  kind: EntityKind;
  attributes: JsonObject;
};

/**
 * Repository interface for live entity rows.
 *
 * Holds exactly one row per existing entity: the base record plus the
 * kind-specific payload. History lives in the shadow tables; this repository
 * knows nothing about it.
 */
export interface EntityRepository {
  /**
   * Get an entity by ID
   * @returns Entity or null if not found (or deleted)
   */
  get(id: Id): Promise<Entity | null>;

  /**
   * Insert the base row and its subtype payload
   */
  create(input: CreateEntityInput): Promise<Entity>;

  /**
   * Replace the attribute payload
   * @returns Updated Entity or null if not found
   */
  update(id: Id, attributes: JsonObject): Promise<Entity | null>;

  /**
   * Set the cached current version hash
   */
  setCurrentVersionHash(id: Id, contentHash: ContentHash | null): Promise<void>;

  /**
   * Remove the live row (and its payload)
   * @returns true if a row was removed
   */
  delete(id: Id): Promise<boolean>;
}
