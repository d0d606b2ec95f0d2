// Entity types - versioned catalog objects

import type { ContentHash, Id, JsonObject, Timestamp } from './common.js';

/**
 * The catalog's entity kinds. Each kind has its own live subtype table and
 * its own shadow history table.
 */
export const ENTITY_KINDS = ['dataset', 'trained_model', 'task'] as const;

export type EntityKind = (typeof ENTITY_KINDS)[number];

export function isEntityKind(value: unknown): value is EntityKind {
  return ENTITY_KINDS.some((kind) => kind === value);
}

/**
 * The live state of an entity.
 *
 * `attributes` is the complete versioned attribute record for the entity's
 * kind. `name` and `isPrivate` mirror the attributes of the same name so they
 * can be indexed.
 */
export type Entity = {
  id: Id;
  kind: EntityKind;
  name: string;
  isPrivate: boolean;
  attributes: JsonObject;

  /**
   * Cached digest of the live state. Derived from shadow history on every
   * write, never authoritative on its own.
   */
  currentVersionHash: ContentHash | null;

  createdAt: Timestamp;
  updatedAt: Timestamp;
};
