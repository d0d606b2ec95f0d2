import type { EntityKind } from '@strata/protocol';

/**
 * Name of the shadow history table for each entity kind.
 */
export const SHADOW_TABLE_NAMES = {
  dataset: 'datasets_version',
  trained_model: 'trained_models_version',
  task: 'tasks_version',
} as const satisfies Record<EntityKind, string>;

/**
 * Name of the live subtype table for each entity kind.
 */
export const SUBTYPE_TABLE_NAMES = {
  dataset: 'datasets',
  trained_model: 'trained_models',
  task: 'tasks',
} as const satisfies Record<EntityKind, string>;

export const CONSTRAINTS = {
  entityPrimaryKey: 'entities_pkey',
  contentHash: 'version_hashes_content_hash_idx',
  tagName: 'version_tags_name_idx',
  hashTag: 'version_tags_hash_name_idx',
  shadowPrimaryKey: (kind: EntityKind) => `${SHADOW_TABLE_NAMES[kind]}_pkey`,
  shadowOpen: (kind: EntityKind) => `${SHADOW_TABLE_NAMES[kind]}_open_idx`,
} as const;
