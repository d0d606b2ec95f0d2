import { pgTable, text, timestamp, jsonb, boolean, index } from 'drizzle-orm/pg-core';
import { ENTITY_KINDS } from '@strata/protocol';
import type { JsonObject } from '@strata/protocol';
import { SUBTYPE_TABLE_NAMES } from '../../shadow-tables.js';

/**
 * Entities table - the live base row of every catalog entity.
 *
 * `name` and `is_private` are mirrored from the attributes so they can be
 * indexed. `current_version_hash` caches the digest of the live state.
 */
export const entities = pgTable(
  'entities',
  {
    id: text('id').primaryKey(),
    kind: text('kind', { enum: ENTITY_KINDS }).notNull(),
    name: text('name').notNull(),
    isPrivate: boolean('is_private').notNull().default(false),
    currentVersionHash: text('current_version_hash'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('entities_kind_idx').on(table.kind),
    index('entities_name_idx').on(table.name),
  ]
);

/**
 * Subtype tables hold the kind-specific payload, 1:1 with the base row.
 */
function createSubtypeTable(name: string) {
  return pgTable(name, {
    id: text('id')
      .primaryKey()
      .references(() => entities.id, { onDelete: 'cascade' }),
    attributes: jsonb('attributes').$type<JsonObject>().notNull(),
  });
}

export const datasets = createSubtypeTable(SUBTYPE_TABLE_NAMES.dataset);
export const trainedModels = createSubtypeTable(SUBTYPE_TABLE_NAMES.trained_model);
export const tasks = createSubtypeTable(SUBTYPE_TABLE_NAMES.task);
