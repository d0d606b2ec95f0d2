import { sql } from 'drizzle-orm';
import { pgTable, text, integer, jsonb, primaryKey, uniqueIndex, index } from 'drizzle-orm/pg-core';
import { OPERATION_KINDS } from '@strata/protocol';
import type { JsonObject } from '@strata/protocol';
import { SHADOW_TABLE_NAMES } from '../../shadow-tables.js';
import { transactions } from './transactions.js';

/**
 * Shadow history tables - append-only, one per entity kind.
 *
 * Each row is valid over [transaction_id, end_transaction_id). The partial
 * unique index allows at most one open row per entity. Rows outlive the
 * live entity, so there is no foreign key to it.
 */
function createShadowTable(name: string) {
  return pgTable(
    name,
    {
      entityId: text('entity_id').notNull(),
      transactionId: integer('transaction_id')
        .notNull()
        .references(() => transactions.id),
      endTransactionId: integer('end_transaction_id').references(() => transactions.id),
      operation: text('operation', { enum: OPERATION_KINDS }).notNull(),
      schemaRevision: integer('schema_revision').notNull(),
      attributes: jsonb('attributes').$type<JsonObject>().notNull(),
    },
    (table) => [
      primaryKey({ name: `${name}_pkey`, columns: [table.entityId, table.transactionId] }),
      uniqueIndex(`${name}_open_idx`)
        .on(table.entityId)
        .where(sql`${table.endTransactionId} is null`),
      index(`${name}_end_idx`).on(table.entityId, table.endTransactionId),
    ]
  );
}

export const datasetsVersion = createShadowTable(SHADOW_TABLE_NAMES.dataset);
export const trainedModelsVersion = createShadowTable(SHADOW_TABLE_NAMES.trained_model);
export const tasksVersion = createShadowTable(SHADOW_TABLE_NAMES.task);
