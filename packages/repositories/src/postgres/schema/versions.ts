import { pgTable, text, timestamp, integer, uniqueIndex, index } from 'drizzle-orm/pg-core';
import { CONSTRAINTS } from '../../shadow-tables.js';
import { transactions } from './transactions.js';

/**
 * Version hashes table - content digest to (entity, transaction).
 *
 * A digest is registered once, by the first write that produced it.
 */
export const versionHashes = pgTable(
  'version_hashes',
  {
    id: text('id').primaryKey(),
    entityId: text('entity_id').notNull(),
    transactionId: integer('transaction_id')
      .notNull()
      .references(() => transactions.id),
    contentHash: text('content_hash').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex(CONSTRAINTS.contentHash).on(table.contentHash),
    index('version_hashes_entity_idx').on(table.entityId, table.transactionId),
  ]
);

/**
 * Version tags table - a name bound to one version hash at a time.
 */
export const versionTags = pgTable(
  'version_tags',
  {
    id: text('id').primaryKey(),
    versionHashId: text('version_hash_id')
      .notNull()
      .references(() => versionHashes.id, { onDelete: 'cascade' }),
    tagName: text('tag_name').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex(CONSTRAINTS.tagName).on(table.tagName),
    uniqueIndex(CONSTRAINTS.hashTag).on(table.versionHashId, table.tagName),
  ]
);

/**
 * Tag events table - append-only log of tag changes.
 *
 * Hash ids are kept as plain values so the log survives the hashes it
 * refers to.
 */
export const tagEvents = pgTable(
  'tag_events',
  {
    id: text('id').primaryKey(),
    tagName: text('tag_name').notNull(),
    fromVersionHashId: text('from_version_hash_id'),
    toVersionHashId: text('to_version_hash_id'),
    transactionId: integer('transaction_id')
      .notNull()
      .references(() => transactions.id),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('tag_events_name_idx').on(table.tagName, table.transactionId)]
);
