import { pgTable, serial, text, timestamp, index } from 'drizzle-orm/pg-core';

/**
 * Transactions table - one row per committed write.
 *
 * Ids come from a sequence and are allocated while holding a
 * transaction-scoped advisory lock, so they increase in commit order.
 */
export const transactions = pgTable(
  'transactions',
  {
    id: serial('id').primaryKey(),
    issuedAt: timestamp('issued_at', { withTimezone: true }).notNull().defaultNow(),
    actorId: text('actor_id'),
    originAddress: text('origin_address'),
    message: text('message'),
  },
  (table) => [index('transactions_actor_idx').on(table.actorId)]
);
