import { eq, max, sql } from 'drizzle-orm';
import type { Database } from '../db.js';
import { transactions } from '../schema/index.js';
import type { BeginTransactionInput, TransactionRepository } from '../../interfaces/index.js';
import type { Transaction, TransactionId } from '@strata/protocol';

/**
 * Advisory lock key serializing id allocation. Held until the surrounding
 * transaction ends, so sequence values are handed out in commit order.
 */
export const TRANSACTION_LOCK_KEY = 0x5354_5241;

export class PgTransactionRepository implements TransactionRepository {
  constructor(private db: Database) {}

  async begin(input: BeginTransactionInput): Promise<Transaction> {
    await this.db.execute(sql`select pg_advisory_xact_lock(${TRANSACTION_LOCK_KEY})`);

    const [row] = await this.db
      .insert(transactions)
      .values({
        actorId: input.actorId,
        originAddress: input.originAddress,
        message: input.message ?? null,
        issuedAt: new Date(),
      })
      .returning();

    return this.rowToTransaction(row);
  }

  async get(id: TransactionId): Promise<Transaction | null> {
    const [row] = await this.db.select().from(transactions).where(eq(transactions.id, id));
    return row ? this.rowToTransaction(row) : null;
  }

  async latestId(): Promise<TransactionId | null> {
    const [row] = await this.db.select({ id: max(transactions.id) }).from(transactions);
    return row?.id ?? null;
  }

  private rowToTransaction(row: typeof transactions.$inferSelect): Transaction {
    return {
      id: row.id,
      issuedAt: row.issuedAt.toISOString(),
      actorId: row.actorId,
      originAddress: row.originAddress,
      message: row.message,
    };
  }
}
