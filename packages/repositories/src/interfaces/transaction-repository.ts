import type { Id, Transaction, TransactionId } from '@strata/protocol';

/**
 * Input for opening a transaction
 */
export type BeginTransactionInput = {
  actorId: Id | null;
  originAddress: string | null;
  message?: string | null;
};

/**
 * Repository interface for the transaction log.
 *
 * `begin` must only be called inside a store transaction: the allocated row
 * commits or rolls back together with everything else the transaction did.
 */
export interface TransactionRepository {
  /**
   * Allocate the next transaction id and record who issued it.
   * Ids are strictly increasing in commit order.
   */
  begin(input: BeginTransactionInput): Promise<Transaction>;

  /**
   * Get a transaction by id
   * @returns Transaction or null if not found
   */
  get(id: TransactionId): Promise<Transaction | null>;

  /**
   * Highest committed transaction id, or null when none exist
   */
  latestId(): Promise<TransactionId | null>;
}
