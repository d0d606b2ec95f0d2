// Transaction types - the ordering backbone of entity history

import type { Id, Timestamp, TransactionId } from './common.js';

/**
 * A Transaction is an atomic unit of change.
 *
 * Every mutation of a versioned entity belongs to exactly one transaction,
 * and one transaction may span several entity mutations. Transactions are
 * immutable once committed.
 */
export type Transaction = {
  id: TransactionId;
  issuedAt: Timestamp;

  /**
   * Who issued the transaction (supplied by the auth layer, null for system work)
   */
  actorId: Id | null;

  /**
   * Network address the request came from, when known
   */
  originAddress: string | null;

  /**
   * Commit message describing the change, when the caller gave one
   */
  message: string | null;
};

/**
 * Identity stamped onto every transaction a caller opens.
 */
export type ActorContext = {
  actorId: Id | null;
  originAddress?: string | null;
};
