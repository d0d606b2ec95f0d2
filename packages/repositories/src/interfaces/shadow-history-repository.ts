import type { EntityKind, Id, ShadowRecord, TransactionId } from '@strata/protocol';

/**
 * Repository interface for shadow history.
 *
 * One append-only table per entity kind. Records are never rewritten except
 * to close the open one by setting its end transaction.
 */
export interface ShadowHistoryRepository {
  /**
   * Find which kind's history holds records for an entity.
   * Works after the live row is gone.
   */
  locate(entityId: Id): Promise<EntityKind | null>;

  /**
   * The record with no end transaction, if any
   */
  findOpen(kind: EntityKind, entityId: Id): Promise<ShadowRecord | null>;

  /**
   * Close the open record at `endTransactionId`
   * @returns The closed record or null if nothing was open
   */
  close(kind: EntityKind, entityId: Id, endTransactionId: TransactionId): Promise<ShadowRecord | null>;

  /**
   * Append a record. Fails with UniqueViolationError when it would leave two
   * open records or duplicate (entityId, transactionId).
   */
  insert(record: ShadowRecord): Promise<ShadowRecord>;

  /**
   * All records for an entity ordered by transaction id ascending
   */
  list(kind: EntityKind, entityId: Id): Promise<ShadowRecord[]>;

  /**
   * The record whose [transactionId, endTransactionId) range contains
   * `transactionId`
   */
  findContaining(
    kind: EntityKind,
    entityId: Id,
    transactionId: TransactionId
  ): Promise<ShadowRecord | null>;
}
