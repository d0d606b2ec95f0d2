// Shadow History
//
// Append-only per-kind history. Appending closes the open record at the new
// transaction and inserts the next one, so an entity's records always tile
// transaction time: [t0, t1), [t1, t2), ..., [tn, open).

import type {
  EntityKind,
  Id,
  JsonObject,
  OperationKind,
  ShadowRecord,
  Transaction,
} from '@strata/protocol';
import type { RepositoryContext } from '@strata/repositories';
import { AlreadyExistsError, ConcurrencyConflictError, NotFoundError } from '../errors.js';
import type { ShadowRangeViolation } from './types.js';

export type AppendShadowInput = {
  kind: EntityKind;
  entityId: Id;
  transaction: Transaction;
  operation: OperationKind;
  schemaRevision: number;
  attributes: JsonObject;
};

/**
 * Append a record to an entity's history.
 *
 * Inserts need an id with no history at all, including deleted entities.
 * Updates and deletes need an open record older than the transaction.
 * Delete records are zero-width tombstones and leave nothing open.
 */
export async function appendShadowRecord(
  repos: RepositoryContext,
  input: AppendShadowInput
): Promise<ShadowRecord> {
  const { kind, entityId, transaction, operation } = input;
  const existingKind = await repos.shadows.locate(entityId);

  if (operation === 'insert') {
    if (existingKind !== null) {
      throw new AlreadyExistsError('entity', entityId);
    }
  } else {
    if (existingKind !== kind) {
      throw new NotFoundError('entity', entityId);
    }
    const open = await repos.shadows.findOpen(kind, entityId);
    if (!open) {
      throw new NotFoundError('entity', entityId);
    }
    if (open.transactionId >= transaction.id) {
      throw new ConcurrencyConflictError(
        `Open version of ${entityId} starts at transaction ${open.transactionId}, not before ${transaction.id}`
      );
    }
    await repos.shadows.close(kind, entityId, transaction.id);
  }

  return repos.shadows.insert({
    entityId,
    kind,
    transactionId: transaction.id,
    endTransactionId: operation === 'delete' ? transaction.id : null,
    operation,
    schemaRevision: input.schemaRevision,
    attributes: input.attributes,
  });
}

/**
 * Check that one entity's records tile transaction time.
 * Returns an empty list for a well-formed history.
 */
export function checkShadowRanges(records: ShadowRecord[]): ShadowRangeViolation[] {
  const sorted = [...records].sort((a, b) => a.transactionId - b.transactionId);
  const violations: ShadowRangeViolation[] = [];
  const report = (
    kind: ShadowRangeViolation['kind'],
    record: ShadowRecord,
    message: string
  ) => violations.push({ kind, transactionId: record.transactionId, message });

  sorted.forEach((record, index) => {
    const isLast = index === sorted.length - 1;
    const end = record.endTransactionId;

    if (index === 0 && record.operation !== 'insert') {
      report('missing_insert', record, 'History does not start with an insert');
    }
    if (index > 0 && record.operation === 'insert') {
      report('unexpected_insert', record, 'Insert after the first record');
    }

    if (record.operation === 'delete') {
      if (end !== record.transactionId) {
        report('malformed_tombstone', record, 'Delete record is not zero-width');
      }
      if (!isLast) {
        report('after_delete', record, 'Records follow a delete');
      }
      return;
    }

    if (end !== null && end <= record.transactionId) {
      report('inverted_range', record, `Range ends at ${end}, not after its start`);
    }

    if (isLast) {
      if (end !== null) {
        report('closed_tail', record, `Latest record is closed at ${end} without a delete`);
      }
      return;
    }

    const next = sorted[index + 1];
    if (end === null || end > next.transactionId) {
      report('overlap', record, `Range overlaps the record starting at ${next.transactionId}`);
    } else if (end < next.transactionId) {
      report('gap', record, `Range ends at ${end}, next record starts at ${next.transactionId}`);
    }
  });

  return violations;
}
