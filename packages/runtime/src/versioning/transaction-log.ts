// Transaction Log
//
// Opens the transaction every mutation is recorded against. The id is
// allocated inside the store transaction, so commit and rollback of the
// store transaction are commit and abort of the log entry.

import type { ActorContext, Transaction, TransactionId } from '@strata/protocol';
import type { RepositoryContext } from '@strata/repositories';
import {
  ConcurrencyConflictError,
  NotFoundError,
  ServiceUnavailableError,
  ValidationError,
  isConflict,
} from '../errors.js';

function validateActor(actor: ActorContext): void {
  if (actor.actorId !== null && actor.actorId.trim().length === 0) {
    throw new ValidationError('actorId must be null or a non-empty string', { field: 'actorId' });
  }
}

function validateMessage(message: string | undefined): void {
  if (message !== undefined && message.trim().length === 0) {
    throw new ValidationError('message must not be blank', { field: 'message' });
  }
}

/**
 * Allocate and record a new transaction, with an optional commit message.
 *
 * @throws ConcurrencyConflictError if the allocated id does not follow the
 * latest committed one
 * @throws ServiceUnavailableError if no id could be allocated
 */
export async function openTransaction(
  repos: RepositoryContext,
  actor: ActorContext,
  message?: string
): Promise<Transaction> {
  validateActor(actor);
  validateMessage(message);

  const latest = await repos.transactions.latestId();

  let transaction: Transaction;
  try {
    transaction = await repos.transactions.begin({
      actorId: actor.actorId,
      originAddress: actor.originAddress ?? null,
      message: message ?? null,
    });
  } catch (error) {
    if (isConflict(error)) throw error;
    throw new ServiceUnavailableError('Could not allocate a transaction id', { cause: error });
  }

  if (latest !== null && transaction.id <= latest) {
    throw new ConcurrencyConflictError(
      `Transaction id ${transaction.id} does not follow latest id ${latest}`
    );
  }

  return transaction;
}

export async function getTransaction(
  repos: RepositoryContext,
  id: TransactionId
): Promise<Transaction> {
  const transaction = await repos.transactions.get(id);
  if (!transaction) throw new NotFoundError('transaction', String(id));
  return transaction;
}
