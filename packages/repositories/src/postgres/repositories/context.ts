import type { Database } from '../db.js';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
} from '../../interfaces/index.js';
import { withPgErrors } from '../errors.js';
import { PgTransactionRepository } from './transaction-repository.js';
import { PgEntityRepository } from './entity-repository.js';
import { PgShadowHistoryRepository } from './shadow-history-repository.js';
import { PgVersionHashRepository } from './version-hash-repository.js';
import { PgVersionTagRepository } from './version-tag-repository.js';

/**
 * Create a RepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const repos = createPgRepositoryContext(db);
 *
 * const entity = await repos.entities.get(entityId);
 * ```
 */
export function createPgRepositoryContext(db: Database): RepositoryContext {
  return {
    transactions: new PgTransactionRepository(db),
    entities: new PgEntityRepository(db),
    shadows: new PgShadowHistoryRepository(db),
    versionHashes: new PgVersionHashRepository(db),
    versionTags: new PgVersionTagRepository(db),
  };
}

/**
 * Create a TransactionalRepositoryContext backed by Postgres.
 *
 * This extends the basic RepositoryContext with transaction support,
 * allowing multiple operations to be executed atomically.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const repos = createTransactionalPgRepositoryContext(db);
 *
 * // Execute multiple operations atomically
 * const versionHash = await repos.transaction(async (txRepos) => {
 *   const transaction = await txRepos.transactions.begin({ actorId, originAddress: null });
 *   return txRepos.versionHashes.insert({ entityId, transactionId: transaction.id, contentHash });
 * });
 * ```
 */
export function createTransactionalPgRepositoryContext(
  db: Database
): TransactionalRepositoryContext {
  return new TransactionalPgRepositoryContext(db);
}

/**
 * TransactionalRepositoryContext implementation for Postgres.
 *
 * Provides all repository interfaces plus a transaction() method
 * for executing atomic operations.
 */
class TransactionalPgRepositoryContext implements TransactionalRepositoryContext {
  readonly transactions: PgTransactionRepository;
  readonly entities: PgEntityRepository;
  readonly shadows: PgShadowHistoryRepository;
  readonly versionHashes: PgVersionHashRepository;
  readonly versionTags: PgVersionTagRepository;

  constructor(private db: Database) {
    this.transactions = new PgTransactionRepository(db);
    this.entities = new PgEntityRepository(db);
    this.shadows = new PgShadowHistoryRepository(db);
    this.versionHashes = new PgVersionHashRepository(db);
    this.versionTags = new PgVersionTagRepository(db);
  }

  /**
   * Execute a function within a serializable database transaction.
   *
   * - If the function returns successfully, all changes are committed
   * - If the function throws, all changes are rolled back
   *
   * Driver errors raised by the function or by the commit are translated to
   * storage errors, so a serialization failure surfaces as
   * StorageConflictError whether it hit a statement or the commit.
   */
  async transaction<T>(fn: TransactionFn<T>): Promise<T> {
    return withPgErrors(() =>
      this.db.transaction(
        async (tx) => {
          // Cast tx to Database since Drizzle's transaction type is compatible
          const txDb = tx as unknown as Database;
          return fn(createPgRepositoryContext(txDb));
        },
        { isolationLevel: 'serializable' }
      )
    );
  }
}
