import type { TransactionRepository } from './transaction-repository.js';
import type { EntityRepository } from './entity-repository.js';
import type { ShadowHistoryRepository } from './shadow-history-repository.js';
import type { VersionHashRepository } from './version-hash-repository.js';
import type { VersionTagRepository } from './version-tag-repository.js';

/**
 * RepositoryContext bundles all repository interfaces together.
 *
 * This is the primary dependency injection point for the versioning core.
 * Pass a RepositoryContext to any code that needs data access, and you can
 * swap implementations (Postgres, in-memory) without changing the consuming
 * code.
 *
 * Example usage:
 * ```typescript
 * const repos = createPgRepositoryContext(db);
 * const entity = await repos.entities.get(entityId);
 * ```
 */
export interface RepositoryContext {
  readonly transactions: TransactionRepository;
  readonly entities: EntityRepository;
  readonly shadows: ShadowHistoryRepository;
  readonly versionHashes: VersionHashRepository;
  readonly versionTags: VersionTagRepository;
}

/**
 * Factory type for creating a RepositoryContext.
 * Implementations can use this to provide their own initialization logic.
 */
export type RepositoryContextFactory<TConfig = unknown> = (
  config: TConfig
) => RepositoryContext | Promise<RepositoryContext>;

/**
 * Transaction wrapper type for atomic operations across repositories.
 */
export type TransactionFn<T> = (repos: RepositoryContext) => Promise<T>;

/**
 * Extended context with transaction support.
 */
export interface TransactionalRepositoryContext extends RepositoryContext {
  /**
   * Execute a function within a store transaction at serializable
   * isolation. All repository operations within the function are atomic and
   * no other transaction observes them before commit.
   *
   * @throws StorageConflictError when the store aborts the transaction
   * because of a concurrent one; rolls back and rethrows if `fn` throws
   */
  transaction<T>(fn: TransactionFn<T>): Promise<T>;
}
