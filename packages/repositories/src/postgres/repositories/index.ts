// Postgres repository implementations
export { PgTransactionRepository, TRANSACTION_LOCK_KEY } from './transaction-repository.js';
export { PgEntityRepository } from './entity-repository.js';
export { PgShadowHistoryRepository } from './shadow-history-repository.js';
export { PgVersionHashRepository } from './version-hash-repository.js';
export { PgVersionTagRepository } from './version-tag-repository.js';
export {
  createPgRepositoryContext,
  createTransactionalPgRepositoryContext,
} from './context.js';
