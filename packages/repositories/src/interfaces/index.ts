// Repository interfaces
// These define the contracts for data access, enabling substrate independence.

export type {
  TransactionRepository,
  BeginTransactionInput,
} from './transaction-repository.js';

export type {
  EntityRepository,
  CreateEntityInput,
} from './entity-repository.js';

export type { ShadowHistoryRepository } from './shadow-history-repository.js';

export type {
  VersionHashRepository,
  CreateVersionHashInput,
} from './version-hash-repository.js';

export type {
  VersionTagRepository,
  CreateVersionTagInput,
  AppendTagEventInput,
} from './version-tag-repository.js';

export type {
  RepositoryContext,
  RepositoryContextFactory,
  TransactionFn,
  TransactionalRepositoryContext,
} from './repository-context.js';
