// @strata/repositories
// Repository interfaces and implementations for storage-independent data access.
//
// This package defines the "contract" for data operations. The actual implementations
// (Postgres, in-memory) fulfill these contracts, allowing the versioning core
// to work with any storage backend.
//
// Key concepts:
// - Interfaces define WHAT operations are available, not HOW they're implemented
// - RepositoryContext bundles all repositories for dependency injection
// - Storage errors are backend-neutral; the Postgres layer translates driver errors

export * from './interfaces/index.js';
export * from './errors.js';
export { SHADOW_TABLE_NAMES, SUBTYPE_TABLE_NAMES, CONSTRAINTS } from './shadow-tables.js';
export { createInMemoryRepositoryContext } from './in-memory/index.js';
export type { InMemoryDataStore, InMemoryRepositoryContext } from './in-memory/index.js';
export * as postgres from './postgres/index.js';
