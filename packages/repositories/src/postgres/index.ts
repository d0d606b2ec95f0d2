// Postgres implementation of the repository interfaces (drizzle-orm + postgres.js)
export { createDatabase } from './db.js';
export type { Database, DatabaseConfig } from './db.js';
export { translatePgError, withPgErrors } from './errors.js';
export * from './repositories/index.js';
export * as schema from './schema/index.js';
