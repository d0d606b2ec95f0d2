// Bootstrap
//
// Wires a Postgres-backed VersionStore from configuration.

import { postgres } from '@strata/repositories';
import type { EntityTypeRegistry } from '@strata/protocol';
import type { StrataConfig } from './config.js';
import { loadConfig } from './config.js';
import type { Logger } from './logging.js';
import { createConsoleLogger } from './logging.js';
import { VersionStore } from './versioning/index.js';

export type PgVersionStore = {
  store: VersionStore;
  logger: Logger;

  /**
   * Close the connection pool
   */
  close(): Promise<void>;
};

export function createPgVersionStore(
  config: StrataConfig = loadConfig(),
  options: { registry?: EntityTypeRegistry; logger?: Logger } = {}
): PgVersionStore {
  const logger = options.logger ?? createConsoleLogger(config.logLevel);
  const { db, client } = postgres.createDatabase({
    connectionString: config.databaseUrl,
    maxConnections: config.maxConnections,
  });

  const store = new VersionStore({
    repos: postgres.createTransactionalPgRepositoryContext(db),
    registry: options.registry,
    logger,
    writeMaxAttempts: config.writeMaxAttempts,
    retryBackoffMs: config.retryBackoffMs,
  });

  logger.info('Version store ready', {
    maxConnections: config.maxConnections,
    writeMaxAttempts: config.writeMaxAttempts,
  });

  return {
    store,
    logger,
    async close() {
      await client.end();
    },
  };
}
