// Configuration
//
// Read from environment variables and validated with zod. Every key has a
// default suitable for local development.

import { z } from 'zod';
import type { LogLevel } from './logging.js';
import { ValidationError } from './errors.js';

const envSchema = z.object({
  DATABASE_URL: z.string().url().default('postgres://localhost:5432/strata'),
  STRATA_DB_MAX_CONNECTIONS: z.coerce.number().int().min(1).max(100).default(10),
  STRATA_WRITE_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  STRATA_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).max(10_000).default(10),
  STRATA_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type StrataConfig = {
  databaseUrl: string;
  maxConnections: number;

  /**
   * Attempts per write before a conflict is reported
   */
  writeMaxAttempts: number;

  /**
   * Delay before the n-th retry is n times this value
   */
  retryBackoffMs: number;

  logLevel: LogLevel;
};

/**
 * Load configuration from the environment.
 *
 * @throws ValidationError listing every invalid key
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): StrataConfig {
  // Empty strings count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))];
    throw new ValidationError(`Invalid configuration: ${keys.join(', ')}`, {
      details: {
        issues: parsed.error.issues.map((issue) => ({
          key: issue.path.join('.'),
          message: issue.message,
        })),
      },
    });
  }

  const data = parsed.data;
  return {
    databaseUrl: data.DATABASE_URL,
    maxConnections: data.STRATA_DB_MAX_CONNECTIONS,
    writeMaxAttempts: data.STRATA_WRITE_MAX_ATTEMPTS,
    retryBackoffMs: data.STRATA_RETRY_BACKOFF_MS,
    logLevel: data.STRATA_LOG_LEVEL,
  };
}
