// Conflict retry
//
// A write that loses a race is run again from the start, in a fresh
// transaction, a bounded number of times.

import { setTimeout as delay } from 'node:timers/promises';
import { ConcurrencyConflictError, isConflict } from './errors.js';
import type { Logger } from './logging.js';
import { silentLogger } from './logging.js';

export type RetryOptions = {
  /**
   * Total attempts including the first (default 3)
   */
  maxAttempts?: number;

  /**
   * Delay before the n-th retry is n times this value (default 10)
   */
  backoffMs?: number;

  logger?: Logger;

  /**
   * Operation name for log entries
   */
  label?: string;
};

/**
 * Run `operation`, retrying it when it fails with a conflict.
 *
 * Errors that are not conflicts are rethrown at once.
 *
 * @throws ConcurrencyConflictError once every attempt conflicted
 */
export async function withConflictRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { maxAttempts = 3, backoffMs = 10, logger = silentLogger, label = 'write' } = options;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!isConflict(error)) throw error;

      if (attempt >= maxAttempts) {
        logger.error(`${label} gave up after conflicts`, { attempts: attempt });
        throw new ConcurrencyConflictError(
          `${label} conflicted with concurrent writes ${attempt} time(s)`,
          { attempts: attempt, cause: error }
        );
      }

      logger.warn(`${label} conflicted, retrying`, {
        attempt,
        maxAttempts,
        reason: error instanceof Error ? error.message : String(error),
      });

      if (backoffMs > 0) {
        await delay(backoffMs * attempt);
      }
    }
  }
}
