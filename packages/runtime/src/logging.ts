// Structured logging for the versioning core

/**
 * Logger injected into the store. `data` carries entity and transaction
 * context for each entry.
 */
export type Logger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 50,
};

type EntryLevel = Exclude<LogLevel, 'silent'>;

type Emit = (level: EntryLevel, message: string, data?: Record<string, unknown>) => void;

/**
 * Build a Logger that hands every entry to `emit`
 */
function leveledLogger(emit: Emit): Logger {
  return {
    debug: (message, data) => emit('debug', message, data),
    info: (message, data) => emit('info', message, data),
    warn: (message, data) => emit('warn', message, data),
    error: (message, data) => emit('error', message, data),
  };
}

export const silentLogger: Logger = leveledLogger(() => {});

/**
 * Console logger that drops entries below `level`. Entries are prefixed
 * with their level, e.g. `[WARN] Hash index reconciled`.
 */
export function createConsoleLogger(level: LogLevel = 'info'): Logger {
  if (level === 'silent') return silentLogger;

  const threshold = LEVEL_ORDER[level];
  return leveledLogger((entryLevel, message, data) => {
    if (LEVEL_ORDER[entryLevel] < threshold) return;
    console[entryLevel](`[${entryLevel.toUpperCase()}] ${message}`, data ?? '');
  });
}

export const consoleLogger: Logger = createConsoleLogger('debug');

export type LogEntry = {
  level: EntryLevel;
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
};

/**
 * Logger that keeps its entries in memory, for tests
 */
export function createCapturingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = leveledLogger((level, message, data) => {
    entries.push({ level, message, data, timestamp: new Date().toISOString() });
  });
  return { ...logger, entries };
}
