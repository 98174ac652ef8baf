/**
 * Structured Logger
 *
 * JSON-line logging with levels, a module name per logger and bound
 * metadata carried by child loggers (asset class, run id, symbol).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  module: string;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVEL_PRIORITY;
}

/**
 * Resolve the active level from the environment on every call so that
 * LOG_LEVEL changes made after import still apply.
 */
export function resolveLogLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(configured)) return configured;
  return process.env.NODE_ENV === 'test' ? 'error' : 'info';
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[resolveLogLevel()];
}

function formatEntry(level: LogLevel, module: string, message: string, meta: LogMeta): LogEntry {
  return {
    ...meta,
    level,
    module,
    message,
    timestamp: new Date().toISOString(),
  };
}

function emit(entry: LogEntry): void {
  const output = JSON.stringify(entry);
  switch (entry.level) {
    case 'error':
      console.error(output);
      break;
    case 'warn':
      console.warn(output);
      break;
    default:
      console.log(output);
      break;
  }
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(subModule: string, meta?: LogMeta): Logger;
}

/**
 * Create a logger for a specific module. `boundMeta` is merged into every
 * entry; per-call metadata wins on key collisions.
 */
export function createLogger(module: string, boundMeta: LogMeta = {}): Logger {
  const log = (level: LogLevel, message: string, meta?: LogMeta): void => {
    if (!shouldLog(level)) return;
    emit(formatEntry(level, module, message, { ...boundMeta, ...meta }));
  };

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
    child(subModule: string, meta: LogMeta = {}): Logger {
      return createLogger(`${module}:${subModule}`, { ...boundMeta, ...meta });
    },
  };
}

/**
 * Serialize an error for structured logging
 */
export function serializeError(error: unknown): LogMeta {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
      stack: error.stack?.split('\n').slice(0, 5).join('\n'),
    };
  }
  return { errorMessage: String(error) };
}
