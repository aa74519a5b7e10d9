import { createRuntimeError, RuntimeErrorCode } from './errors/index.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFields = Record<string, unknown>;

/**
 * Structured logger contract shared by every package.
 *
 * The first argument is either a human readable line or a dotted event name
 * (e.g. `providers.client.retry`) followed by structured fields.
 */
export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LOG_LEVELS = Object.keys(LEVEL_ORDER);

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.includes(value);
}

export function resolveLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  if (value === undefined || value === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (!isLogLevel(normalized)) {
    throw createRuntimeError(
      RuntimeErrorCode.INVALID_LOG_LEVEL,
      `Invalid log level "${value}". Expected one of: ${LOG_LEVELS.join(', ')}.`,
      { suggestion: 'Set VIDBRIDGE_LOG_LEVEL to debug, info, warn, error or silent.' },
    );
  }
  return normalized;
}

type ConsoleSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * Logger that writes to `globalThis.console`, dropping entries below `level`.
 */
export function createConsoleLogger(level: LogLevel = 'info', sink: ConsoleSink = globalThis.console): Logger {
  const threshold = LEVEL_ORDER[level];

  function emit(entryLevel: Exclude<LogLevel, 'silent'>, message: string, fields?: LogFields): void {
    if (LEVEL_ORDER[entryLevel] < threshold) {
      return;
    }
    if (fields && Object.keys(fields).length > 0) {
      sink[entryLevel](message, fields);
    } else {
      sink[entryLevel](message);
    }
  }

  return {
    debug: (message, fields) => emit('debug', message, fields),
    info: (message, fields) => emit('info', message, fields),
    warn: (message, fields) => emit('warn', message, fields),
    error: (message, fields) => emit('error', message, fields),
  };
}
