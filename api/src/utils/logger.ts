/**
 * Structured Logger
 *
 * JSON lines on stdout/stderr with levels: debug, info, warn, error
 *
 * - Threshold comes from LOG_LEVEL, else `info` in production and `debug` elsewhere
 * - Every entry carries `level`, `msg`, `ts` plus the caller's context fields
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

function getMinLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[getMinLevel()];
}

export function formatEntry(level: LogLevel, message: string, context?: LogContext): string {
  const entry: Record<string, unknown> = {
    level,
    msg: message,
    ts: new Date().toISOString(),
  };
  if (context) {
    Object.assign(entry, context);
  }
  return JSON.stringify(entry);
}

export const logger = {
  debug(message: string, context?: LogContext) {
    if (!shouldLog('debug')) return;
    console.debug(formatEntry('debug', message, context));
  },

  info(message: string, context?: LogContext) {
    if (!shouldLog('info')) return;
    console.info(formatEntry('info', message, context));
  },

  warn(message: string, context?: LogContext) {
    if (!shouldLog('warn')) return;
    console.warn(formatEntry('warn', message, context));
  },

  error(message: string, context?: LogContext) {
    if (!shouldLog('error')) return;
    console.error(formatEntry('error', message, context));
  },
};
