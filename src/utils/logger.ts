/**
 * Logger Utility
 *
 * Levelled logging for the off-ramp guard service.
 *
 * LOG LEVELS (in order of verbosity):
 *   - DEBUG (0): tracing of individual rate-limit stages and lock operations.
 *   - INFO  (1): startup, shutdown and routine events. Default level.
 *   - WARN  (2): recoverable conditions that operators should look at
 *                (missing rate-limit policy, lock lost before release).
 *   - ERROR (3): failures that abort an operation (store unavailable).
 *
 * Set LOG_LEVEL=debug|info|warn|error to control verbosity.
 *
 * OUTPUT FORMAT:
 *   [ISO_TIMESTAMP] LEVEL [PREFIX] [REQ_ID] Message key=value key=value
 *
 *   [2026-01-15T10:30:45.123Z] WARN  [RATELIMIT] [a1b2c3d4] Unknown rate limit subject subject=kyc
 *
 * When running inside a request context (set up by the requestLogger
 * middleware) the request ID is added to every entry.
 *
 * USAGE:
 *   import { createLogger } from '../utils/logger';
 *   const log = createLogger('LOCK');
 *   log.info('Lock acquired', { key: 'lock:withdrawals:42' });
 */

import { requestContext } from './requestContext';
import { safeError } from './redact';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LOG_LEVEL_MAP: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

const getLogLevel = (): LogLevel => {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel) {
    const level = LOG_LEVEL_MAP[envLevel];
    if (level !== undefined) {
      return level;
    }
  }
  return LogLevel.INFO;
};

let currentLogLevel = getLogLevel();

// ANSI escape codes
const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

export type LogContext = Record<string, unknown>;

/**
 * Format context object as key=value pairs
 */
const formatContext = (context?: LogContext): string => {
  if (!context || Object.keys(context).length === 0) return '';

  const formatted = Object.entries(context)
    .map(([key, value]) => {
      if (value === undefined || value === null) {
        return `${key}=null`;
      }
      if (value instanceof Error) {
        return `${key}=${JSON.stringify(safeError(value))}`;
      }
      if (typeof value === 'object') {
        return `${key}=${JSON.stringify(value)}`;
      }
      return `${key}=${String(value)}`;
    })
    .join(' ');

  return ` ${colors.dim}${formatted}${colors.reset}`;
};

const write = (
  level: LogLevel,
  levelName: string,
  color: string,
  prefix: string,
  message: string,
  context?: LogContext
): void => {
  if (level < currentLogLevel) return;

  const timestamp = new Date().toISOString();
  const requestId = requestContext.get()?.requestId;
  const requestIdStr = requestId ? ` ${colors.dim}[${requestId}]${colors.reset}` : '';

  console.log(
    `${colors.gray}[${timestamp}]${colors.reset} ${color}${levelName}${colors.reset} ${colors.cyan}[${prefix}]${colors.reset}${requestIdStr} ${message}${formatContext(context)}`
  );
};

export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
}

/**
 * Create a logger instance with a module prefix (UPPERCASE by convention)
 */
export const createLogger = (prefix: string): Logger => {
  return {
    debug: (message: string, context?: LogContext) => {
      write(LogLevel.DEBUG, 'DEBUG', colors.gray, prefix, message, context);
    },

    info: (message: string, context?: LogContext) => {
      write(LogLevel.INFO, 'INFO ', colors.blue, prefix, message, context);
    },

    warn: (message: string, context?: LogContext) => {
      write(LogLevel.WARN, 'WARN ', colors.yellow, prefix, message, context);
    },

    error: (message: string, context?: LogContext) => {
      write(LogLevel.ERROR, 'ERROR', colors.red, prefix, message, context);
    },
  };
};

/**
 * Update log level at runtime
 */
export const setLogLevel = (level: LogLevel | string): void => {
  if (typeof level === 'string') {
    const parsedLevel = LOG_LEVEL_MAP[level.toLowerCase()];
    if (parsedLevel !== undefined) {
      currentLogLevel = parsedLevel;
    }
  } else {
    currentLogLevel = level;
  }
};

/**
 * Extract error information in a standardized format for logging
 *
 * @example
 * try {
 *   await store.ping();
 * } catch (error) {
 *   log.error('Store ping failed', extractError(error));
 * }
 */
export function extractError(error: unknown): { error: string; errorName?: string } {
  const safe = safeError(error);
  return {
    error: safe.message,
    ...(safe.name && safe.name !== 'Error' ? { errorName: safe.name } : {}),
  };
}
