/**
 * Logger Utility
 *
 * Leveled, prefixed logging for the wallet server.
 *
 * LOG LEVELS (in order of verbosity):
 *   - DEBUG (0): tracing of handler steps and store calls
 *   - INFO  (1): one line per client request, filter refreshes, broadcasts
 *   - WARN  (2): operational errors answered to the client
 *   - ERROR (3): storage faults, configuration defects
 *
 * Set LOG_LEVEL (debug | info | warn | error) to control verbosity.
 *
 * USAGE:
 *   import { createLogger } from '../utils/logger';
 *   const log = createLogger('ACCOUNTS');
 *   log.info('Create account', { name: 'savings', type: 'multisig' });
 *
 * OUTPUT FORMAT:
 *   [ISO_TIMESTAMP] LEVEL [PREFIX] [REQ_ID] Message key=value key=value
 *
 * Context objects are passed through redactObject(), so fields such as
 * masterKey, mnemonic or password are printed as [REDACTED].
 */

import { requestContext } from './requestContext';
import { redactObject, safeError } from './redact';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogContext = Record<string, unknown>;

const LOG_LEVEL_MAP: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

// Get log level from environment, default to INFO
const getLogLevel = (): LogLevel => {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (!envLevel) return LogLevel.INFO;
  return LOG_LEVEL_MAP[envLevel] ?? LogLevel.INFO;
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

/**
 * Format context object as key=value pairs
 * Objects are JSON stringified, primitives are converted to strings
 */
const formatContext = (context?: LogContext): string => {
  if (!context || Object.keys(context).length === 0) return '';

  const formatted = Object.entries(redactObject(context))
    .map(([key, value]) => {
      if (value === undefined || value === null) {
        return `${key}=null`;
      }
      if (typeof value === 'object') {
        return `${key}=${JSON.stringify(value)}`;
      }
      return `${key}=${String(value)}`;
    })
    .join(' ');

  return ` ${colors.dim}${formatted}${colors.reset}`;
};

const log = (
  level: LogLevel,
  levelName: string,
  color: string,
  prefix: string,
  message: string,
  context?: LogContext
): void => {
  if (level < currentLogLevel) return;

  const requestId = requestContext.get()?.requestId;
  const requestIdStr = requestId ? ` ${colors.dim}[${requestId}]${colors.reset}` : '';

  // Format: [timestamp] LEVEL [PREFIX] [REQ_ID] message context
  console.log(
    `${colors.gray}[${new Date().toISOString()}]${colors.reset} ${color}${levelName}${colors.reset} ${colors.cyan}[${prefix}]${colors.reset}${requestIdStr} ${message}${formatContext(context)}`
  );
};

/**
 * Logger interface returned by createLogger
 */
export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
}

/**
 * Create a logger instance with a specific prefix/module name
 *
 * @param prefix - Module identifier shown in log output (e.g., 'ACCOUNTS', 'NODE')
 */
export const createLogger = (prefix: string): Logger => {
  return {
    debug: (message, context) => {
      log(LogLevel.DEBUG, 'DEBUG', colors.gray, prefix, message, context);
    },

    info: (message, context) => {
      log(LogLevel.INFO, 'INFO ', colors.blue, prefix, message, context);
    },

    warn: (message, context) => {
      log(LogLevel.WARN, 'WARN ', colors.yellow, prefix, message, context);
    },

    error: (message, context) => {
      log(LogLevel.ERROR, 'ERROR', colors.red, prefix, message, context);
    },
  };
};

export const logger = createLogger('APP');

/**
 * Update log level at runtime
 *
 * @example
 * setLogLevel('debug');
 * setLogLevel(LogLevel.WARN);
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
 *   await riskyOperation();
 * } catch (error) {
 *   log.error('Operation failed', extractError(error));
 * }
 */
export function extractError(error: unknown): { error: string; errorName?: string } {
  const safe = safeError(error);
  return {
    error: safe.message,
    ...(safe.name && safe.name !== 'Error' ? { errorName: safe.name } : {}),
  };
}

export default logger;
