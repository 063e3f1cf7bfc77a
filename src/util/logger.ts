/**
 * Leveled logger that writes to stderr.
 *
 * stdout belongs to the MCP JSON-RPC stream, so every level goes to stderr.
 * All output passes through redactForLogging so API keys and bearer tokens
 * never reach the log.
 */

import { redactForLogging } from './security.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/**
 * Resolve the active level from a raw LOG_LEVEL value. Unknown values fall back to 'info'.
 */
export function resolveLogLevel(raw: string | undefined): LogLevel {
  const candidate = raw?.trim().toLowerCase();
  return isLogLevel(candidate) ? candidate : 'info';
}

const currentLevel: LogLevel = resolveLogLevel(process.env.LOG_LEVEL);

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[currentLevel];
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    const errorStr = `${arg.name}: ${arg.message}${arg.stack ? `\n${arg.stack}` : ''}`;
    return redactForLogging(errorStr);
  }
  if (typeof arg === 'object' && arg !== null) {
    try {
      return redactForLogging(JSON.stringify(arg, null, 2));
    } catch {
      return redactForLogging(String(arg));
    }
  }
  return redactForLogging(String(arg));
}

export function formatMessage(level: LogLevel, message: string, ...args: unknown[]): string {
  const timestamp = new Date().toISOString();
  const prefix = `[${timestamp}] [${level.toUpperCase()}]`;
  const safeMessage = redactForLogging(message);

  if (args.length > 0) {
    return `${prefix} ${safeMessage} ${args.map(formatArg).join(' ')}`;
  }
  return `${prefix} ${safeMessage}`;
}

function write(level: LogLevel, message: string, args: unknown[]): void {
  if (shouldLog(level)) {
    console.error(formatMessage(level, message, ...args));
  }
}

export const logger: Logger = {
  debug(message: string, ...args: unknown[]): void {
    write('debug', message, args);
  },

  info(message: string, ...args: unknown[]): void {
    write('info', message, args);
  },

  warn(message: string, ...args: unknown[]): void {
    write('warn', message, args);
  },

  error(message: string, ...args: unknown[]): void {
    write('error', message, args);
  },
};

/**
 * Logger whose messages carry a `[scope]` prefix. Delegates to the root logger,
 * so mocking `logger` also silences scoped loggers.
 */
export function createLogger(scope: string): Logger {
  const tag = `[${scope}]`;
  return {
    debug: (message, ...args) => logger.debug(`${tag} ${message}`, ...args),
    info: (message, ...args) => logger.info(`${tag} ${message}`, ...args),
    warn: (message, ...args) => logger.warn(`${tag} ${message}`, ...args),
    error: (message, ...args) => logger.error(`${tag} ${message}`, ...args),
  };
}
