/**
 * Logger
 *
 * Console-backed structured logger. Components take a Logger through their
 * options so the resolver stays free of global state; the default is
 * silentLogger, which keeps the check path free of I/O.
 *
 * Usage:
 *   const log = createLogger('InheritanceGraph', { level: 'debug' });
 *   log.debug('Group not found', { group: 'vip' });
 *   // 2026-01-01T00:00:00.000Z [InheritanceGraph] DEBUG Group not found {"group":"vip"}
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  /** Minimum level to output. Default: LOG_LEVEL env var, else 'info' */
  level?: LogLevel;
  /** Include timestamp in output. Default: true */
  includeTimestamp?: boolean;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LOG_LEVEL_PRIORITY;
}

function getDefaultLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL;
  return isLogLevel(envLevel) ? envLevel : 'info';
}

function formatData(data?: Record<string, unknown>): string {
  if (!data || Object.keys(data).length === 0) {
    return '';
  }

  try {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (value instanceof Error) {
        sanitized[key] = { message: value.message, name: value.name };
      } else if (value instanceof Set) {
        sanitized[key] = Array.from(value);
      } else {
        sanitized[key] = value;
      }
    }
    return ` ${JSON.stringify(sanitized)}`;
  } catch {
    return ' [unserializable data]';
  }
}

/**
 * Create a logger for a component
 */
export function createLogger(category: string, options: LoggerOptions = {}): Logger {
  const minPriority = LOG_LEVEL_PRIORITY[options.level ?? getDefaultLevel()];
  const includeTimestamp = options.includeTimestamp ?? true;

  const log = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
    if (LOG_LEVEL_PRIORITY[level] < minPriority) {
      return;
    }

    const timestamp = includeTimestamp ? `${new Date().toISOString()} ` : '';
    const line = `${timestamp}[${category}] ${level.toUpperCase()} ${message}${formatData(data)}`;

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  };

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
  };
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
