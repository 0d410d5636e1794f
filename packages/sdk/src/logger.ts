/**
 * Logging
 * @module logger
 */

import { pino, type Logger, type LoggerOptions } from 'pino';

export type { Logger };

/**
 * Create the engine's default logger.
 *
 * The level follows `LOG_LEVEL` like the sync server does; in a browser,
 * where there is no `process`, it defaults to `info`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: 'tidesync',
    level: (typeof process !== 'undefined' ? process.env.LOG_LEVEL : undefined) ?? 'info',
    ...options,
  });
}
