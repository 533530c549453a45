import pino from 'pino';

export type Logger = pino.Logger;

export const LOG_LEVEL_ENV = 'OBSERVABLE_CACHE_LOG_LEVEL';

let rootLogger: Logger | undefined;

/**
 * Process-wide root logger. Components derive their own with
 * `getLogger().child({ component: '...' })`.
 */
export function getLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({
      name: 'observable-cache',
      level: process.env[LOG_LEVEL_ENV] ?? 'info',
    });
  }
  return rootLogger;
}

/**
 * Replace the root logger, e.g. with an application logger.
 * Only loggers created afterwards pick it up.
 */
export function setLogger(logger: Logger): void {
  rootLogger = logger;
}
