/**
 * Logger
 *
 * Structured pino logger. Created once in the entry point and injected;
 * services log with an object first and a message second:
 *
 * ```typescript
 * logger.warn({ kind: 'consistency_warning', storagePath }, 'Orphaned object');
 * ```
 */

import pino from 'pino';

import type { AppConfig } from '../config/env.js';

export type Logger = pino.Logger;

/**
 * Create the application logger
 * `logPretty` switches stdout to pino-pretty for local development
 */
export function createLogger(
  config: Pick<AppConfig, 'logLevel' | 'logPretty'>
): Logger {
  const options: pino.LoggerOptions = {
    level: config.logLevel,
    base: { service: 'zk-vault-api' },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (!config.logPretty) {
    return pino(options);
  }

  const transport = pino.transport({
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  });

  return pino(options, transport);
}

/**
 * Logger that discards everything
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
