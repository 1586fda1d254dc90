import pino from 'pino';
import { getEnv } from '../config/env.js';

let _logger: pino.Logger | null = null;

export function createLogger(): pino.Logger {
  if (_logger) return _logger;

  const env = getEnv();

  _logger = pino({
    level: env.LOG_LEVEL,
    ...(env.NODE_ENV === 'development'
      ? {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          },
        }
      : {}),
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'bmw-vin-sync',
      env: env.NODE_ENV,
    },
  });

  return _logger;
}

export function getLogger(): pino.Logger {
  if (!_logger) {
    throw new Error('Logger not initialized. Call createLogger() first.');
  }
  return _logger;
}

/**
 * Report an error that ends the process. Before the logger exists (an
 * invalid environment) there is only stderr.
 */
export function logFatal(logger: pino.Logger | null, err: unknown): void {
  if (logger) {
    logger.fatal({ err }, 'Fatal error');
    return;
  }
  console.error('Fatal error:', err);
}

export type Logger = pino.Logger;
