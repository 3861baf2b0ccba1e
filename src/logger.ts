/**
 * Structured Logger
 *
 * Pino-based structured JSON logging.
 * - Development: pretty-printed, colorized (pino-pretty)
 * - Production: JSON lines
 * - Tests: silent unless LOG_LEVEL is set
 *
 * Usage:
 *   import { navigationLogger } from './logger';
 *   navigationLogger.info({ fromLocation, outcome }, 'Navigation resolved');
 */

import pino from 'pino';
import { config } from './config';

const isDev = config.app.isDevelopment;

function defaultLevel(): string {
  if (config.app.isTest) return 'silent';
  return isDev ? 'debug' : 'info';
}

export const logger = pino({
  level: process.env.LOG_LEVEL || defaultLevel(),

  redact: {
    paths: [
      'req.headers.authorization',
      'req.headers["x-admin-token"]',
      'password',
      'token',
      'apiToken',
      'connectionString',
    ],
    censor: '[REDACTED]',
  },

  base: {
    service: 'navigation-rules',
    env: config.app.env,
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  transport: isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname,service,env',
        },
      }
    : undefined,
});

export const navigationLogger = logger.child({ module: 'navigation' });
export const dbLogger = logger.child({ module: 'db' });
export const httpLogger = logger.child({ module: 'http' });
