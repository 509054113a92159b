/**
 * Pino logger configuration
 */

import pino from 'pino';
import { getConfig } from './config';

let logger: pino.Logger | null = null;

// Credential-bearing fields that may appear in bindings or error context
const REDACT_PATHS = [
  'apiKey',
  'authToken',
  'password',
  'dbPassword',
  'credentials',
  'config.credentials',
  'config.dbPassword',
  'headers.authorization',
  'headers["x-coinapi-key"]',
];

/**
 * Get or create the logger instance
 */
export function getLogger(): pino.Logger {
  if (logger) {
    return logger;
  }

  const config = getConfig();
  const isDev = config.nodeEnv === 'development';

  logger = pino({
    level: config.logLevel,
    redact: { paths: REDACT_PATHS, censor: '****' },
    transport: isDev
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
    base: {
      service: 'crypto-backfill',
      env: config.nodeEnv,
    },
  });

  return logger;
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(bindings: pino.Bindings): pino.Logger {
  return getLogger().child(bindings);
}

/**
 * Drop the cached logger so the next call picks up fresh config (tests)
 */
export function resetLogger(): void {
  logger = null;
}
