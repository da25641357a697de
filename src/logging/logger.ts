/**
 * Base Logger Configuration
 *
 * Pino logger setup with environment-based configuration.
 * Writes structured JSON to stderr so stdout stays reserved for the report.
 */

import pino from 'pino';

/**
 * Log level mapping by environment
 */
const LOG_LEVELS = {
  development: 'debug',
  production: 'info',
  test: 'silent',
} as const;

function isKnownEnvironment(value: string): value is keyof typeof LOG_LEVELS {
  return value in LOG_LEVELS;
}

/**
 * Get environment variables with defaults
 */
const NODE_ENV = process.env['NODE_ENV'] || 'development';
const LOG_LEVEL =
  process.env['LOG_LEVEL'] ||
  (isKnownEnvironment(NODE_ENV) ? LOG_LEVELS[NODE_ENV] : 'info');

/**
 * Base logger configuration
 */
const loggerConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
};

/**
 * Base logger instance, shared by every service logger
 * created via createServiceLogger() in logger-factory.ts
 */
export const logger = pino(loggerConfig, pino.destination(2));

export type Logger = typeof logger;

export { LOG_LEVEL, NODE_ENV };
