/**
 * Logger Factory
 *
 * Creates service-specific Pino child loggers with consistent patterns.
 * Provides utility functions for common logging scenarios.
 */

import type { Logger } from 'pino';
import { logger as baseLogger } from './logger.js';

/**
 * Service logger type
 * Pino logger carrying a `service` binding
 */
export type ServiceLogger = Logger;

/**
 * Create a service-specific logger with structured context
 *
 * @param serviceName - Name of the service (e.g., 'GasAnalysisService', 'BlockReader')
 *
 * @example
 * ```typescript
 * const logger = createServiceLogger('GasAnalysisService');
 * logger.info('Analyzing block range');
 * // Output: {"level":"info","service":"GasAnalysisService","msg":"Analyzing block range"}
 * ```
 */
export function createServiceLogger(serviceName: string): ServiceLogger {
  return baseLogger.child({
    service: serviceName,
  });
}

/**
 * Common logging patterns for services
 *
 * Use these patterns to keep the log format uniform.
 */
export const LogPatterns = {
  /**
   * Log service method entry (debug level)
   *
   * @example
   * ```typescript
   * LogPatterns.methodEntry(logger, 'analyzeBlockRange', { count: 10 });
   * // Output: {"level":"debug","service":"...","method":"analyzeBlockRange","params":{"count":10},"msg":"Entering analyzeBlockRange"}
   * ```
   */
  methodEntry: (
    logger: ServiceLogger,
    method: string,
    params: Record<string, unknown> = {}
  ) => {
    logger.debug({ method, params }, `Entering ${method}`);
  },

  /**
   * Log service method exit (debug level)
   *
   * @param result - Optional result summary (avoid logging large objects)
   */
  methodExit: (
    logger: ServiceLogger,
    method: string,
    result?: Record<string, unknown>
  ) => {
    logger.debug({ method, result }, `Exiting ${method}`);
  },

  /**
   * Log service method error (error level)
   *
   * @param context - Additional context about the error
   *
   * @example
   * ```typescript
   * LogPatterns.methodError(logger, 'fetchBlock', error, { blockNumber: '1000' });
   * // Output: {"level":"error","service":"...","method":"fetchBlock","error":"Block not found","stack":"...","blockNumber":"1000","msg":"Error in fetchBlock"}
   * ```
   */
  methodError: (
    logger: ServiceLogger,
    method: string,
    error: unknown,
    context: Record<string, unknown> = {}
  ) => {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error(
      {
        method,
        error: err.message,
        errorName: err.name,
        stack: err.stack,
        ...context,
      },
      `Error in ${method}`
    );
  },

  /**
   * Log external API call (debug level)
   *
   * @param api - API name (e.g., 'Ethereum RPC')
   * @param endpoint - API endpoint or method
   *
   * @example
   * ```typescript
   * LogPatterns.externalApiCall(logger, 'Ethereum RPC', 'eth_getBlockByNumber', { blockNumber: '1000' });
   * ```
   */
  externalApiCall: (
    logger: ServiceLogger,
    api: string,
    endpoint: string,
    params: Record<string, unknown> = {}
  ) => {
    logger.debug({ api, endpoint, params }, `External API call: ${api}`);
  },
};

/**
 * Alias for LogPatterns for more concise usage
 *
 * @example
 * ```typescript
 * log.methodEntry(logger, 'myMethod', { param: 'value' });
 * log.methodExit(logger, 'myMethod');
 * ```
 */
export const log = LogPatterns;
