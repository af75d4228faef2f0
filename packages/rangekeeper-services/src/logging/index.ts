/**
 * Service Logging
 *
 * Pino-based structured logging shared by every service. Each service gets
 * a child logger bound to its name; `log` holds the method-level patterns.
 *
 * Env vars:
 *   LOG_LEVEL  = fatal | error | warn | info | debug | trace | silent  (default: info)
 *   NODE_ENV   = development enables pino-pretty output
 */

import { pino, type Logger } from 'pino';

export type ServiceLogger = Logger;

/**
 * Root logger for all Rangekeeper services
 */
export const rootLogger: Logger = pino({
  name: 'rangekeeper',
  level: process.env.LOG_LEVEL ?? 'info',
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  transport:
    process.env.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

/**
 * Create a child logger bound to a service name
 */
export function createServiceLogger(serviceName: string): ServiceLogger {
  return rootLogger.child({ service: serviceName });
}

/**
 * Structured log patterns for service methods
 */
export const LogPatterns = {
  methodEntry(logger: ServiceLogger, method: string, context?: Record<string, unknown>): void {
    logger.debug({ method, ...context, msg: `${method} started` });
  },

  methodExit(logger: ServiceLogger, method: string, context?: Record<string, unknown>): void {
    logger.debug({ method, ...context, msg: `${method} completed` });
  },

  externalApiCall(
    logger: ServiceLogger,
    api: string,
    operation: string,
    context?: Record<string, unknown>
  ): void {
    logger.debug({ api, operation, ...context, msg: `External API call: ${api}.${operation}` });
  },

  methodError(
    logger: ServiceLogger,
    method: string,
    error: unknown,
    context?: Record<string, unknown>
  ): void {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error({
      method,
      error: err.message,
      errorName: err.name,
      ...context,
      msg: `${method} failed`,
    });
  },
};

/**
 * Shorthand used throughout the services
 */
export const log = LogPatterns;
