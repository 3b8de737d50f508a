/**
 * Standardized Logger Utility
 *
 * Thin wrapper around Pino with the service defaults and a timing helper.
 */

import pino from 'pino';

export type { Logger } from 'pino';

export const LOGGER_NAME = 'career-companion';

/**
 * Create a Pino logger with the career companion defaults
 */
export function createLogger(options: pino.LoggerOptions = {}): pino.Logger {
  return pino({
    name: LOGGER_NAME,
    level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'development' ? 'debug' : 'info'),
    redact: {
      paths: [
        'apiKey',
        'api_key',
        'token',
        'secret',
        'authorization',
        '*.apiKey',
        '*.token',
        '*.secret',
      ],
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    ...options,
  });
}

/**
 * Performance timer interface
 */
export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => number;
  error: (error: unknown, additionalContext?: Record<string, unknown>) => number;
}

/**
 * Create a performance timer for an operation
 */
export function createTimer(
  logger: pino.Logger,
  operation: string,
  context: Record<string, unknown> = {},
): Timer {
  const startTime = Date.now();

  logger.debug({ operation, ...context }, `Starting ${operation}`);

  return {
    end(additionalContext: Record<string, unknown> = {}): number {
      const duration = Date.now() - startTime;

      logger.info(
        {
          operation,
          duration_ms: duration,
          ...context,
          ...additionalContext,
        },
        `Completed ${operation} in ${duration}ms`,
      );
      return duration;
    },

    error(error: unknown, additionalContext: Record<string, unknown> = {}): number {
      const duration = Date.now() - startTime;

      logger.error(
        {
          operation,
          duration_ms: duration,
          error: error instanceof Error ? error.message : String(error),
          errorType: error instanceof Error ? error.name : typeof error,
          ...context,
          ...additionalContext,
        },
        `Failed ${operation} after ${duration}ms`,
      );
      return duration;
    },
  };
}
