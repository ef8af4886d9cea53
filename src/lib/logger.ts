/**
 * Standardized Logger Utility
 *
 * Thin wrapper around Pino with a timer helper.
 */

import pino from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions extends pino.LoggerOptions {
  /** Write to stderr so that stdout stays free for machine-readable output */
  stderr?: boolean;
}

/**
 * Create a Pino logger with the deployer's defaults
 */
export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const { stderr = false, ...pinoOptions } = options;

  return pino(
    {
      name: 'cloudrun-deployer',
      level: process.env.LOG_LEVEL ?? 'info',
      ...pinoOptions,
    },
    stderr ? pino.destination(2) : undefined,
  );
}

/**
 * Performance timer interface
 */
export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => void;
  error: (error: unknown, additionalContext?: Record<string, unknown>) => void;
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
    end(additionalContext: Record<string, unknown> = {}): void {
      const duration = Date.now() - startTime;

      logger.info(
        { operation, duration_ms: duration, ...context, ...additionalContext },
        `Completed ${operation} in ${duration}ms`,
      );
    },

    error(error: unknown, additionalContext: Record<string, unknown> = {}): void {
      const duration = Date.now() - startTime;

      logger.error(
        {
          operation,
          duration_ms: duration,
          error: error instanceof Error ? error.message : String(error),
          ...context,
          ...additionalContext,
        },
        `Failed ${operation} after ${duration}ms`,
      );
    },
  };
}
