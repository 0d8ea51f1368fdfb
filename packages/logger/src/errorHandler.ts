/**
 * @fileoverview Global error handlers for uncaught exceptions and unhandled rejections
 * Ensures all errors are logged before process termination.
 */

import type { Logger } from './types.js';

/**
 * Time to wait for the logger to flush before a forced exit.
 */
const FLUSH_TIMEOUT_MS = 3000;

/**
 * Listeners installed by the active attachment, or null when none are attached.
 */
let attached: {
  uncaughtException: (error: Error) => void;
  unhandledRejection: (reason: unknown, promise: Promise<unknown>) => void;
  warning: (warning: Error) => void;
} | null = null;

/**
 * Attaches global error handlers to the Node.js process.
 *
 * Uncaught exceptions and unhandled rejections are logged with their stack
 * and the process exits with code 1 once the logger has flushed. Process
 * warnings are logged and otherwise ignored.
 *
 * @returns Function that removes the handlers again
 *
 * @example
 * ```typescript
 * import { createLogger, attachGlobalHandlers } from '@tapline/logger';
 *
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger): () => void {
  if (attached) {
    logger.warn('Global error handlers already attached, skipping');
    return detachGlobalHandlers;
  }

  const uncaughtException = (error: Error): void => {
    logger.error('Uncaught exception detected - process will exit', {
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
      event: 'uncaughtException',
      fatal: true,
    });

    gracefulExit(logger, 1);
  };

  const unhandledRejection = (reason: unknown, promise: Promise<unknown>): void => {
    const errorInfo =
      reason instanceof Error
        ? {
            name: reason.name,
            message: reason.message,
            stack: reason.stack,
          }
        : {
            message: String(reason),
          };

    logger.error('Unhandled promise rejection detected - process will exit', {
      error: errorInfo,
      event: 'unhandledRejection',
      fatal: true,
      promise: String(promise),
    });

    gracefulExit(logger, 1);
  };

  const warning = (warningEvent: Error): void => {
    logger.warn('Process warning emitted', {
      warning: {
        name: warningEvent.name,
        message: warningEvent.message,
      },
      event: 'warning',
    });
  };

  process.on('uncaughtException', uncaughtException);
  process.on('unhandledRejection', unhandledRejection);
  process.on('warning', warning);

  attached = { uncaughtException, unhandledRejection, warning };

  logger.info('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection', 'warning'],
  });

  return detachGlobalHandlers;
}

/**
 * Removes the handlers installed by {@link attachGlobalHandlers}.
 */
export function detachGlobalHandlers(): void {
  if (!attached) {
    return;
  }

  process.off('uncaughtException', attached.uncaughtException);
  process.off('unhandledRejection', attached.unhandledRejection);
  process.off('warning', attached.warning);
  attached = null;
}

/**
 * Ends the logger and exits once it has flushed, or after FLUSH_TIMEOUT_MS.
 */
function gracefulExit(logger: Logger, exitCode: number): void {
  const timeoutId = setTimeout(() => {
    console.error(`[Logger] Flush timeout expired (${FLUSH_TIMEOUT_MS}ms), forcing exit`);
    process.exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    process.exit(exitCode);
  });

  logger.end();
}
