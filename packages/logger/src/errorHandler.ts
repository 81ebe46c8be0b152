/**
 * @fileoverview Process-level handlers for uncaught exceptions and unhandled
 * rejections.
 */

import type { Logger } from './types.js';

/**
 * Upper bound on waiting for transports to flush before exiting.
 */
const FLUSH_TIMEOUT_MS = 3000;

let handlersAttached = false;

/**
 * Logs uncaught exceptions and unhandled rejections with their stack, then
 * exits with code 1 once the logger has flushed. Process warnings are logged
 * and do not exit. Attaching twice is a no-op.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', stderr: true });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger): void {
  if (handlersAttached) {
    logger.warn('Global error handlers already attached, skipping');
    return;
  }

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught exception, exiting', {
      error: { name: error.name, message: error.message, stack: error.stack },
      event: 'uncaughtException',
      fatal: true,
    });
    exitAfterFlush(logger, 1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    const error =
      reason instanceof Error
        ? { name: reason.name, message: reason.message, stack: reason.stack }
        : { message: String(reason) };

    logger.error('Unhandled promise rejection, exiting', {
      error,
      event: 'unhandledRejection',
      fatal: true,
    });
    exitAfterFlush(logger, 1);
  });

  process.on('warning', (warning: Error) => {
    logger.warn('Process warning emitted', {
      warning: { name: warning.name, message: warning.message },
      event: 'warning',
    });
  });

  handlersAttached = true;
  logger.debug('Global error handlers attached');
}

function exitAfterFlush(logger: Logger, exitCode: number): void {
  const timeoutId = setTimeout(() => {
    process.exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    process.exit(exitCode);
  });

  logger.end();
}
