/**
 * @fileoverview Process-level handlers for uncaught exceptions and unhandled
 * rejections. They log the failure, flush the logger, then exit with code 1.
 */

import type { Logger } from './types.js';

/** Upper bound on waiting for transports to flush before exiting. */
const FLUSH_TIMEOUT_MS = 3000;

let handlersAttached = false;

function describeError(reason: unknown): Record<string, unknown> {
  return reason instanceof Error
    ? { name: reason.name, message: reason.message, stack: reason.stack }
    : { message: String(reason) };
}

/**
 * Installs the handlers once per process. Further calls only warn.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
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
      error: describeError(error),
      event: 'uncaughtException',
      fatal: true,
    });
    exitAfterFlush(logger, 1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled promise rejection, exiting', {
      error: describeError(reason),
      event: 'unhandledRejection',
      fatal: true,
    });
    exitAfterFlush(logger, 1);
  });

  process.on('warning', (warning: Error) => {
    logger.warn('Process warning emitted', { warning: describeError(warning), event: 'warning' });
  });

  handlersAttached = true;
  logger.debug('Global error handlers attached');
}

/**
 * Ends the logger and exits once it reports `finish`, or after the timeout.
 */
export function exitAfterFlush(logger: Logger, exitCode: number): void {
  const timeoutId = setTimeout(() => {
    process.exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    process.exit(exitCode);
  });
  logger.end();
}
