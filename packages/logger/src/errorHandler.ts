/**
 * @fileoverview Process-level handlers for uncaught exceptions and
 * unhandled rejections. Used by the CLI entry point.
 */

import type { Logger } from './types.js';

/** Upper bound on waiting for transports to drain before exiting. */
const FLUSH_TIMEOUT_MS = 3000;

let handlersAttached = false;

function describe(reason: unknown): Record<string, unknown> {
  if (reason instanceof Error) {
    return { name: reason.name, message: reason.message, stack: reason.stack };
  }
  return { message: String(reason) };
}

/**
 * Logs any uncaught exception or unhandled rejection, then exits with
 * code 2 once the logger has flushed. Attaching twice is a no-op.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger, exitCode = 2): void {
  if (handlersAttached) {
    logger.debug('Global error handlers already attached');
    return;
  }

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught exception, exiting', { error: describe(error), event: 'uncaughtException' });
    exitAfterFlush(logger, exitCode);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled promise rejection, exiting', { error: describe(reason), event: 'unhandledRejection' });
    exitAfterFlush(logger, exitCode);
  });

  handlersAttached = true;
}

/** For tests: whether {@link attachGlobalHandlers} has run in this process. */
export function globalHandlersAttached(): boolean {
  return handlersAttached;
}

function exitAfterFlush(logger: Logger, exitCode: number): void {
  const timeout = setTimeout(() => {
    process.exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeout);
    process.exit(exitCode);
  });
  logger.end();
}
