/**
 * AsyncHelpers - Fire-and-forget async execution with logging
 *
 * For callbacks that cannot return a promise (signal handlers, timers) but
 * start async work. Rejections are logged instead of becoming unhandled.
 */

import type { Logger } from './ErrorTypes';

/**
 * Executes an async operation in a fire-and-forget manner with simple logging.
 *
 * @param operation - Async operation to execute
 * @param logger - Logger with log() and error() methods
 * @param operationName - Name of operation for logging
 *
 * @example
 * ```typescript
 * process.once('SIGINT', () => {
 *   executeAsyncWithLog(() => poller.stop(), logger, 'Stop poller');
 * });
 * ```
 */
export function executeAsyncWithLog(
  operation: () => Promise<void>,
  logger: Logger,
  operationName: string
): void {
  operation().catch((error: unknown) => {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error(`${operationName} failed:`, err);
  });
}
