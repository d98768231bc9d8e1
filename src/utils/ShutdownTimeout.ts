/**
 * @fileoverview Timeout and deadline helpers.
 *
 * withTimeout() bounds printer socket steps, camera snapshot waits and each shutdown
 * step; createHardDeadline() is the last resort that ends the process when graceful
 * shutdown itself hangs.
 */

import { ErrorCode, timeoutError } from './error.utils';
import { logWarning } from './logging';

export interface TimeoutOptions {
  readonly timeoutMs: number;
  readonly operation: string;
  /** Error code of the rejection, TIMEOUT unless given */
  readonly code?: ErrorCode;
  /** Suppress the warning logged when the timeout fires */
  readonly silent?: boolean;
  /** Invoked once when the timeout fires, before the rejection */
  readonly onTimeout?: () => void;
}

/**
 * Race a promise against a timer. On expiry rejects with an AppError carrying
 * `options.code` and the operation name in its context.
 *
 * @example
 * ```typescript
 * await withTimeout(registry.shutdown(), { timeoutMs: 5000, operation: 'registry.shutdown' });
 * ```
 */
export async function withTimeout<T>(promise: Promise<T>, options: TimeoutOptions): Promise<T> {
  const { timeoutMs, operation, code = ErrorCode.TIMEOUT, silent = false, onTimeout } = options;

  let timeoutHandle: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      if (!silent) {
        logWarning('Timeout', `${operation} (${timeoutMs}ms)`);
      }
      onTimeout?.();
      reject(timeoutError(operation, timeoutMs, code));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  }
}

/**
 * Create a hard deadline that forces process termination
 *
 * @returns handle to clear once shutdown completes
 */
export function createHardDeadline(timeoutMs: number): NodeJS.Timeout {
  return setTimeout(() => {
    console.error(`[Shutdown] HARD DEADLINE (${timeoutMs}ms) exceeded - forcing exit`);
    process.exit(1);
  }, timeoutMs);
}
