/**
 * Abortable timing helpers
 */

import { OperationAbortedError } from '../types/core';

/**
 * Sleep for the given milliseconds. Rejects with OperationAbortedError if the
 * signal aborts first.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OperationAbortedError());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new OperationAbortedError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Resolve once the promise settles or the signal aborts, whichever is first.
 * The promise's own outcome is not reported.
 */
export function untilSettledOrAborted(
  promise: Promise<unknown>,
  signal: AbortSignal
): Promise<void> {
  return new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => resolve();
    signal.addEventListener('abort', onAbort, { once: true });

    const settle = (): void => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    };
    promise.then(settle, settle);
  });
}
