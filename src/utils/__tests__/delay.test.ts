/**
 * Tests for the abortable timing helpers
 */

import { delay, untilSettledOrAborted } from '../delay';
import { OperationAbortedError } from '../../types/core';

describe('delay', () => {
  test('should resolve after the timeout', async () => {
    const start = Date.now();
    await delay(15);
    expect(Date.now() - start).toBeGreaterThanOrEqual(10);
  });

  test('should reject immediately when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(delay(1000, controller.signal)).rejects.toBeInstanceOf(OperationAbortedError);
  });

  test('should reject when the signal aborts mid-wait', async () => {
    const controller = new AbortController();
    const pending = delay(1000, controller.signal);
    controller.abort();

    await expect(pending).rejects.toThrow('Operation aborted');
  });
});

describe('untilSettledOrAborted', () => {
  test('should resolve when the promise resolves', async () => {
    const controller = new AbortController();
    await expect(untilSettledOrAborted(Promise.resolve(42), controller.signal)).resolves.toBeUndefined();
  });

  test('should resolve when the promise rejects', async () => {
    const controller = new AbortController();
    await expect(
      untilSettledOrAborted(Promise.reject(new Error('nope')), controller.signal)
    ).resolves.toBeUndefined();
  });

  test('should resolve on abort while the promise is still pending', async () => {
    const controller = new AbortController();
    const never = new Promise<void>(() => undefined);
    const waiting = untilSettledOrAborted(never, controller.signal);
    controller.abort();

    await expect(waiting).resolves.toBeUndefined();
  });
});
