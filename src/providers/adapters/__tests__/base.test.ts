/**
 * Base Provider Worker Tests
 * Retry, timeout and cancellation behavior shared by every worker
 */

import { BaseProviderWorker, ProviderWorkerOptions } from '../base';
import { OperationAbortedError, ProviderError, ProviderErrorCode } from '../../../types/core';
import { delay } from '../../../utils/delay';

type Step = (signal: AbortSignal) => Promise<string>;

class QueueWorker extends BaseProviderWorker {
  attempts = 0;
  signals: AbortSignal[] = [];

  constructor(private readonly steps: Step[], options?: ProviderWorkerOptions) {
    super({ id: 'queue', name: 'Queue', description: 'The Tester' }, options);
  }

  protected performGeneration(_prompt: string, signal: AbortSignal): Promise<string> {
    const step = this.steps[Math.min(this.attempts, this.steps.length - 1)];
    this.attempts++;
    this.signals.push(signal);
    return step(signal);
  }

  errorCodeOf(error: unknown): ProviderErrorCode {
    return this.getErrorCode(error);
  }

  backoffFor(attempt: number): number {
    return this.calculateBackoffDelay(attempt, 100, 1000, 2);
  }
}

const succeed = (text: string): Step => async () => text;
const fail = (error: Error): Step => async () => {
  throw error;
};

describe('BaseProviderWorker', () => {
  test('should expose the provider identity', () => {
    const worker = new QueueWorker([succeed('ok')]);
    expect([worker.id, worker.name, worker.description]).toEqual(['queue', 'Queue', 'The Tester']);
  });

  test('should return the generated text', async () => {
    const worker = new QueueWorker([succeed('hello')]);
    await expect(worker.generate('prompt')).resolves.toBe('hello');
    expect(worker.attempts).toBe(1);
  });

  test('should not retry with the default policy', async () => {
    const worker = new QueueWorker([fail(new ProviderError('RATE_LIMIT', 'slow down', true)), succeed('ok')]);

    await expect(worker.generate('prompt')).rejects.toMatchObject({ code: 'RATE_LIMIT' });
    expect(worker.attempts).toBe(1);
  });

  test('should retry retryable errors', async () => {
    const worker = new QueueWorker([fail(new Error('rate limit exceeded')), succeed('ok')], {
      retryPolicy: { maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 5 }
    });

    await expect(worker.generate('prompt')).resolves.toBe('ok');
    expect(worker.attempts).toBe(2);
  });

  test('should stop at non-retryable errors', async () => {
    const worker = new QueueWorker([fail(new Error('malformed payload')), succeed('ok')], {
      retryPolicy: { maxAttempts: 3, initialDelayMs: 1 }
    });

    const error = await worker.generate('prompt').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ code: 'UNKNOWN_ERROR', message: 'malformed payload', retryable: false });
    expect(worker.attempts).toBe(1);
  });

  test('should give up after maxAttempts', async () => {
    const worker = new QueueWorker([fail(new ProviderError('SERVICE_UNAVAILABLE', 'down', true))], {
      retryPolicy: { maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 2 }
    });

    await expect(worker.generate('prompt')).rejects.toMatchObject({ code: 'SERVICE_UNAVAILABLE' });
    expect(worker.attempts).toBe(3);
  });

  test('should time out slow attempts and abort them', async () => {
    const worker = new QueueWorker([(signal) => delay(1000, signal).then(() => 'late')], {
      timeoutMs: 10
    });

    await expect(worker.generate('prompt')).rejects.toMatchObject({
      code: 'TIMEOUT',
      message: 'Request timeout after 10ms'
    });
    expect(worker.signals[0].aborted).toBe(true);
  });

  test('should not start when already cancelled', async () => {
    const worker = new QueueWorker([succeed('ok')]);
    const controller = new AbortController();
    controller.abort();

    await expect(worker.generate('prompt', controller.signal)).rejects.toMatchObject({ code: 'CANCELLED' });
    expect(worker.attempts).toBe(0);
  });

  test('should cancel an attempt in flight without retrying', async () => {
    const worker = new QueueWorker([(signal) => delay(1000, signal).then(() => 'late')], {
      retryPolicy: { maxAttempts: 3, retryableErrors: ['CANCELLED', 'TIMEOUT'] }
    });
    const controller = new AbortController();

    const pending = worker.generate('prompt', controller.signal);
    controller.abort();

    await expect(pending).rejects.toMatchObject({ code: 'CANCELLED' });
    expect(worker.attempts).toBe(1);
  });

  test('should validate options', () => {
    expect(() => new QueueWorker([succeed('ok')], { timeoutMs: 0 })).toThrow('Invalid timeout value');
    expect(() => new QueueWorker([succeed('ok')], { retryPolicy: { maxAttempts: 0 } })).toThrow(
      'Invalid maxAttempts'
    );
  });

  test('should map errors to codes', () => {
    const worker = new QueueWorker([succeed('ok')]);

    expect(worker.errorCodeOf(new ProviderError('MALFORMED_RESPONSE', 'bad json'))).toBe('MALFORMED_RESPONSE');
    expect(worker.errorCodeOf(new OperationAbortedError())).toBe('CANCELLED');
    expect(worker.errorCodeOf(new Error('Socket Timeout'))).toBe('TIMEOUT');
    expect(worker.errorCodeOf(new Error('Rate limit reached'))).toBe('RATE_LIMIT');
    expect(worker.errorCodeOf('something odd')).toBe('UNKNOWN_ERROR');
  });

  test('should cap exponential backoff', () => {
    const worker = new QueueWorker([succeed('ok')]);

    expect([0, 1, 2, 3, 4].map((attempt) => worker.backoffFor(attempt))).toEqual([100, 200, 400, 800, 1000]);
  });
});
