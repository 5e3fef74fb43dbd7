/**
 * Base Provider Worker
 * Abstract base class for all provider workers
 */

import { IProviderWorker } from '../../interfaces/IProviderWorker';
import {
  OperationAbortedError,
  Provider,
  ProviderError,
  ProviderErrorCode,
  RetryPolicy
} from '../../types/core';
import { delay } from '../../utils/delay';

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 1,
  initialDelayMs: 500,
  maxDelayMs: 5000,
  backoffMultiplier: 2,
  retryableErrors: ['RATE_LIMIT', 'TIMEOUT', 'SERVICE_UNAVAILABLE']
};

export interface ProviderWorkerOptions {
  timeoutMs?: number;
  retryPolicy?: Partial<RetryPolicy>;
}

export abstract class BaseProviderWorker implements IProviderWorker {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  protected readonly timeoutMs?: number;
  protected readonly retryPolicy: RetryPolicy;

  constructor(provider: Provider, options: ProviderWorkerOptions = {}) {
    this.id = provider.id;
    this.name = provider.name;
    this.description = provider.description;

    if (
      options.timeoutMs !== undefined &&
      (isNaN(options.timeoutMs) || options.timeoutMs <= 0)
    ) {
      throw new Error(`Invalid timeout value for provider ${provider.id}: ${options.timeoutMs}`);
    }
    this.timeoutMs = options.timeoutMs;

    this.retryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.retryPolicy };
    if (!Number.isInteger(this.retryPolicy.maxAttempts) || this.retryPolicy.maxAttempts < 1) {
      throw new Error(
        `Invalid maxAttempts for provider ${provider.id}: ${this.retryPolicy.maxAttempts}`
      );
    }
  }

  async generate(prompt: string, signal?: AbortSignal): Promise<string> {
    return this.executeWithRetry((attemptSignal) => this.performGeneration(prompt, attemptSignal), signal);
  }

  /**
   * Produce the raw response for one attempt
   */
  protected abstract performGeneration(prompt: string, signal: AbortSignal): Promise<string>;

  /**
   * Execute an operation with retry logic and timeout handling
   */
  protected async executeWithRetry(
    operation: (signal: AbortSignal) => Promise<string>,
    signal?: AbortSignal
  ): Promise<string> {
    let lastError: ProviderError | undefined;

    for (let attempt = 0; attempt < this.retryPolicy.maxAttempts; attempt++) {
      if (signal?.aborted) {
        throw new ProviderError('CANCELLED', `Request to ${this.id} was cancelled`);
      }

      try {
        return await this.executeWithTimeout(operation, signal);
      } catch (error) {
        lastError = this.toProviderError(error);

        if (
          lastError.code === 'CANCELLED' ||
          !this.retryPolicy.retryableErrors.includes(lastError.code)
        ) {
          break;
        }

        // Don't wait after the last attempt
        if (attempt < this.retryPolicy.maxAttempts - 1) {
          const backoff = this.calculateBackoffDelay(
            attempt,
            this.retryPolicy.initialDelayMs,
            this.retryPolicy.maxDelayMs,
            this.retryPolicy.backoffMultiplier
          );
          try {
            await delay(backoff, signal);
          } catch (delayError) {
            throw this.toProviderError(delayError);
          }
        }
      }
    }

    throw lastError ?? new ProviderError('UNKNOWN_ERROR', `Provider ${this.id} made no attempts`);
  }

  /**
   * Race one attempt against the configured timeout. The attempt receives a
   * signal that aborts on timeout or when the caller aborts.
   */
  private async executeWithTimeout(
    operation: (signal: AbortSignal) => Promise<string>,
    signal?: AbortSignal
  ): Promise<string> {
    const attemptController = new AbortController();
    const forwardAbort = (): void => attemptController.abort();
    if (signal?.aborted) {
      attemptController.abort();
    } else {
      signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    let timeoutId: NodeJS.Timeout | null = null;

    try {
      if (this.timeoutMs === undefined) {
        return await operation(attemptController.signal);
      }

      const timeoutMs = this.timeoutMs;
      const timeoutPromise = new Promise<never>((_, reject) => {
        timeoutId = setTimeout(() => {
          reject(new ProviderError('TIMEOUT', `Request timeout after ${timeoutMs}ms`, true));
          attemptController.abort();
        }, timeoutMs);
      });

      return await Promise.race([operation(attemptController.signal), timeoutPromise]);
    } finally {
      if (timeoutId !== null) {
        clearTimeout(timeoutId);
      }
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  /**
   * Normalize anything thrown by an attempt into a ProviderError
   */
  protected toProviderError(error: unknown): ProviderError {
    if (error instanceof ProviderError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    const code = this.getErrorCode(error);
    return new ProviderError(code, message, this.retryPolicy.retryableErrors.includes(code), error);
  }

  /**
   * Extract error code from error object
   */
  protected getErrorCode(error: unknown): ProviderErrorCode {
    if (error instanceof ProviderError) {return error.code;}
    if (error instanceof OperationAbortedError) {return 'CANCELLED';}
    if (error instanceof Error) {
      const message = error.message.toLowerCase();
      if (message.includes('timeout')) {return 'TIMEOUT';}
      if (message.includes('rate limit')) {return 'RATE_LIMIT';}
    }
    return 'UNKNOWN_ERROR';
  }

  /**
   * Calculate exponential backoff delay
   */
  protected calculateBackoffDelay(
    attempt: number,
    initialDelay: number,
    maxDelay: number,
    multiplier: number
  ): number {
    const backoff = initialDelay * Math.pow(multiplier, attempt);
    return Math.min(backoff, maxDelay);
  }
}
