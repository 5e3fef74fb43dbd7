/**
 * Mock Provider Worker
 * Simulates a variable-latency provider call and answers with a canned testimony
 */

import { Provider, ProviderError } from '../../types/core';
import { delay } from '../../utils/delay';
import { BaseProviderWorker, ProviderWorkerOptions } from './base';

export interface MockProviderWorkerOptions extends ProviderWorkerOptions {
  minDelayMs?: number;
  maxDelayMs?: number;
  failureRate?: number;
  random?: () => number;
}

export class MockProviderWorker extends BaseProviderWorker {
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly failureRate: number;
  private readonly random: () => number;

  constructor(provider: Provider, options: MockProviderWorkerOptions = {}) {
    super(provider, options);
    this.minDelayMs = options.minDelayMs ?? 1000;
    this.maxDelayMs = options.maxDelayMs ?? 3000;
    this.failureRate = options.failureRate ?? 0;
    this.random = options.random ?? Math.random;

    if (this.minDelayMs < 0 || this.maxDelayMs < this.minDelayMs) {
      throw new Error(
        `Invalid delay range for provider ${provider.id}: ${this.minDelayMs}-${this.maxDelayMs}ms`
      );
    }
  }

  /**
   * Latency for the next call, drawn uniformly from the configured range
   */
  nextDelayMs(): number {
    return Math.round(this.minDelayMs + this.random() * (this.maxDelayMs - this.minDelayMs));
  }

  protected async performGeneration(prompt: string, signal: AbortSignal): Promise<string> {
    await delay(this.nextDelayMs(), signal);

    if (this.failureRate > 0 && this.random() < this.failureRate) {
      throw new ProviderError('SIMULATED_FAILURE', `${this.name} failed to respond`);
    }

    return [
      `[Testimony from ${this.name}]`,
      `Analyzing: "${prompt}"`,
      `Perspective: ${this.description}`,
      '',
      'My analysis suggests that the answer depends on the assumptions behind the question.',
      'Core assumption challenged.',
      'Logic refined.'
    ].join('\n');
  }
}
