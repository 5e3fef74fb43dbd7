import { Provider } from '../types/core';

/**
 * Provider Worker Interface
 * A council member that produces a testimony for a prompt
 */
export interface IProviderWorker extends Provider {
  /**
   * Generate a response for the prompt.
   * Rejects with ProviderError on any failure.
   */
  generate(prompt: string, signal?: AbortSignal): Promise<string>;
}
