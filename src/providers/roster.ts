/**
 * Council Roster
 * The default seats of the council and a factory for a mock-backed council
 */

import { IProviderWorker } from '../interfaces/IProviderWorker';
import { ConfigurationManager } from '../config/manager';
import { MockProviderConfig, Provider } from '../types/core';
import { MockProviderWorker } from './adapters/mock';

export const DEFAULT_COUNCIL: ReadonlyArray<Provider> = Object.freeze([
  Object.freeze({ id: 'gemini', name: 'Gemini', description: 'The Synthesizer' }),
  Object.freeze({ id: 'gpt4', name: 'OpenAI', description: 'The Logician' }),
  Object.freeze({ id: 'claude', name: 'Anthropic', description: 'The Writer' }),
  Object.freeze({ id: 'deepseek', name: 'DeepSeek', description: 'The Coder' })
]);

/**
 * Build mock workers for each seat, in roster order
 */
export function createMockCouncil(
  config: Partial<MockProviderConfig> = {},
  providers: ReadonlyArray<Provider> = DEFAULT_COUNCIL,
  random?: () => number
): IProviderWorker[] {
  return providers.map(
    (provider) =>
      new MockProviderWorker(provider, {
        minDelayMs: config.minDelayMs,
        maxDelayMs: config.maxDelayMs,
        failureRate: config.failureRate,
        timeoutMs: config.timeoutMs,
        random
      })
  );
}

/**
 * Build the mock council from the managed mock provider settings
 */
export function createMockCouncilFromConfig(
  configManager: ConfigurationManager,
  providers: ReadonlyArray<Provider> = DEFAULT_COUNCIL,
  random?: () => number
): IProviderWorker[] {
  return createMockCouncil(configManager.getMockProviderConfig(), providers, random);
}
