/**
 * Configuration Manager
 * Holds orchestrator and mock provider settings, validated on every change
 */

import {
  MockProviderConfig,
  OrchestratorConfig,
  StreamGranularity
} from '../types/core';

/**
 * Configuration validation error
 */
export class ConfigurationValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationValidationError';
  }
}

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  streamDelayMs: 10,
  streamGranularity: 'character',
  sentinelText: 'Abstained.'
};

export const DEFAULT_MOCK_PROVIDER_CONFIG: MockProviderConfig = {
  minDelayMs: 1000,
  maxDelayMs: 3000,
  failureRate: 0
};

const STREAM_GRANULARITIES: StreamGranularity[] = ['character', 'word'];

function isStreamGranularity(value: string): value is StreamGranularity {
  return STREAM_GRANULARITIES.some((granularity) => granularity === value);
}

export class ConfigurationManager {
  private orchestratorConfig: OrchestratorConfig;
  private mockProviderConfig: MockProviderConfig;

  constructor(
    orchestrator?: Partial<OrchestratorConfig>,
    mockProvider?: Partial<MockProviderConfig>
  ) {
    this.orchestratorConfig = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...orchestrator };
    this.mockProviderConfig = { ...DEFAULT_MOCK_PROVIDER_CONFIG, ...mockProvider };
    this.validateOrchestratorConfig(this.orchestratorConfig);
    this.validateMockProviderConfig(this.mockProviderConfig);
  }

  getOrchestratorConfig(): OrchestratorConfig {
    return { ...this.orchestratorConfig };
  }

  getMockProviderConfig(): MockProviderConfig {
    return { ...this.mockProviderConfig };
  }

  updateOrchestratorConfig(updates: Partial<OrchestratorConfig>): void {
    const next = { ...this.orchestratorConfig, ...updates };
    this.validateOrchestratorConfig(next);
    this.orchestratorConfig = next;
  }

  updateMockProviderConfig(updates: Partial<MockProviderConfig>): void {
    const next = { ...this.mockProviderConfig, ...updates };
    this.validateMockProviderConfig(next);
    this.mockProviderConfig = next;
  }

  private validateOrchestratorConfig(config: OrchestratorConfig): void {
    if (!Number.isFinite(config.streamDelayMs) || config.streamDelayMs < 0) {
      throw new ConfigurationValidationError(
        `streamDelayMs must be a non-negative number, got ${config.streamDelayMs}`
      );
    }
    if (!isStreamGranularity(config.streamGranularity)) {
      throw new ConfigurationValidationError(
        `streamGranularity must be one of ${STREAM_GRANULARITIES.join(', ')}`
      );
    }
    if (config.sentinelText.trim().length === 0) {
      throw new ConfigurationValidationError('sentinelText must not be empty');
    }
  }

  private validateMockProviderConfig(config: MockProviderConfig): void {
    if (!Number.isFinite(config.minDelayMs) || config.minDelayMs < 0) {
      throw new ConfigurationValidationError(
        `minDelayMs must be a non-negative number, got ${config.minDelayMs}`
      );
    }
    if (!Number.isFinite(config.maxDelayMs) || config.maxDelayMs < config.minDelayMs) {
      throw new ConfigurationValidationError(
        `maxDelayMs must be at least minDelayMs (${config.minDelayMs}), got ${config.maxDelayMs}`
      );
    }
    if (!Number.isFinite(config.failureRate) || config.failureRate < 0 || config.failureRate > 1) {
      throw new ConfigurationValidationError(
        `failureRate must be between 0 and 1, got ${config.failureRate}`
      );
    }
    if (
      config.timeoutMs !== undefined &&
      (!Number.isFinite(config.timeoutMs) || config.timeoutMs <= 0)
    ) {
      throw new ConfigurationValidationError(
        `timeoutMs must be a positive number, got ${config.timeoutMs}`
      );
    }
  }

  /**
   * Load from environment variables
   */
  static fromEnvironment(env: NodeJS.ProcessEnv = process.env): ConfigurationManager {
    const orchestrator: Partial<OrchestratorConfig> = {};
    const mockProvider: Partial<MockProviderConfig> = {};

    if (env.COUNCIL_STREAM_DELAY_MS !== undefined) {
      orchestrator.streamDelayMs = parseNumber('COUNCIL_STREAM_DELAY_MS', env.COUNCIL_STREAM_DELAY_MS);
    }

    if (env.COUNCIL_STREAM_GRANULARITY !== undefined) {
      const granularity = env.COUNCIL_STREAM_GRANULARITY.toLowerCase();
      if (!isStreamGranularity(granularity)) {
        throw new ConfigurationValidationError(
          `COUNCIL_STREAM_GRANULARITY must be one of ${STREAM_GRANULARITIES.join(', ')}`
        );
      }
      orchestrator.streamGranularity = granularity;
    }

    if (env.COUNCIL_SENTINEL_TEXT !== undefined) {
      orchestrator.sentinelText = env.COUNCIL_SENTINEL_TEXT;
    }

    if (env.MOCK_PROVIDER_MIN_DELAY_MS !== undefined) {
      mockProvider.minDelayMs = parseNumber('MOCK_PROVIDER_MIN_DELAY_MS', env.MOCK_PROVIDER_MIN_DELAY_MS);
    }

    if (env.MOCK_PROVIDER_MAX_DELAY_MS !== undefined) {
      mockProvider.maxDelayMs = parseNumber('MOCK_PROVIDER_MAX_DELAY_MS', env.MOCK_PROVIDER_MAX_DELAY_MS);
    }

    if (env.MOCK_PROVIDER_FAILURE_RATE !== undefined) {
      mockProvider.failureRate = parseNumber('MOCK_PROVIDER_FAILURE_RATE', env.MOCK_PROVIDER_FAILURE_RATE);
    }

    if (env.PROVIDER_TIMEOUT_MS !== undefined) {
      mockProvider.timeoutMs = parseNumber('PROVIDER_TIMEOUT_MS', env.PROVIDER_TIMEOUT_MS);
    }

    return new ConfigurationManager(orchestrator, mockProvider);
  }
}

function parseNumber(name: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || isNaN(value)) {
    throw new ConfigurationValidationError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}
