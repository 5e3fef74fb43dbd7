/**
 * Council Deliberation - Main Entry Point
 */

// Export core types
export * from './types/core';

// Export interfaces
export * from './interfaces/IOrchestrationEngine';
export * from './interfaces/IProviderWorker';
export * from './interfaces/IConversation';
export * from './interfaces/ISynthesisEngine';

// Export implementations
export { DeliberationOrchestrator, splitIntoUnits } from './orchestration/engine';
export { VerdictSynthesizer } from './synthesis/engine';
export type { SynthesisOptions } from './synthesis/engine';
export { InMemoryConversation } from './session/conversation';
export {
  ConfigurationManager,
  ConfigurationValidationError,
  DEFAULT_ORCHESTRATOR_CONFIG,
  DEFAULT_MOCK_PROVIDER_CONFIG
} from './config/manager';

// Export provider workers
export { BaseProviderWorker, DEFAULT_RETRY_POLICY } from './providers/adapters/base';
export type { ProviderWorkerOptions } from './providers/adapters/base';
export { MockProviderWorker } from './providers/adapters/mock';
export type { MockProviderWorkerOptions } from './providers/adapters/mock';
export { DEFAULT_COUNCIL, createMockCouncil, createMockCouncilFromConfig } from './providers/roster';

// Export utilities
export { Logger, LogLevel, logger } from './utils/logger';
export type { LogContext } from './utils/logger';
export { delay, untilSettledOrAborted } from './utils/delay';
