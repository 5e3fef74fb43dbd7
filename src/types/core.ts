/**
 * Core data models for the council deliberation system
 */

// ============================================================================
// Provider Models
// ============================================================================

export interface Provider {
  readonly id: string;
  readonly name: string;
  readonly description: string; // persona, e.g. "The Logician"
}

export type ProviderErrorCode =
  | 'TIMEOUT'
  | 'RATE_LIMIT'
  | 'MALFORMED_RESPONSE'
  | 'SERVICE_UNAVAILABLE'
  | 'SIMULATED_FAILURE'
  | 'CANCELLED'
  | 'UNKNOWN_ERROR';

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  retryableErrors: ProviderErrorCode[];
}

export type ProviderOutcomeStatus = 'succeeded' | 'failed' | 'timeout';

export interface ProviderOutcome {
  providerId: string;
  status: ProviderOutcomeStatus;
  text: string; // testimony, or the sentinel text when the provider failed
  latencyMs: number;
  errorCode?: ProviderErrorCode;
  errorMessage?: string;
}

// ============================================================================
// Conversation Models
// ============================================================================

export type MessageRole = 'user' | 'assistant';

export interface MessageHandle {
  readonly id: string;
}

export interface Message {
  id: string;
  role: MessageRole;
  text: string;
  sequence: number;
  createdAt: Date;
  sealed: boolean;
}

// ============================================================================
// Deliberation Models
// ============================================================================

export type DeliberationPhase = 'idle' | 'fanning_out' | 'synthesizing' | 'streaming';

export type DeliberationStatus = 'completed' | 'cancelled' | 'failed';

export interface DeliberationSnapshot {
  runId: string | null;
  isRunning: boolean;
  phase: DeliberationPhase;
  activeProviderIds: ReadonlySet<string>;
  outputs: ReadonlyMap<string, string>;
  outcomes: ReadonlyMap<string, ProviderOutcome>;
}

export type DeliberationEvent =
  | { type: 'state_changed'; runId: string; snapshot: DeliberationSnapshot }
  | { type: 'provider_completed'; runId: string; outcome: ProviderOutcome }
  | { type: 'verdict_chunk'; runId: string; chunk: string }
  | {
      type: 'deliberation_complete';
      runId: string;
      status: DeliberationStatus;
      durationMs: number;
    };

export type DeliberationEventHandler = (event: DeliberationEvent) => void;

export interface SynthesisInput {
  prompt: string;
  roster: ReadonlyArray<Provider>;
  outputs: ReadonlyMap<string, string>;
  abstentions: ReadonlySet<string>;
}

// ============================================================================
// Configuration Models
// ============================================================================

export type StreamGranularity = 'character' | 'word';

export interface OrchestratorConfig {
  streamDelayMs: number;
  streamGranularity: StreamGranularity;
  sentinelText: string;
}

export interface MockProviderConfig {
  minDelayMs: number;
  maxDelayMs: number;
  failureRate: number; // 0-1
  timeoutMs?: number;
}

// ============================================================================
// Error Models
// ============================================================================

export class ProviderError extends Error {
  code: ProviderErrorCode;
  retryable: boolean;
  details?: unknown;

  constructor(
    code: ProviderErrorCode,
    message: string,
    retryable: boolean = false,
    details?: unknown
  ) {
    super(message);
    this.name = 'ProviderError';
    this.code = code;
    this.retryable = retryable;
    this.details = details;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ProviderError);
    }
  }
}

export class DeliberationInProgressError extends Error {
  readonly runId: string;

  constructor(runId: string) {
    super(`Deliberation already in progress (run ${runId})`);
    this.name = 'DeliberationInProgressError';
    this.runId = runId;
  }
}

export class OperationAbortedError extends Error {
  constructor(message: string = 'Operation aborted') {
    super(message);
    this.name = 'OperationAbortedError';
  }
}

export class SynthesisError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SynthesisError';
  }
}

export class ConversationError extends Error {
  readonly messageId: string;

  constructor(messageId: string, message: string) {
    super(message);
    this.name = 'ConversationError';
    this.messageId = messageId;
  }
}
