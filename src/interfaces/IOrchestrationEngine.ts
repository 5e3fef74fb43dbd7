import {
  DeliberationEventHandler,
  DeliberationSnapshot,
  Provider
} from '../types/core';
import { IConversation } from './IConversation';

/**
 * Orchestration Engine Interface
 * Runs one deliberation at a time over a fixed roster
 */
export interface IOrchestrationEngine {
  /**
   * Fan the prompt out to every provider, synthesize and stream the verdict
   * into the conversation. Rejects with DeliberationInProgressError when a
   * deliberation is already running.
   */
  dispatch(prompt: string, conversation: IConversation): Promise<void>;

  /**
   * Request the running deliberation to stop. No-op when idle.
   */
  cancel(): void;

  /**
   * Read-only copy of the current deliberation state
   */
  getState(): DeliberationSnapshot;

  /**
   * The roster this engine was built with
   */
  getProviders(): Provider[];

  /**
   * Observe state transitions, completions, verdict chunks and run completion
   */
  subscribe(handler: DeliberationEventHandler): () => void;
}
