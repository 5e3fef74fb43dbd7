/**
 * Orchestration Engine
 * Coordinates a deliberation: fan-out to the council, fan-in of testimonies,
 * synthesis of the verdict and streaming it into the conversation
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { IOrchestrationEngine } from '../interfaces/IOrchestrationEngine';
import { IProviderWorker } from '../interfaces/IProviderWorker';
import { IConversation } from '../interfaces/IConversation';
import { ISynthesisEngine } from '../interfaces/ISynthesisEngine';
import { ConfigurationManager, ConfigurationValidationError } from '../config/manager';
import { VerdictSynthesizer } from '../synthesis/engine';
import { logger } from '../utils/logger';
import { delay, untilSettledOrAborted } from '../utils/delay';
import {
  DeliberationEvent,
  DeliberationEventHandler,
  DeliberationInProgressError,
  DeliberationPhase,
  DeliberationSnapshot,
  DeliberationStatus,
  MessageHandle,
  OperationAbortedError,
  OrchestratorConfig,
  Provider,
  ProviderError,
  ProviderOutcome,
  StreamGranularity
} from '../types/core';

const DELIBERATION_EVENT = 'deliberationEvent';

/**
 * One dispatch call. A run stops mutating anything once it is no longer the
 * engine's current run.
 */
interface DeliberationRun {
  id: string;
  controller: AbortController;
  startedAt: number;
}

interface DeliberationState {
  runId: string | null;
  isRunning: boolean;
  phase: DeliberationPhase;
  activeProviderIds: Set<string>;
  outputs: Map<string, string>;
  outcomes: Map<string, ProviderOutcome>;
}

/**
 * Split the verdict into the units that are appended one at a time.
 * Joining the units yields the original text.
 */
export function splitIntoUnits(text: string, granularity: StreamGranularity): string[] {
  if (granularity === 'word') {
    return text.match(/\S+\s*|\s+/g) ?? [];
  }
  return Array.from(text);
}

/**
 * Deliberation Orchestrator
 * Owns the roster and the only copy of the deliberation state. Workers never
 * touch that state: each invocation resolves to an outcome and the engine
 * records it in a single completion handler.
 */
export class DeliberationOrchestrator extends EventEmitter implements IOrchestrationEngine {
  private readonly workers: ReadonlyArray<IProviderWorker>;
  private readonly synthesisEngine: ISynthesisEngine;
  private readonly configManager: ConfigurationManager;

  private currentRun: DeliberationRun | null = null;
  private state: DeliberationState = {
    runId: null,
    isRunning: false,
    phase: 'idle',
    activeProviderIds: new Set(),
    outputs: new Map(),
    outcomes: new Map()
  };

  constructor(
    workers: ReadonlyArray<IProviderWorker>,
    synthesisEngine: ISynthesisEngine = new VerdictSynthesizer(),
    configManager: ConfigurationManager = new ConfigurationManager()
  ) {
    super();

    const seen = new Set<string>();
    for (const worker of workers) {
      if (worker.id.trim().length === 0) {
        throw new ConfigurationValidationError('Provider id must not be empty');
      }
      if (seen.has(worker.id)) {
        throw new ConfigurationValidationError(`Duplicate provider id: ${worker.id}`);
      }
      seen.add(worker.id);
    }

    this.workers = [...workers];
    this.synthesisEngine = synthesisEngine;
    this.configManager = configManager;
  }

  get isRunning(): boolean {
    return this.state.isRunning;
  }

  getProviders(): Provider[] {
    return this.workers.map(({ id, name, description }) => ({ id, name, description }));
  }

  getState(): DeliberationSnapshot {
    return {
      runId: this.state.runId,
      isRunning: this.state.isRunning,
      phase: this.state.phase,
      activeProviderIds: new Set(this.state.activeProviderIds),
      outputs: new Map(this.state.outputs),
      outcomes: new Map(this.state.outcomes)
    };
  }

  /**
   * Subscribe to deliberation events. A throwing handler is logged and does
   * not affect the run.
   */
  subscribe(handler: DeliberationEventHandler): () => void {
    const wrappedHandler = (event: DeliberationEvent): void => {
      try {
        handler(event);
      } catch (error) {
        logger.error('Deliberation event handler failed', {
          runId: event.runId,
          component: 'Orchestration'
        }, error instanceof Error ? error.message : String(error));
      }
    };
    this.on(DELIBERATION_EVENT, wrappedHandler);
    return () => {
      this.off(DELIBERATION_EVENT, wrappedHandler);
    };
  }

  async dispatch(prompt: string, conversation: IConversation): Promise<void> {
    if (this.state.isRunning && this.state.runId !== null) {
      throw new DeliberationInProgressError(this.state.runId);
    }

    // Config is read per run so updates apply to the next deliberation
    const config = this.configManager.getOrchestratorConfig();
    const run: DeliberationRun = {
      id: uuidv4(),
      controller: new AbortController(),
      startedAt: Date.now()
    };

    this.currentRun = run;
    this.state = {
      runId: run.id,
      isRunning: true,
      phase: 'fanning_out',
      activeProviderIds: new Set(this.workers.map((worker) => worker.id)),
      outputs: new Map(),
      outcomes: new Map()
    };
    logger.runStart(run.id, prompt, this.workers.length);
    this.emitStateChange(run);

    let status: DeliberationStatus = 'completed';
    let verdictHandle: MessageHandle | null = null;

    try {
      // An observer may cancel from the first state change
      if (!this.isCurrent(run)) {
        status = 'cancelled';
        return;
      }

      const userHandle = conversation.appendMessage('user', prompt);
      conversation.sealMessage(userHandle);
      verdictHandle = conversation.appendMessage('assistant', '');

      await this.fanOut(run, prompt, config.sentinelText);
      if (!this.isCurrent(run)) {
        status = 'cancelled';
        return;
      }

      if (!this.transition(run, 'synthesizing')) {
        status = 'cancelled';
        return;
      }
      const verdict = this.synthesizeVerdict(run, prompt);

      if (!this.transition(run, 'streaming')) {
        status = 'cancelled';
        return;
      }
      const streamed = await this.streamVerdict(run, verdict, conversation, verdictHandle, config);
      if (!streamed) {
        status = 'cancelled';
        return;
      }

      this.finish(run);
      logger.runComplete(run.id, Date.now() - run.startedAt);
    } catch (error) {
      status = 'failed';
      logger.error('Deliberation failed', { runId: run.id, component: 'Orchestration' },
        error instanceof Error ? error.message : String(error));
      if (this.currentRun === run) {
        run.controller.abort();
        this.finish(run);
      }
      throw error;
    } finally {
      if (verdictHandle !== null) {
        conversation.sealMessage(verdictHandle);
      }
      this.emitEvent({
        type: 'deliberation_complete',
        runId: run.id,
        status,
        durationMs: Date.now() - run.startedAt
      });
    }
  }

  cancel(): void {
    const run = this.currentRun;
    if (run === null || !this.state.isRunning) {
      return;
    }

    logger.runCancelled(run.id, this.state.phase);
    this.currentRun = null;
    this.state.isRunning = false;
    this.state.phase = 'idle';
    run.controller.abort();
    this.emitStateChange(run);
  }

  /**
   * Invoke every worker concurrently and wait for all of them (or for
   * cancellation). Each completion is recorded as it arrives.
   */
  private async fanOut(run: DeliberationRun, prompt: string, sentinelText: string): Promise<void> {
    const tasks = this.workers.map((worker) =>
      this.invokeWorker(run, worker, prompt, sentinelText).then((outcome) =>
        this.recordOutcome(run, outcome)
      )
    );

    await untilSettledOrAborted(Promise.all(tasks), run.controller.signal);
  }

  /**
   * Run one worker. Never rejects: any failure becomes the sentinel text.
   */
  private async invokeWorker(
    run: DeliberationRun,
    worker: IProviderWorker,
    prompt: string,
    sentinelText: string
  ): Promise<ProviderOutcome> {
    const startTime = Date.now();
    logger.providerRequest(run.id, worker.id);

    try {
      const text = await worker.generate(prompt, run.controller.signal);
      const latencyMs = Date.now() - startTime;
      logger.providerResponse(run.id, worker.id, latencyMs, text.length);
      return { providerId: worker.id, status: 'succeeded', text, latencyMs };
    } catch (error) {
      const latencyMs = Date.now() - startTime;
      const failure =
        error instanceof ProviderError
          ? error
          : new ProviderError(
              'UNKNOWN_ERROR',
              error instanceof Error ? error.message : String(error),
              false,
              error
            );
      logger.providerFailure(run.id, worker.id, failure.code, failure.message);
      return {
        providerId: worker.id,
        status: failure.code === 'TIMEOUT' ? 'timeout' : 'failed',
        text: sentinelText,
        latencyMs,
        errorCode: failure.code,
        errorMessage: failure.message
      };
    }
  }

  /**
   * The single mutation point for worker completions
   */
  private recordOutcome(run: DeliberationRun, outcome: ProviderOutcome): void {
    if (!this.isCurrent(run)) {
      return;
    }

    this.state.outputs.set(outcome.providerId, outcome.text);
    this.state.outcomes.set(outcome.providerId, outcome);
    this.state.activeProviderIds.delete(outcome.providerId);

    this.emitEvent({ type: 'provider_completed', runId: run.id, outcome });
    this.emitStateChange(run);
  }

  private synthesizeVerdict(run: DeliberationRun, prompt: string): string {
    const abstentions = new Set<string>();
    for (const outcome of this.state.outcomes.values()) {
      if (outcome.status !== 'succeeded') {
        abstentions.add(outcome.providerId);
      }
    }

    logger.synthesisStart(run.id, this.state.outputs.size);
    const startTime = Date.now();
    const verdict = this.synthesisEngine.synthesize({
      prompt,
      roster: this.getProviders(),
      outputs: new Map(this.state.outputs),
      abstentions
    });
    logger.synthesisComplete(run.id, Date.now() - startTime, verdict.length);

    return verdict;
  }

  /**
   * Append the verdict one unit at a time. Returns false if the run was
   * cancelled before the last unit was appended.
   */
  private async streamVerdict(
    run: DeliberationRun,
    verdict: string,
    conversation: IConversation,
    handle: MessageHandle,
    config: OrchestratorConfig
  ): Promise<boolean> {
    const units = splitIntoUnits(verdict, config.streamGranularity);
    logger.streamingStart(run.id, units.length);

    for (const unit of units) {
      try {
        await delay(config.streamDelayMs, run.controller.signal);
      } catch (error) {
        if (error instanceof OperationAbortedError) {
          return false;
        }
        throw error;
      }

      if (!this.isCurrent(run)) {
        return false;
      }

      conversation.mutateMessageText(handle, unit);
      this.emitEvent({ type: 'verdict_chunk', runId: run.id, chunk: unit });
    }

    return this.isCurrent(run);
  }

  /**
   * Move the current run to the next phase. Returns false if the run was
   * cancelled, before or by an observer of the transition.
   */
  private transition(run: DeliberationRun, phase: DeliberationPhase): boolean {
    if (!this.isCurrent(run)) {
      return false;
    }
    this.state.phase = phase;
    logger.debug(`Phase → ${phase}`, { runId: run.id, phase });
    this.emitStateChange(run);
    return this.isCurrent(run);
  }

  private finish(run: DeliberationRun): void {
    this.currentRun = null;
    this.state.isRunning = false;
    this.state.phase = 'idle';
    this.emitStateChange(run);
  }

  private isCurrent(run: DeliberationRun): boolean {
    return this.currentRun === run && !run.controller.signal.aborted;
  }

  private emitStateChange(run: DeliberationRun): void {
    this.emitEvent({ type: 'state_changed', runId: run.id, snapshot: this.getState() });
  }

  private emitEvent(event: DeliberationEvent): void {
    this.emit(DELIBERATION_EVENT, event);
  }
}
