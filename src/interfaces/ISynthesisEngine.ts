import { SynthesisInput } from '../types/core';

/**
 * Synthesis Engine Interface
 * Combines every collected testimony into a single verdict
 */
export interface ISynthesisEngine {
  /**
   * Produce the verdict text. Called only once all providers have finished.
   */
  synthesize(input: SynthesisInput): string;
}
