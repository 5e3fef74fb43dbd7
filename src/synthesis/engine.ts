/**
 * Synthesis Engine
 * Combines council testimonies into a single verdict
 */

import { ISynthesisEngine } from '../interfaces/ISynthesisEngine';
import { SynthesisError, SynthesisInput } from '../types/core';

export interface SynthesisOptions {
  maxInsightLength?: number;
}

export class VerdictSynthesizer implements ISynthesisEngine {
  private readonly maxInsightLength: number;

  constructor(options: SynthesisOptions = {}) {
    this.maxInsightLength = options.maxInsightLength ?? 120;
  }

  /**
   * Build the verdict. Insights are listed in roster order, so the text does
   * not depend on the order in which testimonies arrived.
   */
  synthesize(input: SynthesisInput): string {
    const { prompt, roster, outputs, abstentions } = input;

    const missing = roster.filter((provider) => !outputs.has(provider.id));
    if (missing.length > 0) {
      throw new SynthesisError(
        `Cannot synthesize before every provider has finished; missing: ${missing
          .map((provider) => provider.id)
          .join(', ')}`
      );
    }

    const insights = roster.map((provider) => {
      if (abstentions.has(provider.id)) {
        return `- ${provider.name} (${provider.description}) abstained.`;
      }
      const testimony = outputs.get(provider.id) ?? '';
      return `- ${provider.name} (${provider.description}): ${this.summarize(testimony)}`;
    });

    return [
      '# The Council Has Spoken',
      '',
      `After deliberating with ${roster.length} distinct intelligences, we have reached a verdict.`,
      '',
      '**Consensus:**',
      this.describeConsensus(roster.length, abstentions.size),
      '',
      '**Key Insights:**',
      ...(insights.length > 0 ? insights : ['- None.']),
      '',
      '**Final Answer:**',
      `Here is the synthesized response to your query: "${prompt}"`
    ].join('\n');
  }

  private describeConsensus(memberCount: number, abstainedCount: number): string {
    if (memberCount === 0) {
      return 'No council members were seated, so no testimony was heard.';
    }
    const testified = memberCount - abstainedCount;
    return `${testified} of ${memberCount} members testified; ${abstainedCount} abstained.`;
  }

  /**
   * Collapse whitespace and cap the length of a testimony
   */
  private summarize(testimony: string): string {
    const flattened = testimony.replace(/\s+/g, ' ').trim();
    if (flattened.length === 0) {
      return '(no testimony)';
    }
    if (flattened.length <= this.maxInsightLength) {
      return flattened;
    }
    return flattened.substring(0, this.maxInsightLength).trimEnd() + '...';
  }
}
