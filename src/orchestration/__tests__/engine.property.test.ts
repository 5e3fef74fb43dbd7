/**
 * Property-Based Test: Fan-out/fan-in invariants
 *
 * For any roster and any mix of latencies and failures:
 * - every provider ends with exactly one output and none stays active
 * - during fan-out, active and finished providers partition the roster
 * - synthesis sees every output and no active provider
 * - failed providers contribute the sentinel text
 */

import * as fc from 'fast-check';
import { DeliberationOrchestrator } from '../engine';
import { ConfigurationManager } from '../../config/manager';
import { InMemoryConversation } from '../../session/conversation';
import { ISynthesisEngine } from '../../interfaces/ISynthesisEngine';
import { DeliberationSnapshot, SynthesisInput } from '../../types/core';
import { ScriptedWorker, getPropertyTestRuns } from '../../__tests__/test-helpers';

const memberArbitrary = fc.record({
  delayMs: fc.integer({ min: 0, max: 12 }),
  fail: fc.boolean()
});

describe('Property: deliberation fan-out/fan-in', () => {
  test('should partition the roster during fan-out and fill every output before synthesis', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(memberArbitrary, { minLength: 0, maxLength: 6 }),
        fc.string({ minLength: 1, maxLength: 40 }),
        async (members, prompt) => {
          const ids = members.map((_, index) => `p${index}`);
          const workers = members.map(
            (member, index) => new ScriptedWorker(ids[index], { delayMs: member.delayMs, fail: member.fail })
          );

          const activeAtSynthesis: number[] = [];
          const synthesisInputs: SynthesisInput[] = [];
          const synthesisEngine: ISynthesisEngine = {
            synthesize: (input) => {
              activeAtSynthesis.push(engine.getState().activeProviderIds.size);
              synthesisInputs.push(input);
              return `verdict on ${input.outputs.size}`;
            }
          };
          const engine = new DeliberationOrchestrator(
            workers,
            synthesisEngine,
            new ConfigurationManager({ streamDelayMs: 0, streamGranularity: 'word' })
          );

          const snapshots: DeliberationSnapshot[] = [];
          engine.subscribe((event) => {
            if (event.type === 'state_changed') {
              snapshots.push(event.snapshot);
            }
          });

          const conversation = new InMemoryConversation();
          await engine.dispatch(prompt, conversation);

          // Final state
          const state = engine.getState();
          expect(state.isRunning).toBe(false);
          expect(state.activeProviderIds.size).toBe(0);
          expect([...state.outputs.keys()].sort()).toEqual([...ids].sort());

          members.forEach((member, index) => {
            const output = state.outputs.get(ids[index]);
            if (member.fail) {
              expect(output).toBe('Abstained.');
            } else {
              expect(output).toBe(`testimony of ${ids[index]}`);
            }
          });

          // Partition during fan-out
          for (const snapshot of snapshots.filter((s) => s.phase === 'fanning_out')) {
            const finished = [...snapshot.outputs.keys()];
            expect(finished.some((id) => snapshot.activeProviderIds.has(id))).toBe(false);
            expect([...snapshot.activeProviderIds, ...finished].sort()).toEqual([...ids].sort());
          }

          // Synthesis only over complete input
          expect(activeAtSynthesis).toEqual([0]);
          expect(synthesisInputs[0].outputs.size).toBe(members.length);
          expect(synthesisInputs[0].abstentions.size).toBe(members.filter((m) => m.fail).length);

          const messages = conversation.getMessages();
          expect(messages.map((m) => m.text)).toEqual([prompt, `verdict on ${members.length}`]);
        }
      ),
      { numRuns: getPropertyTestRuns(25) }
    );
  });
});
