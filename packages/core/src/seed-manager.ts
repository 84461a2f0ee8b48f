/**
 * Seed Manager
 *
 * Hands out independent random streams keyed by
 * (seed, scenario id, trial index). A trial's draws depend only on its key,
 * so trials may run in any order, or on any worker, without changing results.
 */

import { DEFAULT_SEED, SeededRNG, seedFromString } from './determinism.js';
import type { DeterministicRNG } from './determinism.js';

/**
 * Streams for one scenario of one run
 */
export interface ScenarioStreams {
  readonly seed: number;
  readonly scenarioId: string;

  /**
   * Fresh generator for a trial; calling twice with the same index gives two
   * generators that produce the same sequence
   */
  streamFor(trialIndex: number): DeterministicRNG;
}

/**
 * Source of per-trial sub-streams for a seeded run
 */
export class RandomStreamProvider {
  readonly seed: number;

  constructor(seed: number = DEFAULT_SEED) {
    if (!Number.isSafeInteger(seed)) {
      throw new RangeError(`Seed must be a safe integer, got ${seed}`);
    }
    this.seed = seed;
  }

  /**
   * Streams for one scenario; different scenario ids never share a stream
   */
  forScenario(scenarioId: string): ScenarioStreams {
    const seed = this.seed;
    const scenarioKey = seedFromString(scenarioId);

    return {
      seed,
      scenarioId,
      streamFor(trialIndex: number): DeterministicRNG {
        if (!Number.isSafeInteger(trialIndex) || trialIndex < 0) {
          throw new RangeError(`Trial index must be a non-negative integer, got ${trialIndex}`);
        }
        return new SeededRNG(seed, scenarioKey, trialIndex);
      },
    };
  }

  /**
   * Stream for a single (scenario, trial) key
   */
  streamFor(scenarioId: string, trialIndex: number): DeterministicRNG {
    return this.forScenario(scenarioId).streamFor(trialIndex);
  }
}

/**
 * Generate a seed from multiple inputs
 *
 * Same inputs → same seed (deterministic). Used to give named layer
 * comparisons or sweeps their own seed family.
 */
export function seedFromInputs(...inputs: (string | number)[]): number {
  return seedFromString(inputs.map(String).join('-'));
}
