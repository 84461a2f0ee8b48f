/**
 * @xolrisk/core - Determinism primitives
 *
 * Seeded generators and the per-trial stream provider every simulation
 * draws from.
 */

export {
  DEFAULT_SEED,
  SeededRNG,
  createDeterministicRNG,
  deriveState,
  seedFromString,
} from './determinism.js';
export type { DeterministicRNG } from './determinism.js';

export { RandomStreamProvider, seedFromInputs } from './seed-manager.js';
export type { ScenarioStreams } from './seed-manager.js';
