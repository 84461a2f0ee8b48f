export { CededLossDistribution } from './distribution.js';
export {
  DEFAULT_BATCH_SIZE,
  buildScenario,
  simulateTrial,
  runScenario,
  type ScenarioModel,
  type RunScenarioOptions,
} from './scenario-engine.js';
export {
  InlineTrialExecutor,
  planBatches,
  type TrialBatch,
  type TrialExecutor,
  type BatchRunner,
} from './trial-executor.js';
