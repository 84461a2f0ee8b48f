/**
 * Scenario Engine
 *
 * Builds the models for one scenario (baseline or stressed) and runs its
 * trials: draw a claim count, draw that many severities, sum them, and pass
 * the total through the layer. Only the ceded loss of each trial is kept.
 */

import { RandomStreamProvider } from '@xolrisk/core';
import type { ScenarioStreams } from '@xolrisk/core';
import { ComputationError, LogHelpers, SimulationCancelledError } from '@xolrisk/utils';
import type { SimulationConfig } from '../config.js';
import { logger } from '../logger.js';
import { createFrequencyModel } from '../models/frequency.js';
import type { FrequencyModel } from '../models/frequency.js';
import { createSeverityModel } from '../models/severity.js';
import type { SeverityModel } from '../models/severity.js';
import { ExcessOfLossLayer } from '../reinsurance/layer.js';
import type { ScenarioKind, Trial } from '../types/index.js';
import { CededLossDistribution } from './distribution.js';
import { InlineTrialExecutor, planBatches } from './trial-executor.js';
import type { TrialBatch, TrialExecutor } from './trial-executor.js';

export const DEFAULT_BATCH_SIZE = 10_000;

/**
 * Everything needed to run one scenario; immutable once built
 */
export interface ScenarioModel {
  readonly scenario: ScenarioKind;
  readonly trials: number;
  readonly streams: ScenarioStreams;
  readonly frequency: FrequencyModel;
  readonly severity: SeverityModel;
  readonly layer: ExcessOfLossLayer;
}

export interface RunScenarioOptions {
  executor?: TrialExecutor;
  batchSize?: number;
  signal?: AbortSignal;
  /** Called with every trial as it completes, in execution order */
  onTrial?: (trial: Trial) => void;
}

/**
 * Build the models for a scenario. The stressed scenario inflates claim
 * severity by `config.inflationRate`; frequency and layer are shared.
 */
export function buildScenario(
  config: SimulationConfig,
  scenario: ScenarioKind,
  provider: RandomStreamProvider = new RandomStreamProvider(config.seed)
): ScenarioModel {
  const { mu, sigma } = config.severity;
  return {
    scenario,
    trials: config.trials,
    streams: provider.forScenario(scenario),
    frequency: createFrequencyModel(config.frequency),
    severity: createSeverityModel(
      { mu, sigma },
      { inflationRate: scenario === 'stressed' ? config.inflationRate : 0 }
    ),
    layer: new ExcessOfLossLayer(config.layer),
  };
}

/**
 * Simulate a single trial from its own keyed stream
 */
export function simulateTrial(model: ScenarioModel, index: number): Trial {
  const rng = model.streams.streamFor(index);
  const claimCount = model.frequency.sample(rng);
  const severities = model.severity.sample(claimCount, rng);
  const { gross, ceded, retained } = model.layer.cedeClaims(severities);
  return { index, claimCount, severities, gross, ceded, retained };
}

/**
 * Run every trial of a scenario and collect the ceded-loss distribution.
 * Results are stored by trial index, so the executor's batch order does not
 * affect the output.
 */
export async function runScenario(
  model: ScenarioModel,
  options: RunScenarioOptions = {}
): Promise<CededLossDistribution> {
  const {
    executor = new InlineTrialExecutor(),
    batchSize = DEFAULT_BATCH_SIZE,
    signal,
    onTrial,
  } = options;
  const startedAt = Date.now();

  const ceded = new Float64Array(model.trials).fill(Number.NaN);
  let completed = 0;

  const runBatch = (batch: TrialBatch): void => {
    if (signal?.aborted) {
      throw new SimulationCancelledError(completed, { scenario: model.scenario });
    }
    for (let i = batch.start; i < batch.end; i++) {
      const trial = simulateTrial(model, i);
      ceded[i] = trial.ceded;
      onTrial?.(trial);
    }
    completed += batch.end - batch.start;
  };

  await executor.execute(planBatches(model.trials, batchSize), runBatch);

  const missing = ceded.findIndex((value) => Number.isNaN(value));
  if (missing !== -1) {
    throw new ComputationError(`Trial ${missing} was never executed`, {
      scenario: model.scenario,
      trial: missing,
      completed,
    });
  }

  LogHelpers.scenario(logger, model.scenario, model.trials, Date.now() - startedAt, {
    seed: model.streams.seed,
  });

  return new CededLossDistribution(model.scenario, ceded);
}
