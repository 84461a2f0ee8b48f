/**
 * Analysis entry points
 *
 * runAnalysis validates a raw configuration, builds the baseline and stressed
 * scenarios (both before any random draw) and returns their risk metrics.
 */

import { RandomStreamProvider } from '@xolrisk/core';
import { LogHelpers } from '@xolrisk/utils';
import { parseCompareConfig, parseSimulationConfig } from './config.js';
import type { LayerConfig, SimulationConfig } from './config.js';
import { buildScenario, runScenario } from './engine/scenario-engine.js';
import type { RunScenarioOptions } from './engine/scenario-engine.js';
import { logger } from './logger.js';
import { calculateRiskMetrics } from './metrics/risk-metrics.js';
import { METRIC_NAMES } from './types/index.js';
import type { MetricName, RiskMetrics } from './types/index.js';

export type AnalysisOptions = Omit<RunScenarioOptions, 'onTrial'>;

export interface AnalysisResult {
  readonly baseline: RiskMetrics;
  readonly stressed: RiskMetrics;
}

export interface LayerComparison extends AnalysisResult {
  readonly label: string;
  readonly layer: LayerConfig;
  readonly premium: number;
}

export interface MetricChange {
  readonly metric: MetricName;
  readonly baseline: number;
  readonly stressed: number;
  /** stressed − baseline */
  readonly change: number;
  /** change / baseline; null when the baseline value is 0 */
  readonly relativeChange: number | null;
}

async function analyzeConfig(
  config: SimulationConfig,
  options: AnalysisOptions
): Promise<AnalysisResult> {
  const provider = new RandomStreamProvider(config.seed);
  const baselineModel = buildScenario(config, 'baseline', provider);
  const stressedModel = buildScenario(config, 'stressed', provider);

  const baselineLosses = await runScenario(baselineModel, options);
  const stressedLosses = await runScenario(stressedModel, options);

  return {
    baseline: calculateRiskMetrics(baselineLosses, { premium: config.premium }),
    stressed: calculateRiskMetrics(stressedLosses, { premium: config.premium }),
  };
}

/**
 * Run the baseline and stressed scenarios for one layer.
 *
 * @throws ConfigError before any simulation work when `input` is invalid
 */
export async function runAnalysis(
  input: unknown,
  options: AnalysisOptions = {}
): Promise<AnalysisResult> {
  const config = parseSimulationConfig(input);
  const startedAt = Date.now();

  logger.debug('Starting analysis', {
    seed: config.seed,
    trials: config.trials,
    layer: config.layer,
    inflationRate: config.inflationRate,
  });

  const result = await analyzeConfig(config, options);

  LogHelpers.performance(logger, 'runAnalysis', Date.now() - startedAt, {
    seed: config.seed,
    trials: config.trials,
  });
  logger.info('Analysis completed', {
    seed: config.seed,
    trials: config.trials,
    baselineExpectedLoss: result.baseline.expectedLoss,
    stressedExpectedLoss: result.stressed.expectedLoss,
  });

  return result;
}

/**
 * Evaluate several candidate layers against the same claims. Every candidate
 * shares the seed, so differences between rows come from the layer terms and
 * premium alone.
 */
export async function compareLayers(
  input: unknown,
  options: AnalysisOptions = {}
): Promise<LayerComparison[]> {
  const { layers, ...base } = parseCompareConfig(input);
  const startedAt = Date.now();

  const rows: LayerComparison[] = [];
  for (const { label, premium, ...layer } of layers) {
    const result = await analyzeConfig({ ...base, layer, premium }, options);
    rows.push({ label, layer, premium, ...result });
  }

  LogHelpers.performance(logger, 'compareLayers', Date.now() - startedAt, {
    seed: base.seed,
    trials: base.trials,
  });
  logger.info('Layer comparison completed', {
    seed: base.seed,
    trials: base.trials,
    layers: rows.length,
  });

  return rows;
}

/**
 * Change of every metric from the baseline to the stressed scenario
 */
export function summarizeStress(baseline: RiskMetrics, stressed: RiskMetrics): MetricChange[] {
  return METRIC_NAMES.map((metric) => {
    const change = stressed[metric] - baseline[metric];
    return {
      metric,
      baseline: baseline[metric],
      stressed: stressed[metric],
      change,
      relativeChange: baseline[metric] === 0 ? null : change / baseline[metric],
    };
  });
}
