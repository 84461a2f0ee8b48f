/**
 * Report serialization
 *
 * Reports leave the CLI with snake_case field names. Numbers stay raw in
 * JSON and are rounded only for table display.
 */

import { ComputationError } from '@xolrisk/utils';
import type { LayerConfig, MetricChange, MetricName, RiskMetrics } from '@xolrisk/simulation';
import type { CommandContext } from './command-context.js';

const METRIC_FIELDS = {
  expectedLoss: 'expected_loss',
  stdDev: 'std_dev',
  var99: 'var_99',
  tvar99: 'tvar_99',
  triggerProbability: 'trigger_probability',
  valueForMoney: 'value_for_money',
} as const satisfies Record<MetricName, string>;

export type MetricField = (typeof METRIC_FIELDS)[MetricName];

export type MetricsRecord = Record<MetricField, number>;

export interface LayerRecord {
  retention: number;
  limit: number | 'unlimited';
  basis: LayerConfig['basis'];
}

export interface StressImpactRecord {
  metric: MetricField;
  baseline: number;
  stressed: number;
  change: number;
  relative_change: number | null;
}

export function serializeMetrics(metrics: RiskMetrics): MetricsRecord {
  return {
    expected_loss: metrics.expectedLoss,
    std_dev: metrics.stdDev,
    var_99: metrics.var99,
    tvar_99: metrics.tvar99,
    trigger_probability: metrics.triggerProbability,
    value_for_money: metrics.valueForMoney,
  };
}

export function serializeLayer(layer: LayerConfig): LayerRecord {
  return {
    retention: layer.retention,
    limit: layer.limit === Infinity ? 'unlimited' : layer.limit,
    basis: layer.basis,
  };
}

export function serializeStressImpact(changes: readonly MetricChange[]): StressImpactRecord[] {
  return changes.map((c) => ({
    metric: METRIC_FIELDS[c.metric],
    baseline: c.baseline,
    stressed: c.stressed,
    change: c.change,
    relative_change: c.relativeChange,
  }));
}

/**
 * ISO-8601 timestamp for a report's generated_at field
 */
export function reportTimestamp(ctx: CommandContext): string {
  const iso = ctx.now().toISO();
  if (iso === null) {
    throw new ComputationError('Clock returned an invalid timestamp');
  }
  return iso;
}

/**
 * Table cells for one scenario: amounts to 2 decimals, ratios to 4
 */
export function metricsTableCells(metrics: MetricsRecord): Record<MetricField, string> {
  return {
    expected_loss: metrics.expected_loss.toFixed(2),
    std_dev: metrics.std_dev.toFixed(2),
    var_99: metrics.var_99.toFixed(2),
    tvar_99: metrics.tvar_99.toFixed(2),
    trigger_probability: metrics.trigger_probability.toFixed(4),
    value_for_money: metrics.value_for_money.toFixed(4),
  };
}

export function describeLayer(layer: LayerRecord): string {
  return `${layer.limit} xs ${layer.retention} (${layer.basis})`;
}
