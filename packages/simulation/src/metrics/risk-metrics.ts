/**
 * Risk Metrics Calculator
 *
 * Summary statistics of a ceded-loss distribution. Tail metrics are taken at
 * the 99% level: VaR interpolates linearly between order statistics
 * (h = (n − 1)·q) and TVaR averages every loss at or above VaR.
 */

import { ComputationError, ConfigError } from '@xolrisk/utils';
import type { CededLossDistribution } from '../engine/distribution.js';
import type { RiskMetrics } from '../types/index.js';

export const TAIL_LEVEL = 0.99;

export interface RiskMetricsOptions {
  /** Layer premium; expected ceded loss is divided by it */
  premium: number;
}

function assertLevel(level: number): void {
  if (!Number.isFinite(level) || level <= 0 || level >= 1) {
    throw new RangeError(`Quantile level must be in (0, 1), got ${level}`);
  }
}

/**
 * Quantile of an ascending, non-empty sample by linear interpolation
 */
export function quantile(sorted: ArrayLike<number>, level: number): number {
  if (sorted.length === 0) {
    throw new ComputationError('Cannot take a quantile of an empty sample');
  }
  if (!Number.isFinite(level) || level < 0 || level > 1) {
    throw new RangeError(`Quantile level must be in [0, 1], got ${level}`);
  }

  const h = (sorted.length - 1) * level;
  const lo = Math.floor(h);
  const hi = Math.ceil(h);
  const below = sorted[lo];
  const above = sorted[hi];
  // Rounding must not carry the result past its neighbours
  return Math.min(above, Math.max(below, below + (h - lo) * (above - below)));
}

export function valueAtRisk(sorted: ArrayLike<number>, level: number = TAIL_LEVEL): number {
  assertLevel(level);
  return quantile(sorted, level);
}

/**
 * Mean of the losses at or above VaR. Never below VaR, even where rounding
 * in the mean would put it there.
 */
export function tailValueAtRisk(sorted: ArrayLike<number>, level: number = TAIL_LEVEL): number {
  const threshold = valueAtRisk(sorted, level);

  let sum = 0;
  let count = 0;
  for (let i = sorted.length - 1; i >= 0 && sorted[i] >= threshold; i--) {
    sum += sorted[i];
    count++;
  }
  return Math.max(threshold, sum / count);
}

export function calculateRiskMetrics(
  distribution: CededLossDistribution,
  options: RiskMetricsOptions
): RiskMetrics {
  const { premium } = options;
  if (!Number.isFinite(premium) || premium <= 0) {
    throw new ConfigError(`Premium must be finite and > 0, got ${premium}`, 'premium', {
      premium,
    });
  }
  distribution.assertValid();

  const n = distribution.length;
  let sum = 0;
  let triggered = 0;
  for (const loss of distribution) {
    sum += loss;
    if (loss > 0) triggered++;
  }
  const expectedLoss = sum / n;

  let squares = 0;
  for (const loss of distribution) {
    const diff = loss - expectedLoss;
    squares += diff * diff;
  }

  const sorted = distribution.sorted();

  return {
    scenario: distribution.scenario,
    trials: n,
    expectedLoss,
    stdDev: Math.sqrt(squares / n),
    var99: valueAtRisk(sorted),
    tvar99: tailValueAtRisk(sorted),
    triggerProbability: triggered / n,
    valueForMoney: expectedLoss / premium,
  };
}
