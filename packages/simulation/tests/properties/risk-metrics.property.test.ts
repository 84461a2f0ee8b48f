/**
 * Property Tests for risk metrics
 *
 * Invariants:
 * 1. min ≤ VaR ≤ TVaR ≤ max
 * 2. trigger probability and expected loss stay within the sample's range
 */

import { describe, it } from 'vitest';
import fc from 'fast-check';
import { CededLossDistribution } from '../../src/engine/distribution.js';
import { calculateRiskMetrics, tailValueAtRisk, valueAtRisk } from '../../src/metrics/risk-metrics.js';

const losses = fc.array(fc.double({ min: 0, max: 1e7, noNaN: true }), {
  minLength: 1,
  maxLength: 500,
});

describe('Risk Metrics - Property Tests', () => {
  it('orders VaR and TVaR inside the sample range', () => {
    fc.assert(
      fc.property(losses, fc.double({ min: 0.01, max: 0.999, noNaN: true }), (values, level) => {
        const sorted = Float64Array.from(values).sort();
        const min = sorted[0];
        const max = sorted[sorted.length - 1];
        const v = valueAtRisk(sorted, level);
        const t = tailValueAtRisk(sorted, level);
        return min <= v && v <= t && t <= max;
      })
    );
  });

  it('keeps summary statistics consistent', () => {
    fc.assert(
      fc.property(losses, (values) => {
        const metrics = calculateRiskMetrics(
          new CededLossDistribution('baseline', Float64Array.from(values)),
          { premium: 1_000 }
        );
        const max = Math.max(...values);
        return (
          metrics.triggerProbability >= 0 &&
          metrics.triggerProbability <= 1 &&
          metrics.expectedLoss >= 0 &&
          metrics.expectedLoss <= max * (1 + 1e-12) &&
          metrics.stdDev >= 0 &&
          metrics.tvar99 >= metrics.var99
        );
      })
    );
  });
});
