/**
 * Analysis entry point tests
 */

import { describe, it, expect, vi } from 'vitest';
import { ConfigError, LogHelpers } from '@xolrisk/utils';
import { compareLayers, runAnalysis, summarizeStress } from '../../src/analysis.js';
import type { TrialExecutor } from '../../src/engine/trial-executor.js';
import type { RiskMetrics } from '../../src/types/index.js';
import { ReverseTrialExecutor } from '../helpers/executors.js';

const base = {
  trials: 2_000,
  frequency: { lambda: 2 },
  severity: { mean: 10_000, stdDev: 5_000 },
  inflationRate: 0.08,
  seed: 42,
};

const input = {
  ...base,
  layer: { retention: 20_000, limit: 50_000 },
  premium: 5_000,
};

describe('runAnalysis', () => {
  it('returns metrics for both scenarios', async () => {
    const { baseline, stressed } = await runAnalysis(input);

    expect(baseline.scenario).toBe('baseline');
    expect(stressed.scenario).toBe('stressed');
    expect(baseline.trials).toBe(2_000);
    expect(baseline.triggerProbability).toBeGreaterThan(0);
    expect(baseline.triggerProbability).toBeLessThan(1);
    expect(baseline.tvar99).toBeGreaterThanOrEqual(baseline.var99);
    expect(baseline.var99).toBeLessThanOrEqual(50_000);
    expect(baseline.valueForMoney).toBe(baseline.expectedLoss / 5_000);
  });

  it('is reproducible for a fixed seed', async () => {
    expect(await runAnalysis(input)).toEqual(await runAnalysis(input));
  });

  it('does not depend on batch order', async () => {
    const inline = await runAnalysis(input, { batchSize: 300 });
    const reversed = await runAnalysis(input, {
      batchSize: 300,
      executor: new ReverseTrialExecutor(),
    });
    expect(reversed).toEqual(inline);
  });

  it('reports its duration through the performance log', async () => {
    const performance = vi.spyOn(LogHelpers, 'performance');
    await runAnalysis(input);
    expect(performance).toHaveBeenCalledTimes(1);
    expect(performance).toHaveBeenCalledWith(
      expect.anything(),
      'runAnalysis',
      expect.any(Number),
      { seed: 42, trials: 2_000 }
    );
  });

  it('changes with the seed', async () => {
    const a = await runAnalysis(input);
    const b = await runAnalysis({ ...input, seed: 43 });
    expect(a.baseline.expectedLoss).not.toBe(b.baseline.expectedLoss);
  });

  it.each([
    ['a negative Poisson mean', { ...input, frequency: { lambda: -1 } }],
    ['a negative retention', { ...input, layer: { retention: -1, limit: 50_000 } }],
    ['a negative limit', { ...input, layer: { retention: 20_000, limit: -1 } }],
    ['zero trials', { ...input, trials: 0 }],
    ['zero sigma', { ...input, severity: { mu: 9, sigma: 0 } }],
  ])('rejects %s before any simulation work', async (_label, invalid) => {
    const execute = vi.fn(async () => {});
    const executor: TrialExecutor = { execute };

    await expect(runAnalysis(invalid, { executor })).rejects.toBeInstanceOf(ConfigError);
    expect(execute).not.toHaveBeenCalled();
  });
});

describe('compareLayers', () => {
  const layers = [
    { label: 'low', retention: 10_000, limit: 'unlimited', premium: 9_000 },
    { label: 'high', retention: 30_000, limit: 'unlimited', premium: 3_000 },
  ];

  it('returns one row per candidate', async () => {
    const rows = await compareLayers({ ...base, layers });

    expect(rows.map((row) => row.label)).toEqual(['low', 'high']);
    expect(rows[1]?.layer).toEqual({ retention: 30_000, limit: Infinity, basis: 'aggregate' });
    expect(rows[1]?.premium).toBe(3_000);
  });

  it('matches a single-layer analysis with the same seed', async () => {
    const [low] = await compareLayers({ ...base, layers });
    const single = await runAnalysis({
      ...base,
      layer: { retention: 10_000, limit: 'unlimited' },
      premium: 9_000,
    });

    expect(low?.baseline).toEqual(single.baseline);
    expect(low?.stressed).toEqual(single.stressed);
  });

  it('cedes less as the retention rises', async () => {
    const [low, high] = await compareLayers({ ...base, layers });
    expect(high?.baseline.expectedLoss).toBeLessThan(low?.baseline.expectedLoss ?? 0);
    expect(high?.baseline.triggerProbability).toBeLessThan(low?.baseline.triggerProbability ?? 0);
  });

  it('validates every candidate up front', async () => {
    const execute = vi.fn(async () => {});
    const invalid = [...layers, { label: 'bad', retention: -1, limit: 10, premium: 1 }];

    await expect(
      compareLayers({ ...base, layers: invalid }, { executor: { execute } })
    ).rejects.toBeInstanceOf(ConfigError);
    expect(execute).not.toHaveBeenCalled();
  });
});

describe('summarizeStress', () => {
  const metrics = (scenario: RiskMetrics['scenario'], scale: number): RiskMetrics => ({
    scenario,
    trials: 100,
    expectedLoss: 1_000 * scale,
    stdDev: 500 * scale,
    var99: 4_000 * scale,
    tvar99: 5_000 * scale,
    triggerProbability: 0,
    valueForMoney: 0.5 * scale,
  });

  it('reports absolute and relative change per metric', () => {
    const changes = summarizeStress(metrics('baseline', 1), metrics('stressed', 1.5));

    expect(changes.map((c) => c.metric)).toEqual([
      'expectedLoss',
      'stdDev',
      'var99',
      'tvar99',
      'triggerProbability',
      'valueForMoney',
    ]);
    expect(changes[0]).toEqual({
      metric: 'expectedLoss',
      baseline: 1_000,
      stressed: 1_500,
      change: 500,
      relativeChange: 0.5,
    });
  });

  it('has no relative change from a zero baseline', () => {
    const [, , , , trigger] = summarizeStress(metrics('baseline', 1), metrics('stressed', 2));
    expect(trigger).toEqual({
      metric: 'triggerProbability',
      baseline: 0,
      stressed: 0,
      change: 0,
      relativeChange: null,
    });
  });
});
