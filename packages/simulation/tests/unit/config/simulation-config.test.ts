/**
 * Simulation config validation tests
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_SEED } from '@xolrisk/core';
import { ConfigError } from '@xolrisk/utils';
import { MAX_TRIALS, parseCompareConfig, parseSimulationConfig } from '../../../src/config.js';
import { catchError } from '../../helpers/errors.js';

const base = {
  trials: 1_000,
  frequency: { lambda: 2 },
  severity: { mean: 10_000, stdDev: 5_000 },
  inflationRate: 0.08,
};

const validInput = {
  ...base,
  layer: { retention: 20_000, limit: 50_000 },
  premium: 5_000,
};

function configKeyOf(input: unknown): unknown {
  const error = catchError(() => parseSimulationConfig(input));
  expect(error).toBeInstanceOf(ConfigError);
  return error instanceof ConfigError ? error.configKey : undefined;
}

describe('parseSimulationConfig', () => {
  it('normalizes shorthand input', () => {
    const config = parseSimulationConfig(validInput);

    expect(config.frequency).toEqual({ kind: 'poisson', lambda: 2 });
    expect(config.severity.kind).toBe('lognormal');
    expect(config.severity.mu).toBeCloseTo(Math.log(10_000) - Math.log(1.25) / 2, 12);
    expect(config.severity.sigma).toBeCloseTo(Math.sqrt(Math.log(1.25)), 12);
    expect(config.layer).toEqual({ retention: 20_000, limit: 50_000, basis: 'aggregate' });
    expect(config.seed).toBe(DEFAULT_SEED);
  });

  it('returns a frozen config', () => {
    expect(Object.isFrozen(parseSimulationConfig(validInput))).toBe(true);
  });

  it('accepts explicit lognormal parameters', () => {
    const config = parseSimulationConfig({ ...validInput, severity: { mu: 9, sigma: 0.5 } });
    expect(config.severity).toEqual({ kind: 'lognormal', mu: 9, sigma: 0.5 });
  });

  it('accepts a binomial frequency', () => {
    const config = parseSimulationConfig({
      ...validInput,
      frequency: { kind: 'binomial', policies: 100, claimProbability: 0.02 },
    });
    expect(config.frequency).toEqual({ kind: 'binomial', policies: 100, claimProbability: 0.02 });
  });

  it('maps an unlimited layer to Infinity', () => {
    const config = parseSimulationConfig({
      ...validInput,
      layer: { retention: 20_000, limit: 'unlimited', basis: 'per-claim' },
    });
    expect(config.layer).toEqual({ retention: 20_000, limit: Infinity, basis: 'per-claim' });
  });

  it('keeps an explicit seed', () => {
    expect(parseSimulationConfig({ ...validInput, seed: 42 }).seed).toBe(42);
  });

  it.each([
    ['trials', { ...validInput, trials: 0 }],
    ['trials', { ...validInput, trials: MAX_TRIALS + 1 }],
    ['trials', { ...validInput, trials: 10.5 }],
    ['frequency.lambda', { ...validInput, frequency: { lambda: -1 } }],
    ['severity.sigma', { ...validInput, severity: { mu: 9, sigma: 0 } }],
    ['severity.stdDev', { ...validInput, severity: { mean: 10_000, stdDev: -5 } }],
    ['layer.retention', { ...validInput, layer: { retention: -1, limit: 50_000 } }],
    ['layer.limit', { ...validInput, layer: { retention: 20_000, limit: -1 } }],
    ['inflationRate', { ...validInput, inflationRate: -0.1 }],
    ['premium', { ...validInput, premium: 0 }],
    ['seed', { ...validInput, seed: 1.5 }],
  ])('rejects an invalid %s', (key, input) => {
    expect(configKeyOf(input)).toBe(key);
  });

  it('lists every offending field in the message', () => {
    const error = catchError(() =>
      parseSimulationConfig({ ...validInput, trials: 0, premium: -1 })
    );
    expect(error).toBeInstanceOf(ConfigError);
    if (error instanceof ConfigError) {
      expect(error.message).toMatch(/^Invalid simulation config: trials: .+; premium: .+$/);
      expect(error.code).toBe('CONFIG_ERROR');
    }
  });

  it('rejects a non-object without naming a field', () => {
    expect(configKeyOf('trials: 10')).toBeUndefined();
  });
});

describe('parseCompareConfig', () => {
  it('parses candidate layers', () => {
    const config = parseCompareConfig({
      ...base,
      layers: [
        { label: 'low', retention: 10_000, limit: 50_000, premium: 8_000 },
        { label: 'high', retention: 30_000, limit: 'unlimited', premium: 4_000 },
      ],
    });

    expect(config.layers).toEqual([
      { label: 'low', retention: 10_000, limit: 50_000, basis: 'aggregate', premium: 8_000 },
      { label: 'high', retention: 30_000, limit: Infinity, basis: 'aggregate', premium: 4_000 },
    ]);
  });

  it('requires at least one layer', () => {
    const error = catchError(() => parseCompareConfig({ ...base, layers: [] }));
    expect(error).toMatchObject({ configKey: 'layers' });
  });

  it('rejects duplicate labels', () => {
    const error = catchError(() =>
      parseCompareConfig({
        ...base,
        layers: [
          { label: 'a', retention: 10_000, limit: 50_000, premium: 8_000 },
          { label: 'a', retention: 30_000, limit: 50_000, premium: 4_000 },
        ],
      })
    );
    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ configKey: 'layers.1.label' });
  });
});
