/**
 * Claim frequency models
 *
 * Claim counts per trial. Poisson is the standard portfolio model; the
 * binomial variant treats the portfolio as `policies` independent policies
 * that each claim at most once per period.
 */

import type { DeterministicRNG } from '@xolrisk/core';
import { ConfigError } from '@xolrisk/utils';

// Inversion below this mean, transformed rejection above it
const POISSON_INVERSION_CUTOFF = 30;

// exp() underflows below roughly -745
const MIN_LOG_PMF = -700;

export type FrequencyConfig =
  | { kind: 'poisson'; lambda: number }
  | { kind: 'binomial'; policies: number; claimProbability: number };

export interface FrequencyModel {
  readonly kind: FrequencyConfig['kind'];
  /** Expected claims per trial */
  readonly mean: number;
  sample(rng: DeterministicRNG): number;
}

const LANCZOS_COEFFICIENTS = [
  0.99999999999980993, 676.5203681218851, -1259.1392167224028, 771.32342877765313,
  -176.61502916214059, 12.507343278686905, -0.13857109526572012, 9.9843695780195716e-6,
  1.5056327351493116e-7,
];

/**
 * ln Γ(x) for x ≥ 0.5 (Lanczos, g = 7)
 */
export function logGamma(x: number): number {
  const shifted = x - 1;
  let series = LANCZOS_COEFFICIENTS[0];
  for (let i = 1; i < LANCZOS_COEFFICIENTS.length; i++) {
    series += LANCZOS_COEFFICIENTS[i] / (shifted + i);
  }
  const t = shifted + 7.5;
  return 0.5 * Math.log(2 * Math.PI) + (shifted + 0.5) * Math.log(t) - t + Math.log(series);
}

function assertLambda(lambda: number): void {
  if (!Number.isFinite(lambda) || lambda < 0) {
    throw new ConfigError(
      `Poisson mean must be a finite number >= 0, got ${lambda}`,
      'frequency.lambda',
      { lambda }
    );
  }
}

function assertBinomial(policies: number, claimProbability: number): void {
  if (!Number.isSafeInteger(policies) || policies < 0) {
    throw new ConfigError(
      `Policy count must be a non-negative integer, got ${policies}`,
      'frequency.policies',
      { policies }
    );
  }
  if (!(claimProbability >= 0 && claimProbability <= 1)) {
    throw new ConfigError(
      `Claim probability must lie in [0, 1], got ${claimProbability}`,
      'frequency.claimProbability',
      { claimProbability }
    );
  }
}

function poissonByInversion(lambda: number, rng: DeterministicRNG): number {
  const u = rng.next();
  let k = 0;
  let pmf = Math.exp(-lambda);
  let cdf = pmf;

  while (u > cdf) {
    k++;
    pmf *= lambda / k;
    const next = cdf + pmf;
    // The tail no longer moves the CDF: u sits in the rounding gap below 1
    if (next === cdf) break;
    cdf = next;
  }
  return k;
}

/**
 * PTRS transformed rejection (Hörmann, 1993)
 */
function poissonByRejection(lambda: number, rng: DeterministicRNG): number {
  const sqrtLambda = Math.sqrt(lambda);
  const logLambda = Math.log(lambda);
  const b = 0.931 + 2.53 * sqrtLambda;
  const a = -0.059 + 0.02483 * b;
  const invAlpha = 1.1239 + 1.1328 / (b - 3.4);
  const vr = 0.9277 - 3.6224 / (b - 2);

  for (;;) {
    const u = rng.next() - 0.5;
    const v = rng.next();
    const us = 0.5 - Math.abs(u);
    const k = Math.floor(((2 * a) / us + b) * u + lambda + 0.43);

    if (us >= 0.07 && v <= vr) {
      return k;
    }
    if (k < 0 || (us < 0.013 && v > us)) {
      continue;
    }
    if (
      Math.log(v) + Math.log(invAlpha) - Math.log(a / (us * us) + b) <=
      -lambda + k * logLambda - logGamma(k + 1)
    ) {
      return k;
    }
  }
}

/**
 * Draw a Poisson(λ) claim count. λ = 0 yields 0 without consuming a draw.
 */
export function samplePoisson(lambda: number, rng: DeterministicRNG): number {
  assertLambda(lambda);
  if (lambda === 0) return 0;
  return lambda < POISSON_INVERSION_CUTOFF
    ? poissonByInversion(lambda, rng)
    : poissonByRejection(lambda, rng);
}

/**
 * Draw a Binomial(n, p) claim count
 */
export function sampleBinomial(
  policies: number,
  claimProbability: number,
  rng: DeterministicRNG
): number {
  assertBinomial(policies, claimProbability);
  if (policies === 0 || claimProbability === 0) return 0;
  if (claimProbability === 1) return policies;

  const q = 1 - claimProbability;
  const logPmf0 = policies * Math.log(q);

  if (logPmf0 < MIN_LOG_PMF) {
    // P(0) underflows: count Bernoulli successes directly
    let count = 0;
    for (let i = 0; i < policies; i++) {
      if (rng.next() < claimProbability) count++;
    }
    return count;
  }

  const odds = claimProbability / q;
  const u = rng.next();
  let k = 0;
  let pmf = Math.exp(logPmf0);
  let cdf = pmf;

  while (u > cdf && k < policies) {
    pmf *= ((policies - k) / (k + 1)) * odds;
    k++;
    const next = cdf + pmf;
    if (next === cdf) break;
    cdf = next;
  }
  return k;
}

/**
 * Build a frequency model from validated parameters
 */
export function createFrequencyModel(config: FrequencyConfig): FrequencyModel {
  switch (config.kind) {
    case 'poisson': {
      const { lambda } = config;
      assertLambda(lambda);
      return {
        kind: 'poisson',
        mean: lambda,
        sample: (rng) => samplePoisson(lambda, rng),
      };
    }
    case 'binomial': {
      const { policies, claimProbability } = config;
      assertBinomial(policies, claimProbability);
      return {
        kind: 'binomial',
        mean: policies * claimProbability,
        sample: (rng) => sampleBinomial(policies, claimProbability, rng),
      };
    }
  }
}
