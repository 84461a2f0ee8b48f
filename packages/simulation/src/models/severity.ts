/**
 * Claim severity model
 *
 * Individual claim sizes are lognormal: ln(X) ~ N(mu, sigma²). Inflation
 * multiplies every claim by (1 + r), which shifts mu by ln(1 + r) and leaves
 * the shape (sigma) untouched.
 */

import type { DeterministicRNG } from '@xolrisk/core';
import { ComputationError, ConfigError } from '@xolrisk/utils';

/**
 * Parameters of the underlying normal distribution
 */
export interface LognormalParams {
  mu: number;
  sigma: number;
}

export interface SeverityModel {
  /** Parameters after any inflation adjustment */
  readonly params: LognormalParams;
  readonly inflationRate: number;
  /** Mean claim size, exp(mu + sigma²/2) */
  readonly mean: number;
  sample(count: number, rng: DeterministicRNG): number[];
}

export interface SeverityOptions {
  inflationRate?: number;
}

function assertParams({ mu, sigma }: LognormalParams): void {
  if (!Number.isFinite(mu)) {
    throw new ConfigError(`Severity mu must be finite, got ${mu}`, 'severity.mu', { mu });
  }
  if (!Number.isFinite(sigma) || sigma <= 0) {
    throw new ConfigError(`Severity sigma must be finite and > 0, got ${sigma}`, 'severity.sigma', {
      sigma,
    });
  }
}

/**
 * Convert the mean and standard deviation of the claim sizes themselves
 * into lognormal parameters
 */
export function lognormalParamsFromMoments(mean: number, stdDev: number): LognormalParams {
  if (!Number.isFinite(mean) || mean <= 0) {
    throw new ConfigError(`Severity mean must be finite and > 0, got ${mean}`, 'severity.mean', {
      mean,
    });
  }
  if (!Number.isFinite(stdDev) || stdDev <= 0) {
    throw new ConfigError(
      `Severity standard deviation must be finite and > 0, got ${stdDev}`,
      'severity.stdDev',
      { stdDev }
    );
  }

  const sigma2 = Math.log(1 + (stdDev * stdDev) / (mean * mean));
  return {
    mu: Math.log(mean) - sigma2 / 2,
    sigma: Math.sqrt(sigma2),
  };
}

/**
 * Shift mu so every claim is scaled by (1 + inflationRate)
 */
export function inflateLognormal(params: LognormalParams, inflationRate: number): LognormalParams {
  if (!Number.isFinite(inflationRate) || inflationRate < 0) {
    throw new ConfigError(
      `Inflation rate must be finite and >= 0, got ${inflationRate}`,
      'inflationRate',
      { inflationRate }
    );
  }
  return { mu: params.mu + Math.log1p(inflationRate), sigma: params.sigma };
}

export function createSeverityModel(
  params: LognormalParams,
  options: SeverityOptions = {}
): SeverityModel {
  assertParams(params);
  const inflationRate = options.inflationRate ?? 0;
  const { mu, sigma } = inflateLognormal(params, inflationRate);

  return {
    params: { mu, sigma },
    inflationRate,
    mean: Math.exp(mu + (sigma * sigma) / 2),
    sample(count: number, rng: DeterministicRNG): number[] {
      if (!Number.isSafeInteger(count) || count < 0) {
        throw new ComputationError(`Claim count must be a non-negative integer, got ${count}`, {
          count,
        });
      }

      const severities = new Array<number>(count);
      for (let i = 0; i < count; i++) {
        const value = Math.exp(mu + sigma * rng.nextStandardNormal());
        if (!Number.isFinite(value) || value <= 0) {
          throw new ComputationError(`Severity draw out of range: ${value}`, { mu, sigma, value });
        }
        severities[i] = value;
      }
      return severities;
    },
  };
}
