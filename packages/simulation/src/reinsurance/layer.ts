/**
 * Excess-of-Loss layer
 *
 * The reinsurer pays the part of a loss above the retention, up to the
 * limit: ceded = clamp(G − R, 0, L), retained = G − ceded.
 *
 * With `aggregate` basis the layer applies to the trial's summed portfolio
 * loss. With `per-claim` basis every claim is ceded on its own and the
 * cessions are summed; the limit then caps each claim, not the trial.
 */

import { ComputationError, ConfigError } from '@xolrisk/utils';
import { aggregatePortfolioLoss } from '../portfolio/aggregator.js';

export type LayerBasis = 'aggregate' | 'per-claim';

export interface LayerTerms {
  retention: number;
  /** Infinity for an unlimited layer */
  limit: number;
  basis?: LayerBasis;
}

export interface LayerSplit {
  gross: number;
  ceded: number;
  retained: number;
}

function cededAbove(loss: number, retention: number, limit: number): number {
  if (loss <= retention) return 0;
  return Math.min(loss - retention, limit);
}

export class ExcessOfLossLayer {
  readonly retention: number;
  readonly limit: number;
  readonly basis: LayerBasis;

  constructor({ retention, limit, basis = 'aggregate' }: LayerTerms) {
    if (!Number.isFinite(retention) || retention < 0) {
      throw new ConfigError(
        `Retention must be finite and >= 0, got ${retention}`,
        'layer.retention',
        { retention }
      );
    }
    if (Number.isNaN(limit) || limit < 0) {
      throw new ConfigError(`Limit must be >= 0, got ${limit}`, 'layer.limit', { limit });
    }
    this.retention = retention;
    this.limit = limit;
    this.basis = basis;
  }

  get isUnlimited(): boolean {
    return this.limit === Infinity;
  }

  /**
   * Split a single loss into ceded and retained parts
   */
  cede(gross: number): LayerSplit {
    if (!Number.isFinite(gross) || gross < 0) {
      throw new ComputationError(`Gross loss must be finite and >= 0, got ${gross}`, { gross });
    }
    const ceded = cededAbove(gross, this.retention, this.limit);
    return { gross, ceded, retained: gross - ceded };
  }

  /**
   * Split a trial's claims according to the layer basis
   */
  cedeClaims(severities: readonly number[]): LayerSplit {
    const gross = aggregatePortfolioLoss(severities.length, severities);
    if (this.basis === 'aggregate') {
      return this.cede(gross);
    }

    let ceded = 0;
    for (let i = 0; i < severities.length; i++) {
      ceded += this.cede(severities[i]).ceded;
    }
    // Per-claim cessions never exceed their claims, so never the sum
    ceded = Math.min(ceded, gross);
    return { gross, ceded, retained: gross - ceded };
  }

  describe(): string {
    const limit = this.isUnlimited ? 'unlimited' : String(this.limit);
    return `${limit} xs ${this.retention} (${this.basis})`;
  }
}
