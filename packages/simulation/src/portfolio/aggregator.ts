/**
 * Portfolio loss aggregation
 */

import { ComputationError } from '@xolrisk/utils';

/**
 * Gross portfolio loss for one trial: the sum of its claim severities
 * (0 when no claim occurred). Summed in claim order.
 */
export function aggregatePortfolioLoss(claimCount: number, severities: readonly number[]): number {
  if (severities.length !== claimCount) {
    throw new ComputationError(
      `Expected ${claimCount} severities, got ${severities.length}`,
      { claimCount, received: severities.length }
    );
  }

  let gross = 0;
  for (let i = 0; i < severities.length; i++) {
    gross += severities[i];
  }
  return gross;
}
