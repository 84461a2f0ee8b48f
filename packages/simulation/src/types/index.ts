/**
 * Shared simulation types
 */

export type ScenarioKind = 'baseline' | 'stressed';

/**
 * One simulated period. Lives only for its own iteration.
 */
export interface Trial {
  readonly index: number;
  readonly claimCount: number;
  readonly severities: readonly number[];
  readonly gross: number;
  readonly ceded: number;
  readonly retained: number;
}

/**
 * Risk metrics of one scenario's ceded-loss distribution
 */
export interface RiskMetrics {
  readonly scenario: ScenarioKind;
  readonly trials: number;
  /** Mean ceded loss */
  readonly expectedLoss: number;
  /** Population standard deviation of ceded loss */
  readonly stdDev: number;
  /** 99th percentile of ceded loss, linear interpolation between order statistics */
  readonly var99: number;
  /** Mean of ceded losses at or above var99 */
  readonly tvar99: number;
  /** Share of trials with a positive ceded loss */
  readonly triggerProbability: number;
  /** expectedLoss / premium */
  readonly valueForMoney: number;
}

export type MetricName = Exclude<keyof RiskMetrics, 'scenario' | 'trials'>;

export const METRIC_NAMES: readonly MetricName[] = [
  'expectedLoss',
  'stdDev',
  'var99',
  'tvar99',
  'triggerProbability',
  'valueForMoney',
];
