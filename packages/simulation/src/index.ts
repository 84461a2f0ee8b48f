/**
 * @xolrisk/simulation
 *
 * Monte Carlo engine for excess-of-loss reinsurance layers.
 */

export * from './types/index.js';
export * from './config.js';
export * from './models/frequency.js';
export * from './models/severity.js';
export * from './portfolio/aggregator.js';
export * from './reinsurance/layer.js';
export * from './engine/index.js';
export * from './metrics/risk-metrics.js';
export * from './analysis.js';
