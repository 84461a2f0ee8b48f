/**
 * Ceded-loss distribution: one value per trial, stored by trial index.
 */

import { ComputationError } from '@xolrisk/utils';
import type { ScenarioKind } from '../types/index.js';

export class CededLossDistribution implements Iterable<number> {
  readonly scenario: ScenarioKind;
  private readonly values: Float64Array;

  /**
   * Takes ownership of `values`; callers must not keep a reference
   */
  constructor(scenario: ScenarioKind, values: Float64Array) {
    this.scenario = scenario;
    this.values = values;
  }

  get length(): number {
    return this.values.length;
  }

  valueAt(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.values.length) {
      throw new RangeError(`Trial index ${index} out of range [0, ${this.values.length})`);
    }
    return this.values[index];
  }

  toArray(): number[] {
    return Array.from(this.values);
  }

  /**
   * Ascending copy for order statistics
   */
  sorted(): Float64Array {
    return Float64Array.from(this.values).sort();
  }

  /**
   * Throws unless the distribution is non-empty and every value is finite
   */
  assertValid(): void {
    if (this.values.length === 0) {
      throw new ComputationError('Ceded-loss distribution is empty', { scenario: this.scenario });
    }
    for (let i = 0; i < this.values.length; i++) {
      if (!Number.isFinite(this.values[i])) {
        throw new ComputationError(`Non-finite ceded loss at trial ${i}`, {
          scenario: this.scenario,
          trial: i,
          value: this.values[i],
        });
      }
    }
  }

  [Symbol.iterator](): Iterator<number> {
    return this.values[Symbol.iterator]();
  }
}
