/**
 * Trial execution
 *
 * A run is cut into contiguous batches of trial indices. An executor may run
 * batches in any order; each trial draws only from its own keyed stream and
 * writes only its own slot, so the order never shows in the results.
 */

import { setImmediate as yieldToEventLoop } from 'timers/promises';

export interface TrialBatch {
  /** First trial index (inclusive) */
  readonly start: number;
  /** Last trial index (exclusive) */
  readonly end: number;
}

export type BatchRunner = (batch: TrialBatch) => void;

export interface TrialExecutor {
  /**
   * Run every batch exactly once. Resolves when all batches are done; rejects
   * with the first error a batch throws.
   */
  execute(batches: readonly TrialBatch[], run: BatchRunner): Promise<void>;
}

/**
 * Split `trials` indices into batches of at most `batchSize`
 */
export function planBatches(trials: number, batchSize: number): TrialBatch[] {
  if (!Number.isSafeInteger(trials) || trials < 0) {
    throw new RangeError(`Trial count must be a non-negative integer, got ${trials}`);
  }
  if (!Number.isSafeInteger(batchSize) || batchSize <= 0) {
    throw new RangeError(`Batch size must be a positive integer, got ${batchSize}`);
  }

  const batches: TrialBatch[] = [];
  for (let start = 0; start < trials; start += batchSize) {
    batches.push({ start, end: Math.min(start + batchSize, trials) });
  }
  return batches;
}

/**
 * Runs batches in order on the calling thread, yielding to the event loop
 * between batches so timers and abort signals get a turn.
 */
export class InlineTrialExecutor implements TrialExecutor {
  async execute(batches: readonly TrialBatch[], run: BatchRunner): Promise<void> {
    for (const batch of batches) {
      run(batch);
      await yieldToEventLoop();
    }
  }
}
