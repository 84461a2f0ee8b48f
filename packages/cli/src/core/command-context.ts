/**
 * Command Context - what a handler needs beyond its arguments
 *
 * This is NOT a framework: a clock for report timestamps and an optional
 * abort signal. Tests pass a fixed clock.
 */

import { DateTime } from 'luxon';

export interface CommandContext {
  now(): DateTime;
  signal?: AbortSignal;
}

export interface CommandContextOptions {
  clock?: () => DateTime;
  signal?: AbortSignal;
}

export function createCommandContext(options: CommandContextOptions = {}): CommandContext {
  const clock = options.clock ?? (() => DateTime.utc());
  return {
    now: clock,
    signal: options.signal,
  };
}
