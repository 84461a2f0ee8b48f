/**
 * Value Coercion Helpers
 *
 * These functions coerce values (numbers) but NEVER rename keys.
 */

import { ConfigError } from '@xolrisk/utils';

function isString(x: unknown): x is string {
  return typeof x === 'string';
}

/**
 * Coerce a value to a number
 * Accepts:
 * - Number: returns as-is
 * - String number: '123' -> 123
 * - undefined/null returns undefined
 */
export function coerceNumber(v: unknown, name: string): number | undefined {
  if (v === null || v === undefined) return undefined;
  if (typeof v === 'number') return v;
  if (isString(v) && v.trim() !== '') {
    const n = Number(v);
    if (!Number.isFinite(n)) throw new ConfigError(`Invalid number for ${name}`, name, { value: v });
    return n;
  }
  throw new ConfigError(`Invalid number for ${name}`, name, { value: v });
}

/**
 * Coerce a value to an integer; rejects fractional input rather than rounding it
 */
export function coerceInteger(v: unknown, name: string): number | undefined {
  const n = coerceNumber(v, name);
  if (n !== undefined && !Number.isInteger(n)) {
    throw new ConfigError(`Expected an integer for ${name}`, name, { value: v });
  }
  return n;
}
