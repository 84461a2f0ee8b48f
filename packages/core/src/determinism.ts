/**
 * Determinism Contract
 *
 * Core types for seeded, replayable simulations. Every simulation is:
 * - Seeded (same seed → same results)
 * - Keyed (each trial draws from its own stream, never from a shared one)
 * - Replayable (same inputs + seed → bit-identical outputs)
 */

/**
 * Seed used when a configuration does not name one
 */
export const DEFAULT_SEED = 20240601;

const TWO_POW_32 = 4294967296;
const TWO_POW_26 = 67108864;
const TWO_POW_53 = 9007199254740992;

/**
 * Deterministic random number generator interface
 *
 * Replaces Math.random() to ensure seeded, deterministic randomness.
 */
export interface DeterministicRNG {
  /**
   * Generate next random number in [0, 1)
   */
  next(): number;

  /**
   * Generate next random number in (0, 1), safe to pass to Math.log
   */
  nextOpen(): number;

  /**
   * Generate next standard normal draw
   */
  nextStandardNormal(): number;

  /**
   * Generate next random integer in [min, max] (inclusive)
   */
  nextInt(min: number, max: number): number;

  /**
   * Generate next random float in [min, max)
   */
  nextFloat(min: number, max: number): number;

  /**
   * Seed this generator was built from (key parts not included)
   */
  getSeed(): number;

  /**
   * Clone RNG state; the clone and the original then advance independently
   */
  clone(): DeterministicRNG;
}

function rotl(x: number, k: number): number {
  return (x << k) | (x >>> (32 - k));
}

// murmur3 finalizer
function fmix32(h: number): number {
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
}

const LANE_INIT = [0x6a09e667, 0xbb67ae85, 0x3c6ef372, 0xa54ff53a] as const;

/**
 * Hash integer key parts into a 128-bit generator state.
 *
 * Integers up to 2^53 are split into two 32-bit words so large seeds
 * (timestamps, hashes) keep all their bits.
 */
export function deriveState(parts: readonly number[]): [number, number, number, number] {
  const state: number[] = [...LANE_INIT];

  for (const part of parts) {
    const lo = part >>> 0;
    const hi = Math.floor(part / TWO_POW_32) >>> 0;
    for (let lane = 0; lane < 4; lane++) {
      let h = fmix32(((state[lane] ?? 0) ^ lo) >>> 0);
      h = fmix32((h + hi + Math.imul(lane + 1, 0x9e3779b9)) >>> 0);
      state[lane] = h;
    }
  }

  const [a = 0, b = 0, c = 0, d = 0] = state;
  return a === 0 && b === 0 && c === 0 && d === 0 ? [1, 0, 0, 0] : [a, b, c, d];
}

/**
 * Seeded random number generator using xoshiro128**
 *
 * 32-bit integer arithmetic only, 2^128 − 1 period.
 */
export class SeededRNG implements DeterministicRNG {
  private s0: number;
  private s1: number;
  private s2: number;
  private s3: number;
  private spareNormal: number | null = null;
  private readonly seed: number;

  constructor(seed: number, ...keyParts: number[]) {
    if (!Number.isSafeInteger(seed) || !keyParts.every((p) => Number.isSafeInteger(p))) {
      throw new RangeError(
        `RNG seed and key parts must be safe integers, got ${[seed, ...keyParts].join(', ')}`
      );
    }
    this.seed = seed;
    const state = deriveState([seed, ...keyParts]);
    this.s0 = state[0];
    this.s1 = state[1];
    this.s2 = state[2];
    this.s3 = state[3];
  }

  private nextUint32(): number {
    const result = Math.imul(rotl(Math.imul(this.s1, 5), 7), 9) >>> 0;
    const t = this.s1 << 9;

    this.s2 ^= this.s0;
    this.s3 ^= this.s1;
    this.s1 ^= this.s2;
    this.s0 ^= this.s3;
    this.s2 ^= t;
    this.s3 = rotl(this.s3, 11);

    return result;
  }

  next(): number {
    const a = this.nextUint32() >>> 5;
    const b = this.nextUint32() >>> 6;
    return (a * TWO_POW_26 + b) / TWO_POW_53;
  }

  /**
   * Midpoints of a 2^52 grid: never exactly 0 or 1
   */
  nextOpen(): number {
    const a = this.nextUint32() >>> 6;
    const b = this.nextUint32() >>> 6;
    return (2 * (a * TWO_POW_26 + b) + 1) / TWO_POW_53;
  }

  /**
   * Box–Muller; the second variate of each pair is kept for the next call
   */
  nextStandardNormal(): number {
    if (this.spareNormal !== null) {
      const spare = this.spareNormal;
      this.spareNormal = null;
      return spare;
    }

    const radius = Math.sqrt(-2 * Math.log(this.nextOpen()));
    const angle = 2 * Math.PI * this.next();
    this.spareNormal = radius * Math.sin(angle);
    return radius * Math.cos(angle);
  }

  nextInt(min: number, max: number): number {
    const range = max - min + 1;
    return min + Math.floor(this.next() * range);
  }

  nextFloat(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  getSeed(): number {
    return this.seed;
  }

  clone(): DeterministicRNG {
    const cloned = new SeededRNG(this.seed);
    cloned.s0 = this.s0;
    cloned.s1 = this.s1;
    cloned.s2 = this.s2;
    cloned.s3 = this.s3;
    cloned.spareNormal = this.spareNormal;
    return cloned;
  }
}

/**
 * Create a deterministic RNG from a seed
 *
 * Without a seed, DEFAULT_SEED is used so runs stay reproducible.
 */
export function createDeterministicRNG(seed: number = DEFAULT_SEED): DeterministicRNG {
  return new SeededRNG(seed);
}

/**
 * Generate a deterministic seed from a string
 *
 * Useful for turning scenario ids and run labels into stream key parts.
 */
export function seedFromString(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    hash = (hash << 5) - hash + char;
    hash = hash & hash; // Convert to 32-bit integer
  }
  return Math.abs(hash);
}
