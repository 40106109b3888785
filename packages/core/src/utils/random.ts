/**
 * Seedable random source for tree generation.
 *
 * Generation takes its randomness as an explicit parameter so two parties can
 * rebuild the same tree from a shared seed, and tests can assert determinism
 * without touching process-wide state.
 */

export interface RandomSource {
  /** Next unsigned 32-bit integer */
  nextUint32(): number;
  /** Uniform integer in `[0, maxExclusive)` */
  nextInt(maxExclusive: number): number;
  /** Fisher–Yates shuffle in place; returns the same array */
  shuffle<T>(items: T[]): T[];
}

export type Seed = number | string;

// xorshift32 never leaves 0, so a zero seed is replaced by this constant
const ZERO_SEED_REPLACEMENT = 0x9e3779b9;

/**
 * 32-bit FNV-1a hash of a string seed
 */
export function hashSeed(seed: string): number {
  let h = 2166136261 >>> 0;
  for (let i = 0; i < seed.length; i++) {
    h ^= seed.charCodeAt(i);
    h = Math.imul(h, 16777619) >>> 0;
  }
  return h >>> 0;
}

/**
 * Unsigned 32-bit integers seed the generator directly. Strings, and numbers
 * outside that range, are hashed from their decimal text so distinct seeds
 * stay distinct instead of wrapping.
 */
export function normalizeSeed(seed: Seed): number {
  if (typeof seed === 'number' && !Number.isFinite(seed)) {
    throw new RangeError(`Seed must be a finite number, got ${seed}`);
  }
  const isUint32 = typeof seed === 'number' && Number.isInteger(seed) && seed >= 0 && seed <= 0xffffffff;
  const value = isUint32 ? seed : hashSeed(String(seed));
  return value === 0 ? ZERO_SEED_REPLACEMENT : value;
}

/**
 * xorshift32 generator
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: Seed) {
    this.state = normalizeSeed(seed);
  }

  nextUint32(): number {
    let x = this.state;
    x ^= (x << 13) >>> 0;
    x ^= x >>> 17;
    x ^= (x << 5) >>> 0;
    this.state = x >>> 0;
    return this.state;
  }

  nextInt(maxExclusive: number): number {
    if (!Number.isInteger(maxExclusive) || maxExclusive < 1 || maxExclusive > 0x100000000) {
      throw new RangeError(`maxExclusive must be an integer in [1, 2^32], got ${maxExclusive}`);
    }
    // Rejection sampling keeps the draw uniform when 2^32 is not a multiple of the bound
    const limit = 0x100000000 - (0x100000000 % maxExclusive);
    let value = this.nextUint32();
    while (value >= limit) {
      value = this.nextUint32();
    }
    return value % maxExclusive;
  }

  shuffle<T>(items: T[]): T[] {
    for (let i = items.length - 1; i > 0; i--) {
      const j = this.nextInt(i + 1);
      [items[i], items[j]] = [items[j], items[i]];
    }
    return items;
  }
}

export function createRandomSource(seed?: Seed): RandomSource {
  return new SeededRandom(seed ?? Math.floor(Math.random() * 0x100000000));
}
