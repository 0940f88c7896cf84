/**
 * Determinism Contract
 *
 * Randomized input decks must be replayable: the same seed yields the same
 * sequence of draws and therefore byte-identical decks. Code that draws
 * random values takes a DeterministicRNG instead of calling Math.random().
 */

/**
 * Deterministic random number generator interface
 */
export interface DeterministicRNG {
  /**
   * Generate next random number in [0, 1)
   */
  next(): number;

  /**
   * Generate next random float in [min, max)
   */
  nextFloat(min: number, max: number): number;

  /**
   * Seed this generator was created with
   */
  getSeed(): number;
}

/**
 * Seeded random number generator (mulberry32 over a splitmix32-scrambled seed)
 *
 * 32-bit state, fast, and identical across platforms since it only uses
 * integer arithmetic via Math.imul.
 */
export class SeededRNG implements DeterministicRNG {
  private state: number;
  private readonly seed: number;

  constructor(seed: number) {
    if (!Number.isSafeInteger(seed)) {
      throw new RangeError(`Seed must be a safe integer, got ${seed}`);
    }
    this.seed = seed;

    // splitmix32 so that nearby seeds start far apart
    let z = (seed + 0x9e3779b9) | 0;
    z = Math.imul(z ^ (z >>> 16), 0x85ebca6b);
    z = Math.imul(z ^ (z >>> 13), 0xc2b2ae35);
    this.state = (z ^ (z >>> 16)) >>> 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  nextFloat(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  getSeed(): number {
    return this.seed;
  }
}

/**
 * Create a deterministic RNG from a seed
 *
 * Without a seed one is taken from the current timestamp. Callers that want
 * a reproducible run should report getSeed() so it can be replayed.
 */
export function createDeterministicRNG(seed?: number): DeterministicRNG {
  const actualSeed = seed ?? Date.now() % 2 ** 31;
  return new SeededRNG(actualSeed);
}
