/**
 * Deterministic PRNG (LCG) shared by every stage of a map run.
 * One instance per run; stages draw from it in a fixed order.
 */
export class SeededRandom {
  private state: number;

  /**
   * @param seed an int32; distinct seeds give distinct streams
   */
  constructor(seed: number = 123456789) {
    this.state = seed >>> 0;
  }

  /** Returns a uint32 and advances state */
  nextU32(): number {
    // Numerical Recipes LCG: (a=1664525, c=1013904223, m=2^32)
    this.state = (Math.imul(1664525, this.state) + 1013904223) >>> 0;
    return this.state;
  }

  /** Float in [0, 1) */
  float(): number {
    return this.nextU32() / 0x100000000;
  }

  /** Float in [min, max) */
  floatIn(min: number, max: number): number {
    return min + (max - min) * this.float();
  }

  /** Int in [min, max] (inclusive) */
  intIn(min: number, max: number): number {
    const a = Math.ceil(min);
    const b = Math.floor(max);
    return a + (this.nextU32() % (b - a + 1));
  }

  /** Bernoulli trial: true with the given probability */
  chance(probability: number): boolean {
    return this.float() < probability;
  }

  /** Pick a random element from a non-empty array */
  choice<T>(arr: readonly T[]): T {
    if (!arr.length) throw new Error("choice() on empty array");
    return arr[this.intIn(0, arr.length - 1)];
  }
}

/** Seed used when the caller supplies none: derived from the clock. */
export function seedFromClock(now: number = Date.now()): number {
  return (now % 0x7fffffff) | 0;
}
