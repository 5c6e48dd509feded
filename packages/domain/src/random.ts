/** Largest seed accepted anywhere; generated seeds stay below it. */
export const MAX_SEED = 2_147_483_647;

/**
 * Source of uniform draws in [0, 1). Every stochastic model in the twin takes
 * one of these instead of reaching for `Math.random`, so that a fixed seed
 * reproduces the exact draw sequence of a run.
 */
export abstract class RandomSource {
  abstract next(): number;

  uniform(min: number, max: number): number {
    return min + (max - min) * this.next();
  }

  /** Integer in [min, max], both ends included. */
  randomInt(min: number, max: number): number {
    const lower = Math.ceil(Math.min(min, max));
    const upper = Math.floor(Math.max(min, max));
    return lower + Math.floor(this.next() * (upper - lower + 1));
  }

  chance(probability: number): boolean {
    return this.next() < probability;
  }

  weightedIndex(weights: readonly number[]): number {
    const total = weights.reduce((sum, weight) => sum + Math.max(0, weight), 0);
    if (!(total > 0)) {
      throw new RangeError("weightedIndex requires at least one positive weight");
    }
    const target = this.next() * total;
    let cumulative = 0;
    for (let index = 0; index < weights.length; index += 1) {
      cumulative += Math.max(0, weights[index]);
      if (target < cumulative) {
        return index;
      }
    }
    return weights.length - 1;
  }
}

/** mulberry32: small, fast and good enough for weather and load noise. */
export class SeededRandom extends RandomSource {
  private state: number;

  constructor(readonly seed: number) {
    super();
    if (!Number.isInteger(seed)) {
      throw new TypeError("SeededRandom requires an integer seed");
    }
    if (seed < 0 || seed > MAX_SEED) {
      throw new RangeError(`SeededRandom seed must lie in [0, ${MAX_SEED}], got ${seed}`);
    }
    this.state = seed | 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4_294_967_296;
  }
}

export function generateSeed(nowMs: number = Date.now()): number {
  return Math.floor(nowMs * 1000) % MAX_SEED;
}
