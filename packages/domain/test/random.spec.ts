import { describe, expect, it } from "vitest";

import { MAX_SEED, RandomSource, SeededRandom, generateSeed } from "../src";

class ScriptedRandom extends RandomSource {
  constructor(private readonly values: number[]) {
    super();
  }

  next(): number {
    const value = this.values.shift();
    if (value === undefined) {
      throw new Error("script exhausted");
    }
    return value;
  }
}

describe("SeededRandom", () => {
  it("replays the same sequence for the same seed", () => {
    const first = new SeededRandom(1234);
    const second = new SeededRandom(1234);
    const a = Array.from({length: 20}, () => first.next());
    const b = Array.from({length: 20}, () => second.next());
    expect(a).toEqual(b);
  });

  it("diverges for different seeds", () => {
    const first = new SeededRandom(1);
    const second = new SeededRandom(2);
    expect(Array.from({length: 5}, () => first.next())).not.toEqual(Array.from({length: 5}, () => second.next()));
  });

  it("stays inside [0, 1)", () => {
    const rng = new SeededRandom(99);
    for (let i = 0; i < 5000; i += 1) {
      const value = rng.next();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it("rejects fractional seeds", () => {
    expect(() => new SeededRandom(1.5)).toThrow(TypeError);
  });

  it("rejects seeds outside [0, MAX_SEED]", () => {
    expect(() => new SeededRandom(-1)).toThrow(RangeError);
    expect(() => new SeededRandom(MAX_SEED + 1)).toThrow(RangeError);
    expect(() => new SeededRandom(5 + 2 ** 32)).toThrow(RangeError);
    expect(new SeededRandom(MAX_SEED).seed).toBe(2_147_483_647);
  });
});

describe("RandomSource helpers", () => {
  it("maps uniform draws onto the requested interval", () => {
    const rng = new ScriptedRandom([0, 0.5]);
    expect(rng.uniform(2, 4)).toBe(2);
    expect(rng.uniform(2, 4)).toBe(3);
  });

  it("includes both bounds in randomInt", () => {
    const rng = new ScriptedRandom([0, 0.999999]);
    expect(rng.randomInt(4, 72)).toBe(4);
    expect(rng.randomInt(4, 72)).toBe(72);
  });

  it("treats chance as a strict lower-than test", () => {
    const rng = new ScriptedRandom([0.3, 0.29]);
    expect(rng.chance(0.3)).toBe(false);
    expect(rng.chance(0.3)).toBe(true);
  });

  it("picks the weighted bucket containing the draw", () => {
    const rng = new ScriptedRandom([0.05, 0.5, 0.95]);
    const weights = [0.1, 0.3, 0.4, 0.2];
    expect(rng.weightedIndex(weights)).toBe(0);
    expect(rng.weightedIndex(weights)).toBe(2);
    expect(rng.weightedIndex(weights)).toBe(3);
  });

  it("refuses weights without any positive entry", () => {
    const rng = new ScriptedRandom([0.5]);
    expect(() => rng.weightedIndex([0, 0])).toThrow(RangeError);
  });
});

describe("generateSeed", () => {
  it("derives a bounded seed from the clock", () => {
    expect(generateSeed(1000)).toBe(1_000_000);
    expect(generateSeed(2_147_484)).toBe(353);
  });
});
