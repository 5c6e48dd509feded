import { describe, expect, it } from "vitest";

import { ConfigurationError, SeededRandom, Season } from "@gridtwin/domain";
import { CloudCoverage, CloudLevel, parseSeason } from "../src/simulation/cloud-coverage";
import { ScriptedRandom } from "./support/scripted-random";

describe("parseSeason", () => {
  it("normalizes case and whitespace", () => {
    expect(parseSeason(" Summer ")).toBe(Season.Summer);
    expect(parseSeason("winter")).toBe(Season.Winter);
  });

  it("rejects unknown seasons", () => {
    expect(() => parseSeason("monsoon")).toThrow(ConfigurationError);
  });
});

describe("CloudCoverage", () => {
  it("fails at construction for an unknown season", () => {
    expect(() => new CloudCoverage("monsoon", new ScriptedRandom([]))).toThrow(ConfigurationError);
  });

  it("draws the level first, then a fraction within that level", () => {
    const random = new ScriptedRandom([0.99, 0.5]);
    const coverage = new CloudCoverage("summer", random);

    const draw = coverage.draw();
    expect(draw.level).toBe(CloudLevel.Overcast);
    expect(draw.coverage).toBeCloseTo(0.85, 9);
    expect(random.remaining).toBe(0);
  });

  it("uses the seasonal weights", () => {
    const coverage = new CloudCoverage("spring", new ScriptedRandom([0.05, 0.5]));

    const draw = coverage.draw();
    expect(draw.level).toBe(CloudLevel.Clear);
    expect(draw.coverage).toBeCloseTo(0.1, 9);
  });

  it("keeps every daily value inside the overall range", () => {
    const coverage = new CloudCoverage("fall", new SeededRandom(5));
    for (let day = 0; day < 365; day += 1) {
      const value = coverage.getDailyCoverage();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(0.9);
    }
  });
});
