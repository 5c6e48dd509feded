import { describe, expect, it } from "vitest";

import { SolarPanel } from "../src/simulation/solar-panel";

describe("SolarPanel", () => {
  const panel = new SolarPanel(10);

  it("produces nothing outside daylight", () => {
    expect(panel.generate(0).kilowatts).toBe(0);
    expect(panel.generate(5.99).kilowatts).toBe(0);
    expect(panel.generate(18).kilowatts).toBe(0);
    expect(panel.generate(23.5).kilowatts).toBe(0);
  });

  it("follows a half-sine peaking at noon", () => {
    expect(panel.generate(6).kilowatts).toBe(0);
    expect(panel.generate(12).kilowatts).toBeCloseTo(10, 9);
    expect(panel.generate(9).kilowatts).toBeCloseTo(10 * Math.SQRT1_2, 9);
    expect(panel.generate(15).kilowatts).toBeCloseTo(panel.generate(9).kilowatts, 9);
  });

  it("scales output by the clear-sky fraction", () => {
    expect(panel.generate(12, 0.5).kilowatts).toBeCloseTo(5, 9);
    expect(panel.generate(12, 1).kilowatts).toBe(0);
  });
});
