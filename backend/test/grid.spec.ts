import { describe, expect, it } from "vitest";

import { Duration, Power } from "@gridtwin/domain";
import { Grid } from "../src/simulation/grid";

const createGrid = () => new Grid({importCostPerKwh: 0.3, exportRevenuePerKwh: 0.08, exportLimitKw: 20});

describe("Grid", () => {
  it("accepts any import and charges for it", () => {
    const grid = createGrid();
    const cost = grid.importEnergy(Power.fromKilowatts(2), Duration.fromMinutes(30));

    expect(cost).toBeCloseTo(0.3, 9);
    expect(grid.totalImportedKwh).toBe(1);
    expect(grid.totalImportCost).toBeCloseTo(0.3, 9);
  });

  it("caps export power at the limit for any step length", () => {
    for (const minutes of [15, 60, 240]) {
      const grid = createGrid();
      const accepted = grid.exportEnergy(Power.fromKilowatts(25), Duration.fromMinutes(minutes));
      expect(accepted.kilowatts).toBe(20);
      expect(grid.totalExportedKwh).toBeCloseTo(20 * (minutes / 60), 9);
    }
  });

  it("passes exports under the limit through unchanged", () => {
    const grid = createGrid();
    const accepted = grid.exportEnergy(Power.fromKilowatts(5), Duration.fromMinutes(15));

    expect(accepted.kilowatts).toBe(5);
    expect(grid.totalExportRevenue).toBeCloseTo(0.1, 9);
  });

  it("reports revenue minus cost as the net balance", () => {
    const grid = createGrid();
    grid.importEnergy(Power.fromKilowatts(1), Duration.fromHours(1));
    grid.exportEnergy(Power.fromKilowatts(10), Duration.fromHours(1));

    expect(grid.netBalance()).toBeCloseTo(0.8 - 0.3, 9);
  });
});
