import { Duration, Energy, Power } from "@gridtwin/domain";
import type { GridConnection } from "./types";

export interface GridOptions {
  importCostPerKwh: number;
  exportRevenuePerKwh: number;
  exportLimitKw: number;
}

/** Utility connection with uncapped import, a power-capped export and a running money ledger. */
export class Grid implements GridConnection {
  private readonly exportLimit: Power;
  private imported = Energy.zero();
  private exported = Energy.zero();
  private cost = 0;
  private revenue = 0;

  constructor(private readonly options: GridOptions) {
    this.exportLimit = Power.fromKilowatts(Math.max(0, options.exportLimitKw));
  }

  get totalImportedKwh(): number {
    return this.imported.kilowattHours;
  }

  get totalExportedKwh(): number {
    return this.exported.kilowattHours;
  }

  get totalImportCost(): number {
    return this.cost;
  }

  get totalExportRevenue(): number {
    return this.revenue;
  }

  importEnergy(power: Power, step: Duration): number {
    const energy = power.forDuration(step);
    const stepCost = energy.kilowattHours * this.options.importCostPerKwh;
    this.imported = this.imported.add(energy);
    this.cost += stepCost;
    return stepCost;
  }

  exportEnergy(power: Power, step: Duration): Power {
    const accepted = power.cap(this.exportLimit);
    const energy = accepted.forDuration(step);
    this.exported = this.exported.add(energy);
    this.revenue += energy.kilowattHours * this.options.exportRevenuePerKwh;
    return accepted;
  }

  netBalance(): number {
    return this.revenue - this.cost;
  }
}
