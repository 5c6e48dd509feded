import type { Duration, Energy, Power } from "@gridtwin/domain";

/** What the dispatch policies need from a battery. */
export interface EnergyReservoir {
  /** Offers energy to the reservoir; returns the energy taken from the source, losses included. */
  charge(offered: Energy): Energy;
  /** Requests delivered energy; returns what was actually delivered after losses. */
  discharge(requested: Energy): Energy;
  getSoc(): number;
  isFull(threshold?: number): boolean;
  isEmpty(): boolean;
}

/** What the dispatch policies need from the utility connection. */
export interface GridConnection {
  /** Buys `power` for one step; returns the cost of the import. */
  importEnergy(power: Power, step: Duration): number;
  /** Sells up to `power` for one step; returns the power actually accepted. */
  exportEnergy(power: Power, step: Duration): Power;
}
