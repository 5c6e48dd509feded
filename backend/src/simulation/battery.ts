import { Energy, Percentage, Scalar } from "@gridtwin/domain";
import type { EnergyReservoir } from "./types";

const DEFAULT_FULL_THRESHOLD_PERCENT = 99.9;
const INITIAL_SOC_RATIO = 0.5;

export interface BatteryOptions {
  capacityKwh: number;
  /** Round-trip efficiency in (0, 1]. */
  efficiency: number;
  /** Floor below which the battery never discharges, as a fraction of capacity. */
  minSoc: number;
  initialSoc?: number;
}

/**
 * Energy reservoir with symmetric conversion losses: each direction applies
 * √efficiency, so a full round trip loses exactly (1 − efficiency).
 */
export class Battery implements EnergyReservoir {
  private readonly capacity: Energy;
  private readonly minEnergy: Energy;
  private readonly oneWayEfficiency: Scalar;
  private stored: Energy;

  constructor(options: BatteryOptions) {
    if (!(options.capacityKwh > 0)) {
      throw new RangeError("Battery capacity must be positive");
    }
    if (!(options.efficiency > 0 && options.efficiency <= 1)) {
      throw new RangeError("Battery efficiency must lie in (0, 1]");
    }
    this.capacity = Energy.fromKilowattHours(options.capacityKwh);
    this.minEnergy = this.capacity.scale(Percentage.fromRatio(options.minSoc));
    this.oneWayEfficiency = Scalar.of(options.efficiency).sqrt();
    const initial = this.capacity.scale(Percentage.fromRatio(options.initialSoc ?? INITIAL_SOC_RATIO));
    this.stored = initial.kilowattHours < this.minEnergy.kilowattHours ? this.minEnergy : initial;
  }

  get capacityKwh(): number {
    return this.capacity.kilowattHours;
  }

  get storedKwh(): number {
    return this.stored.kilowattHours;
  }

  get minEnergyKwh(): number {
    return this.minEnergy.kilowattHours;
  }

  get availableSpaceKwh(): number {
    return this.capacity.subtract(this.stored).kilowattHours;
  }

  getSoc(): number {
    return (this.stored.kilowattHours / this.capacity.kilowattHours) * 100;
  }

  isFull(threshold = DEFAULT_FULL_THRESHOLD_PERCENT): boolean {
    return this.getSoc() >= threshold;
  }

  isEmpty(): boolean {
    return this.stored.kilowattHours <= this.minEnergy.kilowattHours;
  }

  charge(offered: Energy): Energy {
    if (!offered.isPositive()) {
      return Energy.zero();
    }
    const usable = offered.scale(this.oneWayEfficiency);
    const headroom = Energy.fromKilowattHours(Math.max(0, this.availableSpaceKwh));
    const toStore = usable.min(headroom);
    this.stored = this.stored.add(toStore);
    // Losses are billed to the source; only a full battery rejects energy.
    return toStore.scale(1 / this.oneWayEfficiency.value);
  }

  discharge(requested: Energy): Energy {
    if (!requested.isPositive()) {
      return Energy.zero();
    }
    const required = requested.scale(1 / this.oneWayEfficiency.value);
    const extractable = Energy.fromKilowattHours(
      Math.max(0, this.stored.kilowattHours - this.minEnergy.kilowattHours),
    );
    const extracted = required.min(extractable);
    this.stored = this.stored.subtract(extracted);
    return extracted.scale(this.oneWayEfficiency);
  }
}
