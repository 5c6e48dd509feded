import { Duration } from "./duration";
import { Power } from "./power";
import { Scalar } from "./scalar";

/** Energy quantity stored in kilowatt-hours, the unit every ledger in the twin works in. */
export class Energy {
  private readonly _kilowattHours: number;

  private constructor(kilowattHours: number) {
    if (!Number.isFinite(kilowattHours)) {
      throw new TypeError("Energy requires a finite numeric value in kilowatt-hours");
    }
    this._kilowattHours = kilowattHours;
  }

  static fromKilowattHours(value: number): Energy {
    return new Energy(value);
  }

  static fromPowerAndDuration(power: Power, duration: Duration): Energy {
    return new Energy(power.kilowatts * duration.hours);
  }

  static zero(): Energy {
    return new Energy(0);
  }

  get kilowattHours(): number {
    return this._kilowattHours;
  }

  add(other: Energy): Energy {
    return new Energy(this._kilowattHours + other._kilowattHours);
  }

  subtract(other: Energy): Energy {
    return new Energy(this._kilowattHours - other._kilowattHours);
  }

  scale(factor: number | Scalar): Energy {
    const numeric = factor instanceof Scalar ? factor.value : factor;
    return new Energy(this._kilowattHours * numeric);
  }

  /** Average power that delivers this energy over the given duration. */
  per(duration: Duration): Power {
    if (duration.hours === 0) {
      throw new RangeError("Cannot derive power from zero duration");
    }
    return Power.fromKilowatts(this._kilowattHours / duration.hours);
  }

  min(other: Energy): Energy {
    return this._kilowattHours <= other._kilowattHours ? this : other;
  }

  isPositive(): boolean {
    return this._kilowattHours > 0;
  }
}
