import { Duration } from "./duration";
import { Energy } from "./energy";
import { Scalar } from "./scalar";

/** Instantaneous (or step-average) power in kilowatts. */
export class Power {
  private readonly _kilowatts: number;

  private constructor(kilowatts: number) {
    if (!Number.isFinite(kilowatts)) {
      throw new TypeError("Power requires a finite numeric value in kilowatts");
    }
    this._kilowatts = kilowatts;
  }

  static fromKilowatts(value: number): Power {
    return new Power(value);
  }

  static fromWatts(value: number): Power {
    return new Power(value / 1000);
  }

  static zero(): Power {
    return new Power(0);
  }

  get kilowatts(): number {
    return this._kilowatts;
  }

  scale(factor: number | Scalar): Power {
    const numeric = factor instanceof Scalar ? factor.value : factor;
    return new Power(this._kilowatts * numeric);
  }

  forDuration(duration: Duration): Energy {
    return Energy.fromPowerAndDuration(this, duration);
  }

  /** Caps this power at `limit`; a cap never raises the value. */
  cap(limit: Power): Power {
    return this._kilowatts <= limit._kilowatts ? this : limit;
  }
}
