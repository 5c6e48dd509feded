import { Duration, Power, RandomSource } from "@gridtwin/domain";

export enum InverterState {
  Operational = "OPERATIONAL",
  Failed = "FAILED",
}

export interface InverterOptions {
  maxOutputKw: number;
  /** Probability that an operational inverter fails on a given day. */
  failureRate: number;
  minFailureDurationHours: number;
  maxFailureDurationHours: number;
}

/**
 * Clips solar power to the inverter rating and models outages. A failure is
 * rolled at most once per simulated day; while failed the output is zero.
 */
export class Inverter {
  private readonly maxOutput: Power;
  private remainingFailureHours = 0;

  constructor(
    private readonly options: InverterOptions,
    private readonly random: RandomSource,
  ) {
    if (options.minFailureDurationHours > options.maxFailureDurationHours) {
      throw new RangeError("Minimum failure duration cannot exceed the maximum");
    }
    this.maxOutput = Power.fromKilowatts(options.maxOutputKw);
  }

  get state(): InverterState {
    return this.remainingFailureHours > 0 ? InverterState.Failed : InverterState.Operational;
  }

  get failureHoursRemaining(): number {
    return this.remainingFailureHours;
  }

  isOperational(): boolean {
    return this.state === InverterState.Operational;
  }

  applyLimit(raw: Power): Power {
    if (!this.isOperational()) {
      return Power.zero();
    }
    return raw.cap(this.maxOutput);
  }

  /**
   * Daily failure roll. Returns true when a new outage starts; an inverter that
   * is already down is left alone and consumes no draw.
   */
  checkFailure(): boolean {
    if (!this.isOperational()) {
      return false;
    }
    if (!this.random.chance(this.options.failureRate)) {
      return false;
    }
    this.remainingFailureHours = this.random.randomInt(
      this.options.minFailureDurationHours,
      this.options.maxFailureDurationHours,
    );
    return true;
  }

  /** Ages an outage by `elapsed`; returns true when this call brought the inverter back. */
  update(elapsed: Duration): boolean {
    if (this.isOperational()) {
      return false;
    }
    this.remainingFailureHours -= elapsed.hours;
    if (this.remainingFailureHours <= 0) {
      this.remainingFailureHours = 0;
      return true;
    }
    return false;
  }
}
