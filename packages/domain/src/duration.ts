export class Duration {
  private readonly _milliseconds: number;

  private constructor(milliseconds: number) {
    if (!Number.isFinite(milliseconds)) {
      throw new TypeError("Duration requires a finite numeric value in milliseconds");
    }
    if (milliseconds < 0) {
      throw new RangeError("Duration cannot be negative");
    }
    this._milliseconds = milliseconds;
  }

  static fromMinutes(value: number): Duration {
    return new Duration(value * 60_000);
  }

  static fromHours(value: number): Duration {
    return new Duration(value * 3_600_000);
  }

  static zero(): Duration {
    return new Duration(0);
  }

  get milliseconds(): number {
    return this._milliseconds;
  }

  get minutes(): number {
    return this._milliseconds / 60_000;
  }

  get hours(): number {
    return this._milliseconds / 3_600_000;
  }
}
