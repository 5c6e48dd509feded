import { Scalar } from "./scalar";

/** A ratio bounded to [0, 1], readable either as a ratio or as a percent. */
export class Percentage extends Scalar {
  private constructor(ratio: number) {
    super(Percentage.normalize(ratio));
  }

  static fromPercent(value: number): Percentage {
    return new Percentage(value / 100);
  }

  static fromRatio(value: number): Percentage {
    return new Percentage(value);
  }

  /** `part / whole`, or zero when there is no whole to measure against. */
  static ofRatio(part: number, whole: number): Percentage {
    if (!(whole > 0)) {
      return new Percentage(0);
    }
    return new Percentage(part / whole);
  }

  get ratio(): number {
    return this.value;
  }

  get percent(): number {
    return this.value * 100;
  }

  private static normalize(value: number): number {
    if (!Number.isFinite(value)) {
      throw new TypeError("Percentage requires a finite numeric value");
    }
    if (value < 0) {
      return 0;
    }
    if (value > 1) {
      return 1;
    }
    return value;
  }
}
