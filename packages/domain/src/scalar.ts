export class Scalar {
  protected readonly numericValue: number;

  protected constructor(value: number) {
    if (!Number.isFinite(value)) {
      throw new TypeError("Scalar requires a finite numeric value");
    }
    this.numericValue = value;
  }

  static of(value: number): Scalar {
    return new Scalar(value);
  }

  get value(): number {
    return this.numericValue;
  }

  sqrt(): Scalar {
    if (this.numericValue < 0) {
      throw new RangeError("Cannot take the square root of a negative scalar");
    }
    return new Scalar(Math.sqrt(this.numericValue));
  }
}
