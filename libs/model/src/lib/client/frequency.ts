import { InvalidFieldError } from '../errors';

/**
 * How many times a client has bought their preferred product.
 */
export class Frequency {
  static readonly MAX_VALUE = 1_000_000;
  static readonly MESSAGE_CONSTRAINTS = `Frequency should be a non-negative integer no greater than ${Frequency.MAX_VALUE}`;

  private constructor(readonly value: number) {
    Object.freeze(this);
  }

  /** Frequency given to a preference that is recorded without one */
  static readonly DEFAULT = new Frequency(1);

  static of(value: number): Frequency {
    if (!Frequency.isValid(value)) {
      throw new InvalidFieldError(Frequency.MESSAGE_CONSTRAINTS);
    }
    return new Frequency(value);
  }

  static isValid(value: number): boolean {
    return Number.isInteger(value) && value >= 0 && value <= Frequency.MAX_VALUE;
  }

  equals(other: Frequency): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return String(this.value);
  }
}
