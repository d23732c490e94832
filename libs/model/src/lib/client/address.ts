import { InvalidFieldError } from '../errors';

export class Address {
  static readonly MESSAGE_CONSTRAINTS = 'Addresses can take any values, and they should not be blank';

  private constructor(readonly value: string) {
    Object.freeze(this);
  }

  static create(address: string): Address {
    const trimmed = address.trim();
    if (!Address.isValid(trimmed)) {
      throw new InvalidFieldError(Address.MESSAGE_CONSTRAINTS);
    }
    return new Address(trimmed);
  }

  /** The first character must not be whitespace */
  static isValid(test: string): boolean {
    return /^\S/.test(test);
  }

  equals(other: Address): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
