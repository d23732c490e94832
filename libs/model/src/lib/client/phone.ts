import { InvalidFieldError } from '../errors';

/**
 * An 8-digit local phone number starting with 3, 6, 8 or 9 (but not 99).
 */
export class Phone {
  static readonly MESSAGE_CONSTRAINTS =
    'Phone numbers should be exactly 8 digits, start with 3, 6, 8 or 9, and not start with 99';

  private static readonly VALIDATION_REGEX = /^[3689]\d{7}$/;

  private constructor(readonly value: string) {
    Object.freeze(this);
  }

  static create(phone: string): Phone {
    const trimmed = phone.trim();
    if (!Phone.isValid(trimmed)) {
      throw new InvalidFieldError(Phone.MESSAGE_CONSTRAINTS);
    }
    return new Phone(trimmed);
  }

  static isValid(test: string): boolean {
    return Phone.VALIDATION_REGEX.test(test) && !test.startsWith('99');
  }

  equals(other: Phone): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
