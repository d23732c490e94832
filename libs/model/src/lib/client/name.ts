import { InvalidFieldError } from '../errors';

/**
 * A client's name: letters separated by single spaces, stored in title case.
 */
export class Name {
  static readonly MESSAGE_CONSTRAINTS =
    'Names should only contain alphabetic characters and single spaces between words, and should not be blank';

  private static readonly VALIDATION_REGEX = /^[A-Za-z]+( [A-Za-z]+)*$/;

  private constructor(readonly fullName: string) {
    Object.freeze(this);
  }

  static create(name: string): Name {
    const trimmed = name.trim();
    if (!Name.isValid(trimmed)) {
      throw new InvalidFieldError(Name.MESSAGE_CONSTRAINTS);
    }
    return new Name(toTitleCase(trimmed));
  }

  static isValid(test: string): boolean {
    return Name.VALIDATION_REGEX.test(test);
  }

  equals(other: Name): boolean {
    return this.fullName === other.fullName;
  }

  toString(): string {
    return this.fullName;
  }
}

function toTitleCase(name: string): string {
  return name
    .split(' ')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}
