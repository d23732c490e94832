import { InvalidFieldError } from '../errors';

/**
 * Free-text notes about a client. Blank text is never stored: it means
 * "no description".
 */
export class Description {
  static readonly MESSAGE_CONSTRAINTS =
    'Description can take any values, and if the content is blank, the description field will be cleared.';

  private constructor(readonly text: string) {
    Object.freeze(this);
  }

  static create(text: string): Description {
    const trimmed = text.trim();
    if (!Description.isValid(trimmed)) {
      throw new InvalidFieldError(Description.MESSAGE_CONSTRAINTS);
    }
    return new Description(trimmed);
  }

  static isValid(text: string): boolean {
    return text.trim().length > 0;
  }

  equals(other: Description): boolean {
    return this.text === other.text;
  }

  toString(): string {
    return this.text;
  }
}
