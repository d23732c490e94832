import { InvalidFieldError } from '../errors';
import { Frequency } from './frequency';

/**
 * The product a client prefers, with how often they buy it.
 */
export class ProductPreference {
  static readonly MESSAGE_CONSTRAINTS = 'Product preference cannot be empty or whitespace only';

  private constructor(
    readonly label: string,
    readonly frequency: Frequency,
  ) {
    Object.freeze(this);
  }

  /**
   * Every preference a client holds is built here, so a preference recorded
   * without a frequency always counts one purchase.
   */
  static of(label: string, frequency: Frequency = Frequency.DEFAULT): ProductPreference {
    const trimmed = label.trim();
    if (!ProductPreference.isValid(trimmed)) {
      throw new InvalidFieldError(ProductPreference.MESSAGE_CONSTRAINTS);
    }
    return new ProductPreference(trimmed, frequency);
  }

  static isValid(label: string): boolean {
    return label.trim().length > 0;
  }

  equals(other: ProductPreference): boolean {
    return this.label === other.label && this.frequency.equals(other.frequency);
  }

  toString(): string {
    return this.label;
  }
}
