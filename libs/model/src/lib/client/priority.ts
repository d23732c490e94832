import { InvalidFieldError } from '../errors';

export type PriorityLevel = 1 | 2 | 3;

/**
 * How much attention a client needs, from 1 (low) to 3 (high).
 */
export class Priority {
  static readonly MIN_LEVEL = 1;
  static readonly MAX_LEVEL = 3;
  static readonly MESSAGE_CONSTRAINTS = `Priority should be an integer from ${Priority.MIN_LEVEL} to ${Priority.MAX_LEVEL}`;

  private constructor(readonly level: PriorityLevel) {
    Object.freeze(this);
  }

  static fromLevel(level: number): Priority {
    if (!Priority.isValid(level)) {
      throw new InvalidFieldError(Priority.MESSAGE_CONSTRAINTS);
    }
    return new Priority(level);
  }

  static isValid(level: number): level is PriorityLevel {
    return Number.isInteger(level) && level >= Priority.MIN_LEVEL && level <= Priority.MAX_LEVEL;
  }

  equals(other: Priority): boolean {
    return this.level === other.level;
  }

  toString(): string {
    return String(this.level);
  }
}
