import {
  Address,
  Description,
  Email,
  Frequency,
  Name,
  Phone,
  Priority,
  ProductPreference,
  Tag,
} from '@client-registry/model';
import { ParseError } from './parse-error';

export const MESSAGE_INVALID_INDEX = 'Index is not an integer.';

const INTEGER = /^[+-]?\d+$/;
const UNSIGNED_INTEGER = /^\d+$/;

/**
 * Parses a 1-based index. Only the format is checked here: whether the
 * index points into the displayed sequence is decided when the command runs.
 */
export function parseIndex(text: string): number {
  const trimmed = text.trim();
  const index = Number(trimmed);
  if (!INTEGER.test(trimmed) || !Number.isSafeInteger(index)) {
    throw new ParseError(MESSAGE_INVALID_INDEX);
  }
  return index;
}

export function parseName(text: string): Name {
  const trimmed = text.trim();
  if (!Name.isValid(trimmed)) {
    throw new ParseError(Name.MESSAGE_CONSTRAINTS);
  }
  return Name.create(trimmed);
}

export function parsePhone(text: string): Phone {
  const trimmed = text.trim();
  if (!Phone.isValid(trimmed)) {
    throw new ParseError(Phone.MESSAGE_CONSTRAINTS);
  }
  return Phone.create(trimmed);
}

export function parseEmail(text: string): Email {
  const trimmed = text.trim();
  if (!Email.isValid(trimmed)) {
    throw new ParseError(Email.MESSAGE_CONSTRAINTS);
  }
  return Email.create(trimmed);
}

export function parseAddress(text: string): Address {
  const trimmed = text.trim();
  if (!Address.isValid(trimmed)) {
    throw new ParseError(Address.MESSAGE_CONSTRAINTS);
  }
  return Address.create(trimmed);
}

export function parseTag(text: string): Tag {
  const trimmed = text.trim();
  if (!Tag.isValid(trimmed)) {
    throw new ParseError(Tag.MESSAGE_CONSTRAINTS);
  }
  return Tag.create(trimmed);
}

export function parseTags(texts: Iterable<string>): Tag[] {
  return Array.from(texts, parseTag);
}

export function parseFrequency(text: string): Frequency {
  const trimmed = text.trim();
  const value = Number(trimmed);
  if (!UNSIGNED_INTEGER.test(trimmed) || !Frequency.isValid(value)) {
    throw new ParseError(Frequency.MESSAGE_CONSTRAINTS);
  }
  return Frequency.of(value);
}

/**
 * A preference given without a frequency counts one purchase.
 */
export function parseProductPreference(label: string, frequency?: Frequency): ProductPreference {
  if (!ProductPreference.isValid(label)) {
    throw new ParseError(ProductPreference.MESSAGE_CONSTRAINTS);
  }
  return ProductPreference.of(label, frequency);
}

/**
 * Blank text means no priority.
 */
export function parsePriority(text: string): Priority | undefined {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return undefined;
  }
  const level = Number(trimmed);
  if (!UNSIGNED_INTEGER.test(trimmed) || !Priority.isValid(level)) {
    throw new ParseError(Priority.MESSAGE_CONSTRAINTS);
  }
  return Priority.fromLevel(level);
}

/**
 * Blank text means no description.
 */
export function parseDescription(text: string): Description | undefined {
  return Description.isValid(text) ? Description.create(text) : undefined;
}
