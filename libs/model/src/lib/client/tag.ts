import { InvalidFieldError } from '../errors';

/**
 * A short alphanumeric label attached to a client.
 */
export class Tag {
  static readonly MAX_LENGTH = 20;
  static readonly MESSAGE_CONSTRAINTS = `Tags names should be alphanumeric and at most ${Tag.MAX_LENGTH} characters long`;

  private constructor(readonly tagName: string) {
    Object.freeze(this);
  }

  static create(tagName: string): Tag {
    const trimmed = tagName.trim();
    if (!Tag.isValid(trimmed)) {
      throw new InvalidFieldError(Tag.MESSAGE_CONSTRAINTS);
    }
    return new Tag(trimmed);
  }

  static isValid(test: string): boolean {
    return /^[A-Za-z0-9]+$/.test(test) && test.length <= Tag.MAX_LENGTH;
  }

  equals(other: Tag): boolean {
    return this.tagName === other.tagName;
  }

  toString(): string {
    return `[${this.tagName}]`;
  }
}

/**
 * Collapses tags into set form: duplicates removed, ordered by name, so that
 * two tag sets with the same members compare equal element by element.
 */
export function toTagSet(tags: Iterable<Tag>): readonly Tag[] {
  const byName = new Map<string, Tag>();
  for (const tag of tags) {
    byName.set(tag.tagName, tag);
  }
  return Object.freeze(
    [...byName.values()].sort((a, b) => (a.tagName < b.tagName ? -1 : a.tagName > b.tagName ? 1 : 0))
  );
}

export function tagSetsEqual(a: readonly Tag[], b: readonly Tag[]): boolean {
  return a.length === b.length && a.every((tag, i) => tag.equals(b[i]));
}
