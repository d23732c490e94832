import { duplicatePrefixesMessage } from '../messages';
import { ParseError } from './parse-error';
import { Prefix } from './prefix';

/**
 * Values of a tokenized argument string, keyed by prefix. A prefix given
 * more than once keeps every value in order of appearance.
 */
export class ArgumentMultimap {
  private readonly values = new Map<Prefix, string[]>();

  constructor(readonly preamble: string) {}

  put(prefix: Prefix, value: string): void {
    const existing = this.values.get(prefix);
    if (existing) {
      existing.push(value);
    } else {
      this.values.set(prefix, [value]);
    }
  }

  has(prefix: Prefix): boolean {
    return this.values.has(prefix);
  }

  /** Last value given for `prefix` */
  getValue(prefix: Prefix): string | undefined {
    return this.values.get(prefix)?.at(-1);
  }

  getAllValues(prefix: Prefix): string[] {
    return [...(this.values.get(prefix) ?? [])];
  }

  /**
   * @throws ParseError naming every prefix from `prefixes` that was given more than once
   */
  verifyNoDuplicatePrefixesFor(...prefixes: Prefix[]): void {
    const duplicated = prefixes.filter((prefix) => (this.values.get(prefix)?.length ?? 0) > 1);
    if (duplicated.length > 0) {
      throw new ParseError(duplicatePrefixesMessage(duplicated));
    }
  }
}

interface PrefixPosition {
  prefix: Prefix;
  start: number;
}

/**
 * Splits `argsString` at every occurrence of one of `prefixes` that starts
 * the string or follows whitespace. Text before the first prefix is the
 * preamble; values and preamble are trimmed.
 *
 * @example
 * tokenize('1 name/Amy tag/a tag/b', PREFIX.name, PREFIX.tag)
 * // preamble '1', name/ -> ['Amy'], tag/ -> ['a', 'b']
 */
export function tokenize(argsString: string, ...prefixes: Prefix[]): ArgumentMultimap {
  const positions: PrefixPosition[] = [];
  for (const prefix of prefixes) {
    for (const match of argsString.matchAll(new RegExp(`(^|\\s)${prefix}`, 'g'))) {
      positions.push({ prefix, start: (match.index ?? 0) + match[1].length });
    }
  }
  positions.sort((a, b) => a.start - b.start);

  const preambleEnd = positions.length > 0 ? positions[0].start : argsString.length;
  const multimap = new ArgumentMultimap(argsString.slice(0, preambleEnd).trim());

  positions.forEach(({ prefix, start }, i) => {
    const end = i + 1 < positions.length ? positions[i + 1].start : argsString.length;
    multimap.put(prefix, argsString.slice(start + prefix.length, end).trim());
  });

  return multimap;
}
