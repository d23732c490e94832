import { Client, Priority } from './client';

export type ClientPredicate = (client: Client) => boolean;

/** Matches every client */
export const PREDICATE_SHOW_ALL_CLIENTS: ClientPredicate = () => true;

function words(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

/**
 * Matches clients where any keyword equals, ignoring case, a whole word of
 * the name, a tag, or a word of the product preference label.
 */
export function matchesAnyKeyword(keywords: readonly string[]): ClientPredicate {
  const wanted = new Set(keywords.map((keyword) => keyword.toLowerCase()));
  return (client) => {
    const candidates = [
      ...words(client.name.fullName),
      ...client.tags.map((tag) => tag.tagName),
      ...(client.productPreference ? words(client.productPreference.label) : []),
    ];
    return candidates.some((word) => wanted.has(word.toLowerCase()));
  };
}

/**
 * Matches clients whose product preference label contains `keyword`, ignoring case.
 */
export function productPreferenceContains(keyword: string): ClientPredicate {
  const needle = keyword.toLowerCase();
  return (client) =>
    client.productPreference !== undefined &&
    client.productPreference.label.toLowerCase().includes(needle);
}

/**
 * Matches clients with exactly the given priority.
 */
export function hasPriority(priority: Priority): ClientPredicate {
  return (client) => client.priority !== undefined && client.priority.equals(priority);
}
