import { Client } from './client';

export type ClientComparator = (a: Client, b: Client) => number;

/** Name, ascending, ignoring case */
export const compareByName: ClientComparator = (a, b) => {
  const left = a.name.fullName.toLowerCase();
  const right = b.name.fullName.toLowerCase();
  return left < right ? -1 : left > right ? 1 : 0;
};

/** Total purchase, highest first */
export const compareByTotalPurchase: ClientComparator = (a, b) =>
  b.totalPurchase - a.totalPurchase;

export const DEFAULT_CLIENT_COMPARATOR = compareByName;
