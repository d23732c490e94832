/**
 * Argument prefixes of the command grammar
 */
export const PREFIX = {
  name: 'name/',
  phone: 'phone/',
  email: 'email/',
  address: 'address/',
  tag: 'tag/',
  preference: 'pref/',
  frequency: 'freq/',
  priority: 'priority/',
} as const;

export type Prefix = (typeof PREFIX)[keyof typeof PREFIX];
