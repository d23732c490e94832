/**
 * Client registry model: value types, the client entity, the unique
 * registry and the filtered, sorted view over it.
 */

export * from './lib/client';
export * from './lib/errors';
export * from './lib/unique-client-list';
export * from './lib/client-predicates';
export * from './lib/client-comparators';
export * from './lib/client-view';
export * from './lib/client-registry-model';
