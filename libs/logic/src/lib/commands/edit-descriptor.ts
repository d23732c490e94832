import {
  Address,
  Client,
  Description,
  Email,
  Name,
  Phone,
  Priority,
  ProductPreference,
  Tag,
} from '@client-registry/model';

/**
 * An edit to one field: leave it as it is, erase it, or replace it.
 */
export type EditField<T> = { kind: 'unset' } | { kind: 'clear' } | { kind: 'set'; value: T };

/** Edit to a field that every client must have */
export type RequiredEditField<T> = Exclude<EditField<T>, { kind: 'clear' }>;

const UNSET = Object.freeze({ kind: 'unset' } as const);
const CLEAR = Object.freeze({ kind: 'clear' } as const);

export const EditField = {
  unset: UNSET,
  clear: CLEAR,
  set: <T>(value: T): { kind: 'set'; value: T } => Object.freeze({ kind: 'set', value }),
};

/**
 * The changes an edit applies. Clearing `tags` leaves the client with no tags.
 */
export interface EditClientDescriptor {
  readonly name: RequiredEditField<Name>;
  readonly phone: RequiredEditField<Phone>;
  readonly email: RequiredEditField<Email>;
  readonly address: RequiredEditField<Address>;
  readonly tags: EditField<readonly Tag[]>;
  readonly productPreference: EditField<ProductPreference>;
  readonly description: EditField<Description>;
  readonly priority: EditField<Priority>;
}

/**
 * Builds a frozen descriptor; fields not given are left unset.
 */
export function createEditDescriptor(fields: Partial<EditClientDescriptor> = {}): EditClientDescriptor {
  return Object.freeze({
    name: fields.name ?? UNSET,
    phone: fields.phone ?? UNSET,
    email: fields.email ?? UNSET,
    address: fields.address ?? UNSET,
    tags: fields.tags ?? UNSET,
    productPreference: fields.productPreference ?? UNSET,
    description: fields.description ?? UNSET,
    priority: fields.priority ?? UNSET,
  });
}

export function isAnyFieldEdited(descriptor: EditClientDescriptor): boolean {
  const fields: ReadonlyArray<EditField<unknown>> = [
    descriptor.name,
    descriptor.phone,
    descriptor.email,
    descriptor.address,
    descriptor.tags,
    descriptor.productPreference,
    descriptor.description,
    descriptor.priority,
  ];
  return fields.some((field) => field.kind !== 'unset');
}

function resolveRequired<T>(field: RequiredEditField<T>, current: T): T {
  return field.kind === 'set' ? field.value : current;
}

function resolveOptional<T>(field: EditField<T>, current: T | undefined): T | undefined {
  switch (field.kind) {
    case 'unset':
      return current;
    case 'clear':
      return undefined;
    case 'set':
      return field.value;
  }
}

/**
 * Builds the client that results from applying `descriptor` to `client`.
 */
export function applyEdit(client: Client, descriptor: EditClientDescriptor): Client {
  return new Client({
    name: resolveRequired(descriptor.name, client.name),
    phone: resolveRequired(descriptor.phone, client.phone),
    email: resolveRequired(descriptor.email, client.email),
    address: resolveRequired(descriptor.address, client.address),
    tags: resolveOptional(descriptor.tags, client.tags) ?? [],
    productPreference: resolveOptional(descriptor.productPreference, client.productPreference),
    description: resolveOptional(descriptor.description, client.description),
    priority: resolveOptional(descriptor.priority, client.priority),
  });
}
