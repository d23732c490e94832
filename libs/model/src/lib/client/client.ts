import { Address } from './address';
import { Description } from './description';
import { Email } from './email';
import { Name } from './name';
import { Phone } from './phone';
import { Priority } from './priority';
import { ProductPreference } from './product-preference';
import { Tag, tagSetsEqual, toTagSet } from './tag';

/**
 * Everything needed to construct a {@link Client}
 */
export interface ClientFields {
  name: Name;
  phone: Phone;
  email: Email;
  address: Address;
  tags: Iterable<Tag>;
  productPreference?: ProductPreference;
  description?: Description;
  priority?: Priority;
}

/**
 * A client in the registry.
 *
 * Immutable: editing a client means building a new instance. Identity is
 * name, phone and address ({@link Client.isSameClient}); {@link Client.equals}
 * compares every field.
 */
export class Client {
  readonly name: Name;
  readonly phone: Phone;
  readonly email: Email;
  readonly address: Address;
  readonly tags: readonly Tag[];
  readonly productPreference: ProductPreference | undefined;
  readonly description: Description | undefined;
  readonly priority: Priority | undefined;

  /** Purchases of the preferred product; 0 without a preference */
  readonly totalPurchase: number;

  constructor(fields: ClientFields) {
    const { name, phone, email, address, tags } = fields;
    for (const [field, value] of Object.entries({ name, phone, email, address, tags })) {
      if (value === null || value === undefined) {
        throw new TypeError(`Client ${field} must be present`);
      }
    }

    this.name = name;
    this.phone = phone;
    this.email = email;
    this.address = address;
    this.tags = toTagSet(tags);
    this.productPreference = fields.productPreference;
    this.description = fields.description;
    this.priority = fields.priority;
    this.totalPurchase = fields.productPreference?.frequency.value ?? 0;
    Object.freeze(this);
  }

  /**
   * Returns true if both clients have the same name, phone and address.
   * This defines a weaker notion of equality between two clients.
   */
  isSameClient(other: Client | null | undefined): boolean {
    if (other === this) {
      return true;
    }
    return (
      !!other &&
      other.name.equals(this.name) &&
      other.phone.equals(this.phone) &&
      other.address.equals(this.address)
    );
  }

  /**
   * Returns true if both clients have the same identity and data fields.
   */
  equals(other: Client | null | undefined): boolean {
    if (other === this) {
      return true;
    }
    return (
      !!other &&
      this.isSameClient(other) &&
      other.email.equals(this.email) &&
      tagSetsEqual(other.tags, this.tags) &&
      optionalEquals(other.productPreference, this.productPreference) &&
      optionalEquals(other.description, this.description) &&
      optionalEquals(other.priority, this.priority)
    );
  }

  toString(): string {
    return `Client{name=${this.name}, phone=${this.phone}, email=${this.email}, address=${this.address}, tags=${this.tags.join('')}, productPreference=${this.productPreference ?? ''}, totalPurchase=${this.totalPurchase}, description=${this.description ?? ''}, priority=${this.priority ?? ''}}`;
  }
}

function optionalEquals<T extends { equals(other: T): boolean }>(a: T | undefined, b: T | undefined): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  return a.equals(b);
}
