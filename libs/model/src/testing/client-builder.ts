import {
  Address,
  Client,
  Description,
  Email,
  Frequency,
  Name,
  Phone,
  Priority,
  ProductPreference,
  Tag,
} from '../lib/client';

/**
 * Builds {@link Client} instances for tests from plain strings.
 */
export class ClientBuilder {
  static readonly DEFAULT_NAME = 'Amy Bee';
  static readonly DEFAULT_PHONE = '85355255';
  static readonly DEFAULT_EMAIL = 'amy@gmail.com';
  static readonly DEFAULT_ADDRESS = '123, Jurong West Ave 6, #08-111';

  private name = ClientBuilder.DEFAULT_NAME;
  private phone = ClientBuilder.DEFAULT_PHONE;
  private email = ClientBuilder.DEFAULT_EMAIL;
  private address = ClientBuilder.DEFAULT_ADDRESS;
  private tags: string[] = [];
  private preference?: { label: string; frequency?: number };
  private description?: string;
  private priority?: number;

  static from(client: Client): ClientBuilder {
    const builder = new ClientBuilder();
    builder.name = client.name.fullName;
    builder.phone = client.phone.value;
    builder.email = client.email.value;
    builder.address = client.address.value;
    builder.tags = client.tags.map((tag) => tag.tagName);
    builder.preference = client.productPreference && {
      label: client.productPreference.label,
      frequency: client.productPreference.frequency.value,
    };
    builder.description = client.description?.text;
    builder.priority = client.priority?.level;
    return builder;
  }

  withName(name: string): this {
    this.name = name;
    return this;
  }

  withPhone(phone: string): this {
    this.phone = phone;
    return this;
  }

  withEmail(email: string): this {
    this.email = email;
    return this;
  }

  withAddress(address: string): this {
    this.address = address;
    return this;
  }

  withTags(...tags: string[]): this {
    this.tags = tags;
    return this;
  }

  withProductPreference(label: string, frequency?: number): this {
    this.preference = { label, frequency };
    return this;
  }

  withoutProductPreference(): this {
    this.preference = undefined;
    return this;
  }

  withDescription(description: string): this {
    this.description = description;
    return this;
  }

  withoutDescription(): this {
    this.description = undefined;
    return this;
  }

  withPriority(level: number): this {
    this.priority = level;
    return this;
  }

  withoutPriority(): this {
    this.priority = undefined;
    return this;
  }

  build(): Client {
    const { preference } = this;
    return new Client({
      name: Name.create(this.name),
      phone: Phone.create(this.phone),
      email: Email.create(this.email),
      address: Address.create(this.address),
      tags: this.tags.map((tag) => Tag.create(tag)),
      productPreference: preference
        ? ProductPreference.of(
            preference.label,
            preference.frequency === undefined ? undefined : Frequency.of(preference.frequency),
          )
        : undefined,
      description: this.description === undefined ? undefined : Description.create(this.description),
      priority: this.priority === undefined ? undefined : Priority.fromLevel(this.priority),
    });
  }
}
