import { z } from 'zod';
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
} from '@client-registry/model';

/**
 * A client as stored in the data file. Field texts are validated with the
 * same rules as user input, so a record that parses always builds a Client.
 */
export const clientRecordSchema = z.object({
  name: z.string().refine((name) => Name.isValid(name), Name.MESSAGE_CONSTRAINTS),
  phone: z.string().refine((phone) => Phone.isValid(phone), Phone.MESSAGE_CONSTRAINTS),
  email: z.string().refine((email) => Email.isValid(email), Email.MESSAGE_CONSTRAINTS),
  address: z.string().refine((address) => Address.isValid(address), Address.MESSAGE_CONSTRAINTS),
  tags: z.array(z.string().refine((tag) => Tag.isValid(tag), Tag.MESSAGE_CONSTRAINTS)),
  productPreference: z
    .object({
      label: z
        .string()
        .refine((label) => ProductPreference.isValid(label), ProductPreference.MESSAGE_CONSTRAINTS),
      frequency: z
        .number()
        .refine((frequency) => Frequency.isValid(frequency), Frequency.MESSAGE_CONSTRAINTS),
    })
    .optional(),
  description: z.string().optional(),
  priority: z.number().refine((level) => Priority.isValid(level), Priority.MESSAGE_CONSTRAINTS).optional(),
});

export type ClientRecord = z.infer<typeof clientRecordSchema>;

/**
 * Layout of the whole data file
 */
export const clientRegistryFileSchema = z.object({
  clients: z.array(clientRecordSchema),
});

export type ClientRegistryFile = z.infer<typeof clientRegistryFileSchema>;

export function toClientRecord(client: Client): ClientRecord {
  const record: ClientRecord = {
    name: client.name.fullName,
    phone: client.phone.value,
    email: client.email.value,
    address: client.address.value,
    tags: client.tags.map((tag) => tag.tagName),
  };
  if (client.productPreference) {
    record.productPreference = {
      label: client.productPreference.label,
      frequency: client.productPreference.frequency.value,
    };
  }
  if (client.description) {
    record.description = client.description.text;
  }
  if (client.priority) {
    record.priority = client.priority.level;
  }
  return record;
}

export function fromClientRecord(record: ClientRecord): Client {
  const { productPreference, description, priority } = record;
  return new Client({
    name: Name.create(record.name),
    phone: Phone.create(record.phone),
    email: Email.create(record.email),
    address: Address.create(record.address),
    tags: record.tags.map((tag) => Tag.create(tag)),
    productPreference: productPreference
      ? ProductPreference.of(productPreference.label, Frequency.of(productPreference.frequency))
      : undefined,
    // a blank description means none
    description: description !== undefined && Description.isValid(description) ? Description.create(description) : undefined,
    priority: priority === undefined ? undefined : Priority.fromLevel(priority),
  });
}
