import { Client } from '@client-registry/model';

/*
 * User visible messages
 */

export const MESSAGE_UNKNOWN_COMMAND = 'Unknown command';
export const MESSAGE_INVALID_COMMAND_FORMAT = 'Invalid command format! \n';
export const MESSAGE_INVALID_CLIENT_DISPLAYED_INDEX = 'The client index provided is out of range';
export const MESSAGE_DUPLICATE_FIELDS = 'Multiple values specified for the following single-valued field(s): ';
export const MESSAGE_DUPLICATE_CLIENT = 'This client already exists in the client registry';
export const MESSAGE_NO_CLIENTS = 'No clients to show.';

export function invalidCommandFormatMessage(usage: string): string {
  return MESSAGE_INVALID_COMMAND_FORMAT + usage;
}

export function duplicatePrefixesMessage(prefixes: readonly string[]): string {
  return MESSAGE_DUPLICATE_FIELDS + prefixes.join(' ');
}

export function clientsListedMessage(count: number): string {
  return `${count} clients listed!`;
}

export function clientsRankedMessage(count: number): string {
  return `${count} clients ranked!`;
}

/**
 * One-line summary of a client, used in command feedback.
 *
 * @example
 * 'Bob Choo; Phone: 82222222; Email: bob@example.com; Address: Block 123; Tags: [friend]; Priority: 2'
 */
export function formatClient(client: Client): string {
  let summary =
    `${client.name}; Phone: ${client.phone}; Email: ${client.email}; Address: ${client.address}; ` +
    `Tags: ${client.tags.join('')}`;
  if (client.productPreference) {
    summary += `; Product Preference: ${client.productPreference}`;
  }
  if (client.description) {
    summary += `; Description: ${client.description}`;
  }
  if (client.priority) {
    summary += `; Priority: ${client.priority}`;
  }
  return summary;
}

/**
 * The displayed sequence, numbered from 1 as commands index it
 */
export function formatClientList(clients: readonly Client[]): string {
  if (clients.length === 0) {
    return MESSAGE_NO_CLIENTS;
  }
  return clients.map((client, i) => `${i + 1}. ${formatClient(client)}`).join('\n');
}

/**
 * Detail block of an expanded client, one field per line. Sections for
 * absent optional fields are left out.
 */
export function formatClientDetails(client: Client): string {
  const lines = [
    client.name.fullName,
    `Phone: ${client.phone}`,
    `Email: ${client.email}`,
    `Address: ${client.address}`,
  ];
  if (client.priority) {
    lines.push(`Priority: ${client.priority}`);
  }
  if (client.productPreference) {
    lines.push(
      `Preferred Products: ${client.productPreference}`,
      `Purchase Frequency: ${client.productPreference.frequency}`,
    );
  }
  if (client.description) {
    lines.push(`Description: ${client.description}`);
  }
  return lines.join('\n');
}
