import { PREFIX } from '../parser/prefix';
import { CommandWord } from './command';

const { name, phone, email, address, tag, preference, frequency, priority } = PREFIX;

/**
 * Usage text of every command, keyed by command word
 */
export const COMMAND_USAGE: Readonly<Record<CommandWord, string>> = {
  add:
    'add: Adds a client to the client registry.\n' +
    `Parameters: ${name}NAME ${phone}PHONE ${email}EMAIL ${address}ADDRESS [${tag}TAG]... ` +
    `[${preference}PRODUCT_PREFERENCE] [${frequency}FREQUENCY]\n` +
    `Example: add ${name}John Doe ${phone}98765432 ${email}johnd@example.com ` +
    `${address}311, Clementi Ave 2, #02-25 ${tag}friends ${preference}Shampoo ${frequency}4`,
  edit:
    'edit: Edits the details of the client identified by the index number used in the displayed client list. ' +
    'Existing values will be overwritten by the input values.\n' +
    `Parameters: INDEX (must be a positive integer) [${name}NAME] [${phone}PHONE] [${email}EMAIL] ` +
    `[${address}ADDRESS] [${tag}TAG]... [${preference}PRODUCT_PREFERENCE] [${frequency}FREQUENCY] ` +
    `[${priority}PRIORITY]\n` +
    `Example: edit 1 ${phone}91234567 ${email}johndoe@example.com`,
  delete:
    'delete: Deletes the client identified by the index number used in the displayed client list.\n' +
    'Parameters: INDEX (must be a positive integer)\n' +
    'Example: delete 1',
  list: 'list: Lists all clients, sorted by name.\nExample: list',
  find:
    'find: Finds all clients whose names, tags or product preferences contain any of ' +
    'the specified keywords (case-insensitive) and displays them as a list with index numbers.\n' +
    'Parameters: KEYWORD [MORE_KEYWORDS]...\n' +
    'Example: find alice bob charlie',
  filter:
    'filter: Filters all clients by either product preference or priority level ' +
    'and displays them as a list with index numbers.\n' +
    `Parameters: ${preference}PRODUCT_PREFERENCE or ${priority}PRIORITY_LEVEL\n` +
    `Example: filter ${preference}shampoo or filter ${priority}1`,
  rank:
    'rank: Sorts the displayed clients by the given keyword.\n' +
    'Parameters: KEYWORD (name: by name, total: by total purchase, highest first)\n' +
    'Example: rank total',
  desc:
    'desc: Sets the description of the client identified by the index number used in the displayed client list. ' +
    'Leaving the description out removes it.\n' +
    'Parameters: INDEX (must be a positive integer) [DESCRIPTION]\n' +
    'Example: desc 1 Prefers to be contacted in the morning',
  expand:
    'expand: Shows every detail of the client identified by the index number used in the displayed client list.\n' +
    'Parameters: INDEX (must be a positive integer)\n' +
    'Example: expand 1',
  clear: 'clear: Deletes every client.\nExample: clear',
  exit: 'exit: Exits the application.\nExample: exit',
  help: 'help: Shows the command reference.\nExample: help',
};

/**
 * Every usage text, one command per paragraph
 */
export function commandReference(): string {
  return Object.values(COMMAND_USAGE).join('\n\n');
}
