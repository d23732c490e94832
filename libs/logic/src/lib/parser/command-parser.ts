import { Client, ProductPreference } from '@client-registry/model';
import { Command, FilterCriterion, isCommandWord } from '../commands/command';
import { COMMAND_USAGE } from '../commands/command-usage';
import { EditField, createEditDescriptor } from '../commands/edit-descriptor';
import { MESSAGE_UNKNOWN_COMMAND, invalidCommandFormatMessage } from '../messages';
import { ArgumentMultimap, tokenize } from './argument-tokenizer';
import { ParseError } from './parse-error';
import { PREFIX, Prefix } from './prefix';
import {
  parseAddress,
  parseDescription,
  parseEmail,
  parseFrequency,
  parseIndex,
  parseName,
  parsePhone,
  parsePriority,
  parseProductPreference,
  parseTags,
} from './parser-util';

export const MESSAGE_FREQUENCY_NOT_ALLOWED_ALONE =
  'Frequency is not allowed as an alone parameter. ' +
  'Please include the product preference you would like to edit the frequency of.';

const COMMAND_FORMAT = /^(\S+)([\s\S]*)$/;

/**
 * Parses one line of user input into a {@link Command}.
 *
 * Only the format is checked here; rules that depend on the registry or the
 * displayed sequence are checked when the command runs.
 *
 * @throws ParseError if the input does not follow the command grammar
 */
export function parseCommand(input: string): Command {
  const match = COMMAND_FORMAT.exec(input.trim());
  if (!match) {
    throw new ParseError(invalidCommandFormatMessage(COMMAND_USAGE.help));
  }

  const [, commandWord, args] = match;
  if (!isCommandWord(commandWord)) {
    throw new ParseError(MESSAGE_UNKNOWN_COMMAND);
  }

  switch (commandWord) {
    case 'add':
      return parseAdd(args);
    case 'edit':
      return parseEdit(args);
    case 'delete':
      return { kind: 'delete', index: parseIndexArgument(args, COMMAND_USAGE.delete) };
    case 'expand':
      return { kind: 'expand', index: parseIndexArgument(args, COMMAND_USAGE.expand) };
    case 'desc':
      return parseDesc(args);
    case 'find':
      return parseFind(args);
    case 'filter':
      return parseFilter(args);
    case 'rank':
      return parseRank(args);
    case 'list':
    case 'clear':
    case 'exit':
    case 'help':
      return { kind: commandWord };
  }
}

function requireValue(argMultimap: ArgumentMultimap, prefix: Prefix, usage: string): string {
  const value = argMultimap.getValue(prefix);
  if (value === undefined) {
    throw new ParseError(invalidCommandFormatMessage(usage));
  }
  return value;
}

function parseIndexArgument(args: string, usage: string): number {
  if (args.trim().length === 0) {
    throw new ParseError(invalidCommandFormatMessage(usage));
  }
  return parseIndex(args);
}

function verifyFrequencyHasPreference(argMultimap: ArgumentMultimap): void {
  if (argMultimap.has(PREFIX.frequency) && !argMultimap.has(PREFIX.preference)) {
    throw new ParseError(MESSAGE_FREQUENCY_NOT_ALLOWED_ALONE);
  }
}

function parsePreferenceArguments(argMultimap: ArgumentMultimap): ProductPreference | undefined {
  const label = argMultimap.getValue(PREFIX.preference);
  if (label === undefined) {
    return undefined;
  }
  const frequency = argMultimap.getValue(PREFIX.frequency);
  return parseProductPreference(label, frequency === undefined ? undefined : parseFrequency(frequency));
}

function parseAdd(args: string): Command {
  const { name, phone, email, address, tag, preference, frequency } = PREFIX;
  const usage = COMMAND_USAGE.add;
  const argMultimap = tokenize(args, name, phone, email, address, tag, preference, frequency);

  if (argMultimap.preamble !== '') {
    throw new ParseError(invalidCommandFormatMessage(usage));
  }
  const nameText = requireValue(argMultimap, name, usage);
  const phoneText = requireValue(argMultimap, phone, usage);
  const emailText = requireValue(argMultimap, email, usage);
  const addressText = requireValue(argMultimap, address, usage);

  argMultimap.verifyNoDuplicatePrefixesFor(name, phone, email, address, preference, frequency);
  verifyFrequencyHasPreference(argMultimap);

  const client = new Client({
    name: parseName(nameText),
    phone: parsePhone(phoneText),
    email: parseEmail(emailText),
    address: parseAddress(addressText),
    tags: parseTags(argMultimap.getAllValues(tag)),
    productPreference: parsePreferenceArguments(argMultimap),
  });
  return { kind: 'add', client };
}

function parseEdit(args: string): Command {
  const { name, phone, email, address, tag, preference, frequency, priority } = PREFIX;
  const argMultimap = tokenize(args, name, phone, email, address, tag, preference, frequency, priority);

  if (argMultimap.preamble === '') {
    throw new ParseError(invalidCommandFormatMessage(COMMAND_USAGE.edit));
  }
  const index = parseIndex(argMultimap.preamble);

  argMultimap.verifyNoDuplicatePrefixesFor(name, phone, email, address, preference, frequency, priority);
  verifyFrequencyHasPreference(argMultimap);

  const setIfGiven = <T>(prefix: Prefix, parse: (text: string) => T) => {
    const text = argMultimap.getValue(prefix);
    return text === undefined ? undefined : EditField.set(parse(text));
  };

  const productPreference = parsePreferenceArguments(argMultimap);
  const priorityText = argMultimap.getValue(priority);
  const priorityValue = priorityText === undefined ? undefined : parsePriority(priorityText);

  const descriptor = createEditDescriptor({
    name: setIfGiven(name, parseName),
    phone: setIfGiven(phone, parsePhone),
    email: setIfGiven(email, parseEmail),
    address: setIfGiven(address, parseAddress),
    tags: parseTagsForEdit(argMultimap.getAllValues(tag)),
    productPreference: productPreference && EditField.set(productPreference),
    priority:
      priorityText === undefined
        ? undefined
        : priorityValue === undefined
          ? EditField.clear
          : EditField.set(priorityValue),
  });
  return { kind: 'edit', index, descriptor };
}

/**
 * A single empty `tag/` removes every tag.
 */
function parseTagsForEdit(values: string[]) {
  if (values.length === 0) {
    return undefined;
  }
  if (values.length === 1 && values[0] === '') {
    return EditField.clear;
  }
  return EditField.set(parseTags(values));
}

function parseDesc(args: string): Command {
  const match = /^(\S+)(?:\s+([\s\S]*))?$/.exec(args.trim());
  if (!match) {
    throw new ParseError(invalidCommandFormatMessage(COMMAND_USAGE.desc));
  }
  const [, indexText, text = ''] = match;
  return { kind: 'desc', index: parseIndex(indexText), description: parseDescription(text) };
}

function parseFind(args: string): Command {
  const keywords = args.trim().split(/\s+/).filter((keyword) => keyword.length > 0);
  if (keywords.length === 0) {
    throw new ParseError(invalidCommandFormatMessage(COMMAND_USAGE.find));
  }
  return { kind: 'find', keywords };
}

function parseFilter(args: string): Command {
  const { preference, priority } = PREFIX;
  const argMultimap = tokenize(args, preference, priority);
  if (argMultimap.preamble !== '') {
    throw new ParseError(invalidCommandFormatMessage(COMMAND_USAGE.filter));
  }
  argMultimap.verifyNoDuplicatePrefixesFor(preference, priority);

  const criteria: FilterCriterion[] = [];
  const keyword = argMultimap.getValue(preference);
  if (keyword !== undefined) {
    criteria.push({ by: 'preference', keyword });
  }
  const level = argMultimap.getValue(priority);
  if (level !== undefined) {
    criteria.push({ by: 'priority', priority: parsePriority(level) });
  }
  return { kind: 'filter', criteria };
}

function parseRank(args: string): Command {
  const keyword = args.trim();
  if (keyword === '') {
    throw new ParseError(invalidCommandFormatMessage(COMMAND_USAGE.rank));
  }
  return { kind: 'rank', keyword };
}
