import { Client, Description, Priority } from '@client-registry/model';
import { EditClientDescriptor } from './edit-descriptor';

/**
 * One selector of a `filter` command. A blank keyword or level is kept so
 * that execution can reject it.
 */
export type FilterCriterion =
  | { by: 'preference'; keyword: string }
  | { by: 'priority'; priority: Priority | undefined };

/**
 * A parsed command. Indices are 1-based positions in the displayed sequence.
 */
export type Command =
  | { kind: 'add'; client: Client }
  | { kind: 'edit'; index: number; descriptor: EditClientDescriptor }
  | { kind: 'delete'; index: number }
  | { kind: 'list' }
  | { kind: 'find'; keywords: readonly string[] }
  | { kind: 'filter'; criteria: readonly FilterCriterion[] }
  | { kind: 'rank'; keyword: string }
  | { kind: 'desc'; index: number; description: Description | undefined }
  | { kind: 'expand'; index: number }
  | { kind: 'clear' }
  | { kind: 'exit' }
  | { kind: 'help' };

export type CommandWord = Command['kind'];

export const COMMAND_WORDS: readonly CommandWord[] = [
  'add',
  'edit',
  'delete',
  'list',
  'find',
  'filter',
  'rank',
  'desc',
  'expand',
  'clear',
  'exit',
  'help',
];

export function isCommandWord(word: string): word is CommandWord {
  return COMMAND_WORDS.some((commandWord) => commandWord === word);
}

/**
 * Outcome of a successful command, for the front end to render
 */
export interface CommandResult {
  feedbackToUser: string;
  /** The command reference should be shown */
  showHelp: boolean;
  /** The application should exit */
  exit: boolean;
  /** The registry or the displayed sequence changed */
  listChanged: boolean;
  /** Client whose details should be shown */
  expandedClient?: Client;
}
