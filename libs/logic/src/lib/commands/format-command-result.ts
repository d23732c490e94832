import { Client } from '@client-registry/model';
import { formatClientDetails, formatClientList } from '../messages';
import { CommandResult } from './command';
import { commandReference } from './command-usage';

/**
 * Text shown after a successful command: the feedback, then the numbered
 * list when it changed, the expanded client, and the command reference when
 * asked for.
 */
export function formatCommandResult(result: CommandResult, displayed: readonly Client[]): string {
  const sections = [result.feedbackToUser];
  if (result.listChanged) {
    sections.push(formatClientList(displayed));
  }
  if (result.expandedClient) {
    sections.push(formatClientDetails(result.expandedClient));
  }
  if (result.showHelp) {
    sections.push(commandReference());
  }
  return sections.join('\n\n');
}
