import {
  Client,
  ClientComparator,
  ClientPredicate,
  ClientRegistryModel,
  PREDICATE_SHOW_ALL_CLIENTS,
  compareByName,
  compareByTotalPurchase,
  hasPriority,
  matchesAnyKeyword,
  productPreferenceContains,
} from '@client-registry/model';
import {
  MESSAGE_DUPLICATE_CLIENT,
  MESSAGE_INVALID_CLIENT_DISPLAYED_INDEX,
  clientsListedMessage,
  clientsRankedMessage,
  formatClient,
} from '../messages';
import { Command, CommandResult, FilterCriterion } from './command';
import { CommandError } from './command-error';
import { EditField, applyEdit, createEditDescriptor, isAnyFieldEdited } from './edit-descriptor';

export const MESSAGE_ADD_SUCCESS = 'New client added: ';
export const MESSAGE_EDIT_SUCCESS = 'Edited Client: ';
export const MESSAGE_NOT_EDITED = 'At least one field to edit must be provided.';
export const MESSAGE_DELETE_SUCCESS = 'Deleted Client: ';
export const MESSAGE_LIST_SUCCESS = 'Listed all clients';
export const MESSAGE_ADD_DESCRIPTION_SUCCESS = 'Added description to Client: ';
export const MESSAGE_REMOVE_DESCRIPTION_SUCCESS = 'Removed description from Client: ';
export const MESSAGE_EXPAND_SUCCESS = 'Showing details of Client: ';
export const MESSAGE_CLEAR_SUCCESS = 'Client list has been cleared!';
export const MESSAGE_EXIT_ACKNOWLEDGEMENT = 'Exiting client registry as requested ...';
export const MESSAGE_HELP_SUCCESS = 'Showing command reference.';
export const MESSAGE_ONLY_ONE_FILTER_ALLOWED =
  'Filter command takes exactly one filter condition of either product preference or priority ' +
  'and the arguments must not be empty! \n' +
  'filter pref/PRODUCT or priority/LEVEL\n' +
  'Example: filter pref/coffee or filter priority/3';
export const MESSAGE_UNKNOWN_RANK_KEYWORD = 'Please provide a valid keyword for entry ranking';

const RANK_COMPARATORS: ReadonlyMap<string, ClientComparator> = new Map([
  ['name', compareByName],
  ['total', compareByTotalPurchase],
]);

/**
 * Runs `command` against `model`.
 *
 * Every check happens before the first mutation, so a thrown
 * {@link CommandError} leaves the registry and the view as they were.
 */
export function executeCommand(command: Command, model: ClientRegistryModel): CommandResult {
  switch (command.kind) {
    case 'add':
      return addClient(model, command.client);

    case 'edit': {
      if (!isAnyFieldEdited(command.descriptor)) {
        throw new CommandError('no-fields-edited', MESSAGE_NOT_EDITED);
      }
      const target = clientAt(model, command.index);
      const edited = applyEdit(target, command.descriptor);
      if (!target.isSameClient(edited) && model.hasClient(edited)) {
        throw new CommandError('duplicate-client', MESSAGE_DUPLICATE_CLIENT);
      }
      model.setClient(target, edited);
      // the edited client may no longer match the filter; show everything
      model.updateFilter(PREDICATE_SHOW_ALL_CLIENTS);
      return listChanged(MESSAGE_EDIT_SUCCESS + formatClient(edited));
    }

    case 'delete': {
      const target = clientAt(model, command.index);
      model.deleteClient(target);
      return listChanged(MESSAGE_DELETE_SUCCESS + formatClient(target));
    }

    case 'list':
      model.resetView();
      return listChanged(MESSAGE_LIST_SUCCESS);

    case 'find':
      model.updateFilter(matchesAnyKeyword(command.keywords));
      return listChanged(clientsListedMessage(model.getDisplayedClients().length));

    case 'filter':
      model.updateFilter(toFilterPredicate(command.criteria));
      return listChanged(clientsListedMessage(model.getDisplayedClients().length));

    case 'rank': {
      const comparator = RANK_COMPARATORS.get(command.keyword.toLowerCase());
      if (!comparator) {
        throw new CommandError('unknown-rank-keyword', MESSAGE_UNKNOWN_RANK_KEYWORD);
      }
      model.sortDisplayedClients(comparator);
      return listChanged(clientsRankedMessage(model.getDisplayedClients().length));
    }

    case 'desc': {
      const target = clientAt(model, command.index);
      const { description } = command;
      const edited = applyEdit(
        target,
        createEditDescriptor({ description: description ? EditField.set(description) : EditField.clear }),
      );
      model.setClient(target, edited);
      const message = description ? MESSAGE_ADD_DESCRIPTION_SUCCESS : MESSAGE_REMOVE_DESCRIPTION_SUCCESS;
      return listChanged(message + formatClient(edited));
    }

    case 'expand': {
      const target = clientAt(model, command.index);
      return { ...result(MESSAGE_EXPAND_SUCCESS + target.name.fullName), expandedClient: target };
    }

    case 'clear':
      model.setClients([]);
      return listChanged(MESSAGE_CLEAR_SUCCESS);

    case 'exit':
      return { ...result(MESSAGE_EXIT_ACKNOWLEDGEMENT), exit: true };

    case 'help':
      return { ...result(MESSAGE_HELP_SUCCESS), showHelp: true };
  }
}

function result(feedbackToUser: string): CommandResult {
  return { feedbackToUser, showHelp: false, exit: false, listChanged: false };
}

function listChanged(feedbackToUser: string): CommandResult {
  return { ...result(feedbackToUser), listChanged: true };
}

function addClient(model: ClientRegistryModel, client: Client): CommandResult {
  if (model.hasClient(client)) {
    throw new CommandError('duplicate-client', MESSAGE_DUPLICATE_CLIENT);
  }
  model.addClient(client);
  return listChanged(MESSAGE_ADD_SUCCESS + formatClient(client));
}

/**
 * Resolves a 1-based index against the displayed sequence.
 */
function clientAt(model: ClientRegistryModel, index: number): Client {
  const displayed = model.getDisplayedClients();
  if (index < 1 || index > displayed.length) {
    throw new CommandError('invalid-index', MESSAGE_INVALID_CLIENT_DISPLAYED_INDEX);
  }
  return displayed[index - 1];
}

function toFilterPredicate(criteria: readonly FilterCriterion[]): ClientPredicate {
  if (criteria.length !== 1) {
    throw new CommandError('invalid-filter', MESSAGE_ONLY_ONE_FILTER_ALLOWED);
  }
  const [criterion] = criteria;
  switch (criterion.by) {
    case 'preference': {
      const keyword = criterion.keyword.trim();
      if (keyword === '') {
        throw new CommandError('invalid-filter', MESSAGE_ONLY_ONE_FILTER_ALLOWED);
      }
      return productPreferenceContains(keyword);
    }
    case 'priority':
      if (!criterion.priority) {
        throw new CommandError('invalid-filter', MESSAGE_ONLY_ONE_FILTER_ALLOWED);
      }
      return hasPriority(criterion.priority);
  }
}
