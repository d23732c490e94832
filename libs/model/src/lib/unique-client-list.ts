import { Observable, Subject } from 'rxjs';
import { Client } from './client';
import { ClientNotFoundError, DuplicateClientError } from './errors';

/**
 * A successful mutation of a {@link UniqueClientList}
 */
export type ClientListChange =
  | { type: 'add'; client: Client; index: number }
  | { type: 'replace'; target: Client; edited: Client; index: number }
  | { type: 'remove'; client: Client; index: number }
  | { type: 'replaceAll'; clients: readonly Client[] };

/**
 * UniqueClientList
 *
 * Ordered list of clients in which no two elements share an identity
 * (see {@link Client.isSameClient}). Clients keep their insertion order;
 * a replaced client takes the position of the one it replaces.
 *
 * Every successful mutation is emitted on `changes$` after the list has
 * been updated, so subscribers always read the new contents.
 */
export class UniqueClientList implements Iterable<Client> {
  private readonly internalList: Client[] = [];
  private readonly readOnlyView: readonly Client[];
  private readonly changesSubject = new Subject<ClientListChange>();

  /** Emits once per successful add, replace, remove or replaceAll */
  readonly changes$: Observable<ClientListChange> = this.changesSubject.asObservable();

  constructor(clients: Iterable<Client> = []) {
    const initial = [...clients];
    initial.forEach(requireClient);
    UniqueClientList.assertUnique(initial);
    this.internalList.push(...initial);
    this.readOnlyView = new Proxy(this.internalList, {
      set: () => {
        throw new TypeError('The client list view is read-only');
      },
      deleteProperty: () => {
        throw new TypeError('The client list view is read-only');
      },
      defineProperty: () => {
        throw new TypeError('The client list view is read-only');
      },
    });
  }

  get size(): number {
    return this.internalList.length;
  }

  /**
   * Returns true if the list contains a client with the same identity as `toCheck`.
   */
  contains(toCheck: Client): boolean {
    requireClient(toCheck);
    return this.indexOf(toCheck) !== -1;
  }

  /**
   * Appends a client.
   * @throws TypeError if `toAdd` is null or undefined
   * @throws DuplicateClientError if a client with the same identity exists
   */
  add(toAdd: Client): void {
    requireClient(toAdd);
    if (this.contains(toAdd)) {
      throw new DuplicateClientError();
    }
    this.internalList.push(toAdd);
    this.changesSubject.next({ type: 'add', client: toAdd, index: this.internalList.length - 1 });
  }

  /**
   * Replaces `target` with `edited` at the same position.
   * @throws ClientNotFoundError if `target` is not in the list
   * @throws DuplicateClientError if `edited` takes the identity of another client
   */
  replace(target: Client, edited: Client): void {
    requireClient(target);
    requireClient(edited);
    const index = this.indexOf(target);
    if (index === -1) {
      throw new ClientNotFoundError();
    }
    if (!target.isSameClient(edited) && this.contains(edited)) {
      throw new DuplicateClientError();
    }
    this.internalList[index] = edited;
    this.changesSubject.next({ type: 'replace', target, edited, index });
  }

  /**
   * Removes the client with the same identity as `toRemove`.
   * @throws ClientNotFoundError if no such client exists
   */
  remove(toRemove: Client): void {
    requireClient(toRemove);
    const index = this.indexOf(toRemove);
    if (index === -1) {
      throw new ClientNotFoundError();
    }
    const [removed] = this.internalList.splice(index, 1);
    this.changesSubject.next({ type: 'remove', client: removed, index });
  }

  /**
   * Replaces the whole contents.
   * @throws DuplicateClientError if `clients` holds two clients with the same identity
   */
  replaceAll(clients: Iterable<Client>): void {
    const replacement = [...clients];
    replacement.forEach(requireClient);
    UniqueClientList.assertUnique(replacement);
    this.internalList.splice(0, this.internalList.length, ...replacement);
    this.changesSubject.next({ type: 'replaceAll', clients: this.readOnlyView });
  }

  /**
   * Live view of the list in insertion order. Writes through the view throw.
   */
  asReadOnlySequence(): readonly Client[] {
    return this.readOnlyView;
  }

  /**
   * Same clients, compared field by field, in the same order.
   */
  equals(other: UniqueClientList): boolean {
    return (
      other.internalList.length === this.internalList.length &&
      this.internalList.every((client, i) => client.equals(other.internalList[i]))
    );
  }

  [Symbol.iterator](): Iterator<Client> {
    return this.internalList[Symbol.iterator]();
  }

  /** Releases subscribers of `changes$` */
  dispose(): void {
    this.changesSubject.complete();
  }

  private indexOf(client: Client): number {
    return this.internalList.findIndex((existing) => existing.isSameClient(client));
  }

  private static assertUnique(clients: readonly Client[]): void {
    for (let i = 0; i < clients.length - 1; i++) {
      for (let j = i + 1; j < clients.length; j++) {
        if (clients[i].isSameClient(clients[j])) {
          throw new DuplicateClientError();
        }
      }
    }
  }
}

function requireClient(client: Client | null | undefined): void {
  if (client === null || client === undefined) {
    throw new TypeError('Client must be present');
  }
}
