import { Observable } from 'rxjs';
import { Client } from './client';
import { ClientComparator } from './client-comparators';
import { ClientPredicate } from './client-predicates';
import { ClientView } from './client-view';
import { ClientListChange, UniqueClientList } from './unique-client-list';

/**
 * ClientRegistryModel
 *
 * The state commands act on: the registry and the view derived from it.
 */
export class ClientRegistryModel {
  private readonly clients: UniqueClientList;
  private readonly view: ClientView;

  /** Registry mutations, for persistence and other observers */
  readonly changes$: Observable<ClientListChange>;

  /** Displayed sequence, re-emitted on every registry or view change */
  readonly displayedClients$: Observable<readonly Client[]>;

  constructor(initialClients: Iterable<Client> = []) {
    this.clients = new UniqueClientList(initialClients);
    this.view = new ClientView(this.clients);
    this.changes$ = this.clients.changes$;
    this.displayedClients$ = this.view.clients$;
  }

  // ── Registry ──

  hasClient(client: Client): boolean {
    return this.clients.contains(client);
  }

  addClient(client: Client): void {
    this.clients.add(client);
  }

  setClient(target: Client, edited: Client): void {
    this.clients.replace(target, edited);
  }

  deleteClient(target: Client): void {
    this.clients.remove(target);
  }

  setClients(clients: Iterable<Client>): void {
    this.clients.replaceAll(clients);
  }

  /** Every client in insertion order */
  getClients(): readonly Client[] {
    return this.clients.asReadOnlySequence();
  }

  // ── View ──

  getDisplayedClients(): readonly Client[] {
    return this.view.getDisplayed();
  }

  updateFilter(predicate: ClientPredicate): void {
    this.view.setFilter(predicate);
  }

  sortDisplayedClients(comparator: ClientComparator): void {
    this.view.setSort(comparator);
  }

  resetView(): void {
    this.view.reset();
  }

  dispose(): void {
    this.view.dispose();
    this.clients.dispose();
  }
}
