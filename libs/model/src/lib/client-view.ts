import { BehaviorSubject, Observable, Subscription } from 'rxjs';
import { Client } from './client';
import { ClientComparator, DEFAULT_CLIENT_COMPARATOR } from './client-comparators';
import { ClientPredicate, PREDICATE_SHOW_ALL_CLIENTS } from './client-predicates';
import { UniqueClientList } from './unique-client-list';

/**
 * ClientView
 *
 * The displayed sequence: the registry passed through the active predicate,
 * then ordered by the active comparator. The sort is stable, so clients
 * that compare equal keep their registry order.
 *
 * The sequence is re-derived from the whole registry on every predicate,
 * ordering or registry change, never from the previous result, and
 * `clients$` emits the new sequence before the triggering call returns.
 */
export class ClientView {
  private predicate: ClientPredicate = PREDICATE_SHOW_ALL_CLIENTS;
  private comparator: ClientComparator = DEFAULT_CLIENT_COMPARATOR;
  private readonly displayedSubject: BehaviorSubject<readonly Client[]>;
  private readonly registrySubscription: Subscription;

  /** Emits the displayed sequence, starting with the current one */
  readonly clients$: Observable<readonly Client[]>;

  constructor(private readonly source: UniqueClientList) {
    this.displayedSubject = new BehaviorSubject<readonly Client[]>(this.derive());
    this.clients$ = this.displayedSubject.asObservable();
    this.registrySubscription = source.changes$.subscribe(() => this.refresh());
  }

  /**
   * Replaces the active predicate. Filters do not compound.
   */
  setFilter(predicate: ClientPredicate): void {
    this.predicate = predicate;
    this.refresh();
  }

  /**
   * Reorders the filtered clients; the predicate is kept.
   */
  setSort(comparator: ClientComparator): void {
    this.comparator = comparator;
    this.refresh();
  }

  /** Back to every client, ordered by name */
  reset(): void {
    this.predicate = PREDICATE_SHOW_ALL_CLIENTS;
    this.comparator = DEFAULT_CLIENT_COMPARATOR;
    this.refresh();
  }

  /** Current displayed sequence (synchronous) */
  getDisplayed(): readonly Client[] {
    return this.displayedSubject.getValue();
  }

  dispose(): void {
    this.registrySubscription.unsubscribe();
    this.displayedSubject.complete();
  }

  private refresh(): void {
    this.displayedSubject.next(this.derive());
  }

  private derive(): readonly Client[] {
    return Object.freeze(
      this.source.asReadOnlySequence().filter(this.predicate).sort(this.comparator)
    );
  }
}
