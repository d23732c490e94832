import { Observable, Subject, Subscription } from 'rxjs';
import { LoggerService } from '@client-registry/logger';
import { Client, ClientRegistryModel } from '@client-registry/model';
import { ClientRegistryStorage } from '@client-registry/storage';
import { CommandResult } from './commands/command';
import { CommandError } from './commands/command-error';
import { executeCommand } from './commands/execute-command';
import { parseCommand } from './parser/command-parser';
import { ParseError } from './parser/parse-error';

/**
 * LogicService
 *
 * Entry point of the front ends: parses and runs one command at a time
 * against the registry model, then saves the registry when the command
 * changed it.
 *
 * Saving does not hold up the command. Saves run one after another in
 * command order; a failed save leaves the in-memory registry as it is, is
 * logged, and its message is published on `warnings$`.
 */
export class LogicService {
  private readonly logger: LoggerService;
  private readonly changesSubscription: Subscription;
  private readonly warningsSubject = new Subject<string>();
  private registryChanged = false;
  private pendingSave: Promise<void> = Promise.resolve();

  /** Messages of failed saves */
  readonly warnings$: Observable<string> = this.warningsSubject.asObservable();

  /** Displayed sequence, starting with the current one */
  readonly displayedClients$: Observable<readonly Client[]>;

  constructor(
    private readonly model: ClientRegistryModel,
    private readonly storage: ClientRegistryStorage,
    logger: LoggerService,
  ) {
    this.logger = logger.child({ service: 'LogicService' });
    this.displayedClients$ = model.displayedClients$;
    this.changesSubscription = model.changes$.subscribe(() => {
      this.registryChanged = true;
    });
  }

  /**
   * Parses and runs `commandText`.
   *
   * @throws ParseError if the text does not follow the command grammar
   * @throws CommandError if the command cannot be carried out
   */
  execute(commandText: string): CommandResult {
    this.logger.debug({ commandText }, 'Executing command');

    let result: CommandResult;
    try {
      result = executeCommand(parseCommand(commandText), this.model);
    } catch (error) {
      if (error instanceof CommandError) {
        this.logger.warn({ commandText, code: error.code, reason: error.message }, 'Command rejected');
      } else if (error instanceof ParseError) {
        this.logger.warn({ commandText, reason: error.message }, 'Command could not be parsed');
      }
      throw error;
    }

    this.logger.info({ commandText, feedback: result.feedbackToUser }, 'Command executed');

    if (this.registryChanged) {
      this.registryChanged = false;
      this.save();
    }
    return result;
  }

  /** Current displayed sequence (synchronous) */
  getDisplayedClients(): readonly Client[] {
    return this.model.getDisplayedClients();
  }

  /** Every client in insertion order */
  getClients(): readonly Client[] {
    return this.model.getClients();
  }

  get dataFilePath(): string {
    return this.storage.filePath;
  }

  /**
   * Resolves once every save started so far has finished.
   */
  flush(): Promise<void> {
    return this.pendingSave;
  }

  dispose(): void {
    this.changesSubscription.unsubscribe();
    this.warningsSubject.complete();
    this.model.dispose();
  }

  private save(): void {
    const snapshot = [...this.model.getClients()];
    this.pendingSave = this.pendingSave
      .then(() => this.storage.saveClients(snapshot))
      .catch((error: unknown) => this.reportSaveFailure(error));
  }

  private reportSaveFailure(error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    this.logger.warn({ filePath: this.storage.filePath, reason: message }, 'Failed to save client registry');
    this.warningsSubject.next(message);
  }
}
