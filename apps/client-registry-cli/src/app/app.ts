import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { LoggerService } from '@client-registry/logger';
import {
  CommandError,
  LogicService,
  ParseError,
  formatClientList,
  formatCommandResult,
} from '@client-registry/logic';

export interface CliIo {
  input: Readable;
  output: Writable;
  /** Shown before each command; empty when input is not a terminal */
  prompt?: string;
}

export const DEFAULT_PROMPT = 'client-registry> ';

/**
 * ClientRegistryCli
 *
 * Reads one command per line, runs it through the {@link LogicService} and
 * prints what changed. Stops on `exit` or at the end of the input, once
 * every pending save has finished.
 */
export class ClientRegistryCli {
  private readonly logger: LoggerService;

  constructor(
    private readonly logic: LogicService,
    private readonly io: CliIo,
    logger: LoggerService,
  ) {
    this.logger = logger.child({ component: 'ClientRegistryCli' });
  }

  async run(): Promise<void> {
    const rl = createInterface({
      input: this.io.input,
      output: this.io.output,
      prompt: this.io.prompt ?? DEFAULT_PROMPT,
      terminal: false,
    });
    const warningsSubscription = this.logic.warnings$.subscribe((warning) => this.print(`Warning: ${warning}`));

    this.logger.info('Session started');
    this.print(formatClientList(this.logic.getDisplayedClients()));
    rl.prompt();

    try {
      for await (const line of rl) {
        if (line.trim() !== '' && this.handle(line)) {
          break;
        }
        rl.prompt();
      }
    } finally {
      rl.close();
      await this.logic.flush();
      warningsSubscription.unsubscribe();
      this.logger.info('Session ended');
    }
  }

  /** Returns true when the application should exit */
  private handle(line: string): boolean {
    try {
      const result = this.logic.execute(line);
      this.print(formatCommandResult(result, this.logic.getDisplayedClients()));
      return result.exit;
    } catch (error) {
      if (error instanceof ParseError || error instanceof CommandError) {
        this.print(error.message);
        return false;
      }
      const unexpected = error instanceof Error ? error : new Error(String(error));
      this.logger.error(unexpected, 'Unexpected error while executing command');
      this.print(`Unexpected error: ${unexpected.message}`);
      return false;
    }
  }

  private print(text: string): void {
    this.io.output.write(`${text}\n`);
  }
}
