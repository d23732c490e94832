import { LoggerService } from '@client-registry/logger';
import { Client } from '@client-registry/model';
import { fromClientRecord, clientRegistryFileSchema, toClientRecord } from './client-record';
import { FileSystemPort, nodeFileSystem } from './file-system.port';
import { StorageError } from './storage-error';

/**
 * Where the registry is loaded from at start-up and saved to after each change
 */
export interface ClientRegistryStorage {
  readonly filePath: string;
  loadClients(): Promise<Client[]>;
  saveClients(clients: readonly Client[]): Promise<void>;
}

/**
 * JsonClientStorage
 *
 * Keeps the registry in a JSON file of the form `{ "clients": [...] }`.
 *
 * Loading never fails: a missing file yields an empty registry, and so does
 * a file that cannot be read, is not JSON, breaks the record schema, or holds
 * two clients with the same identity (the last cases are logged as warnings).
 * Saving rejects with a {@link StorageError}.
 */
export class JsonClientStorage implements ClientRegistryStorage {
  private readonly logger: LoggerService;

  constructor(
    readonly filePath: string,
    logger: LoggerService,
    private readonly fileSystem: FileSystemPort = nodeFileSystem,
  ) {
    this.logger = logger.child({ service: 'JsonClientStorage' });
  }

  async loadClients(): Promise<Client[]> {
    let text: string | undefined;
    try {
      text = await this.fileSystem.read(this.filePath);
    } catch (error) {
      this.logger.warn(
        { filePath: this.filePath, error: errorMessage(error) },
        'Data file could not be read, starting with an empty registry'
      );
      return [];
    }

    if (text === undefined) {
      this.logger.info({ filePath: this.filePath }, 'No data file found, starting with an empty registry');
      return [];
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      this.logger.warn(
        { filePath: this.filePath, error: errorMessage(error) },
        'Data file is not valid JSON, starting with an empty registry'
      );
      return [];
    }

    const parsed = clientRegistryFileSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn(
        {
          filePath: this.filePath,
          issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        },
        'Data file does not match the client record format, starting with an empty registry'
      );
      return [];
    }

    const clients = parsed.data.clients.map(fromClientRecord);
    const duplicate = clients.find((client, i) => clients.slice(i + 1).some((other) => other.isSameClient(client)));
    if (duplicate) {
      this.logger.warn(
        { filePath: this.filePath, client: duplicate.name.fullName },
        'Data file holds duplicate clients, starting with an empty registry'
      );
      return [];
    }

    this.logger.info({ filePath: this.filePath, count: clients.length }, 'Client registry loaded');
    return clients;
  }

  async saveClients(clients: readonly Client[]): Promise<void> {
    const content = JSON.stringify({ clients: clients.map(toClientRecord) }, null, 2);
    try {
      await this.fileSystem.write(this.filePath, content);
    } catch (error) {
      throw new StorageError(`Could not save data to file ${this.filePath}: ${errorMessage(error)}`, this.filePath, {
        cause: error,
      });
    }
    this.logger.debug({ filePath: this.filePath, count: clients.length }, 'Client registry saved');
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
