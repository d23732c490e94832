import { ClientRegistryConfiguration } from '@client-registry/configuration';
import { LoggerService } from '@client-registry/logger';
import { ClientRegistryModel } from '@client-registry/model';
import { ClientRegistryStorage, FileSystemPort, JsonClientStorage } from '@client-registry/storage';
import { LogicService } from './logic.service';

export interface CreateLogicOptions {
  configuration: ClientRegistryConfiguration;
  logger: LoggerService;
  /** Replaces the JSON file storage named by the configuration */
  storage?: ClientRegistryStorage;
  /** File system used by the JSON file storage */
  fileSystem?: FileSystemPort;
}

/**
 * Loads the registry from storage and wires a {@link LogicService} over it.
 */
export async function createLogic(options: CreateLogicOptions): Promise<LogicService> {
  const { configuration, logger, fileSystem } = options;
  const storage =
    options.storage ?? new JsonClientStorage(configuration.storage.clientDataFile, logger, fileSystem);

  const clients = await storage.loadClients();
  logger.info(
    { app: configuration.app.name, environment: configuration.app.environment, clients: clients.length },
    'Client registry ready'
  );
  return new LogicService(new ClientRegistryModel(clients), storage, logger);
}
