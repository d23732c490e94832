import { firstValueFrom } from 'rxjs';
import type { Mock } from 'vitest';
import { LoggerService } from '@client-registry/logger';
import { ConfigurationService, ConfigFileReader } from './configuration.service';
import { ClientRegistryConfiguration } from './client-registry-configuration';

describe('ConfigurationService', () => {
  let files: Record<string, string>;
  let readFile: Mock<ConfigFileReader>;
  let service: ConfigurationService;

  const mockConfig: ClientRegistryConfiguration = {
    app: {
      name: 'Client Registry',
      version: '1.0.0',
    },
    storage: {
      clientDataFile: 'data/clients.json',
    },
  };

  const createService = (env: NodeJS.ProcessEnv = {}) =>
    new ConfigurationService(new LoggerService({ level: 'silent' }), {
      configDir: 'config',
      env,
      readFile,
    });

  beforeEach(() => {
    files = {};
    readFile = vi.fn<ConfigFileReader>(async (path) => {
      const text = files[path];
      if (text === undefined) {
        throw new Error(`ENOENT: no such file, open '${path}'`);
      }
      return text;
    });
    service = createService();
  });

  describe('getEnvironmentFromEnv', () => {
    it('should return "dev" as default environment', () => {
      expect(service.getEnvironmentFromEnv()).toBe('dev');
    });

    it('should read and lower-case CLIENT_REGISTRY_ENV', () => {
      service = createService({ CLIENT_REGISTRY_ENV: 'Prod' });
      expect(service.getEnvironmentFromEnv()).toBe('prod');
    });
  });

  describe('loadConfiguration', () => {
    it('should load configuration for dev environment', async () => {
      files['config/config-dev.json'] = JSON.stringify(mockConfig);

      const config = await firstValueFrom(service.loadConfiguration('dev'));

      expect(readFile).toHaveBeenCalledWith('config/config-dev.json');
      expect(config.app.environment).toBe('dev');
      expect(config.storage.clientDataFile).toBe('data/clients.json');
    });

    it('should inject the loaded environment', async () => {
      files['config/config-prod.json'] = JSON.stringify(mockConfig);

      const config = await firstValueFrom(service.loadConfiguration('prod'));

      expect(config.app.environment).toBe('prod');
      expect(service.getCurrentEnvironment()).toBe('prod');
    });

    it('should return the cached configuration for the same environment', async () => {
      files['config/config-dev.json'] = JSON.stringify(mockConfig);

      await firstValueFrom(service.loadConfiguration('dev'));
      await firstValueFrom(service.loadConfiguration('dev'));

      expect(readFile).toHaveBeenCalledTimes(1);
    });

    it('should fall back to dev configuration when the environment file is missing', async () => {
      files['config/config-dev.json'] = JSON.stringify(mockConfig);

      const config = await firstValueFrom(service.loadConfiguration('staging'));

      expect(readFile).toHaveBeenNthCalledWith(1, 'config/config-staging.json');
      expect(readFile).toHaveBeenNthCalledWith(2, 'config/config-dev.json');
      expect(config.app.environment).toBe('dev');
    });

    it('should fail when both the environment and the fallback file are missing', async () => {
      await expect(firstValueFrom(service.loadConfiguration('staging'))).rejects.toThrow(
        'Unable to load configuration. Tried config/config-staging.json and config/config-dev.json'
      );
    });

    it('should propagate the error when the dev file itself is missing', async () => {
      await expect(firstValueFrom(service.loadConfiguration('dev'))).rejects.toThrow('ENOENT');
      expect(readFile).toHaveBeenCalledTimes(1);
    });

    it('should reject a configuration that does not match the schema', async () => {
      files['config/config-dev.json'] = JSON.stringify({ app: { name: 'Client Registry' } });

      await expect(firstValueFrom(service.loadConfiguration('dev'))).rejects.toThrow();
      expect(service.getConfiguration()).toBeUndefined();
    });

    it('should use CLIENT_REGISTRY_ENV when no environment is given', async () => {
      files['config/config-prod.json'] = JSON.stringify(mockConfig);
      service = createService({ CLIENT_REGISTRY_ENV: 'prod' });

      const config = await firstValueFrom(service.loadConfiguration());

      expect(config.app.environment).toBe('prod');
    });
  });

  describe('getConfiguration', () => {
    it('should return undefined before loading', () => {
      expect(service.getConfiguration()).toBeUndefined();
    });

    it('should return the configuration after loading', async () => {
      files['config/config-dev.json'] = JSON.stringify({
        ...mockConfig,
        logging: { level: 'warn', destination: 2 },
      });

      await firstValueFrom(service.loadConfiguration('dev'));

      expect(service.getConfiguration()?.logging).toEqual({ level: 'warn', destination: 2 });
    });
  });

  describe('getConfiguration$', () => {
    it('should load configuration on first access', async () => {
      files['config/config-dev.json'] = JSON.stringify(mockConfig);

      const config = await firstValueFrom(service.getConfiguration$());

      expect(config.app.name).toBe('Client Registry');
    });
  });

  describe('clearCache', () => {
    it('should force a reload on the next access', async () => {
      files['config/config-dev.json'] = JSON.stringify(mockConfig);

      await firstValueFrom(service.loadConfiguration('dev'));
      service.clearCache();

      expect(service.getConfiguration()).toBeUndefined();
      await firstValueFrom(service.loadConfiguration('dev'));
      expect(readFile).toHaveBeenCalledTimes(2);
    });
  });
});
