import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Observable, defer, of, throwError } from 'rxjs';
import { catchError, map, shareReplay } from 'rxjs/operators';
import { LoggerService } from '@client-registry/logger';
import {
  ClientRegistryConfiguration,
  clientRegistryConfigurationSchema,
} from './client-registry-configuration';

/**
 * Reads a configuration file as text
 */
export type ConfigFileReader = (path: string) => Promise<string>;

export interface ConfigurationServiceOptions {
  /** Directory holding the `config-<env>.json` files (default: `config`) */
  configDir?: string;
  /** Environment variables consulted for `CLIENT_REGISTRY_ENV` */
  env?: NodeJS.ProcessEnv;
  readFile?: ConfigFileReader;
}

const DEFAULT_ENVIRONMENT = 'dev';

export class ConfigurationService {
  private readonly logger: LoggerService;
  private readonly configDir: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly readConfigFile: ConfigFileReader;
  private configCache$?: Observable<ClientRegistryConfiguration>;
  private currentConfig?: ClientRegistryConfiguration;
  private currentEnvironment?: string;

  constructor(logger: LoggerService, options: ConfigurationServiceOptions = {}) {
    this.logger = logger.child({ service: 'ConfigurationService' });
    this.configDir = options.configDir ?? 'config';
    this.env = options.env ?? process.env;
    this.readConfigFile = options.readFile ?? ((path) => readFile(path, 'utf-8'));
  }

  /**
   * Gets the environment from `CLIENT_REGISTRY_ENV` (defaults to 'dev')
   */
  getEnvironmentFromEnv(): string {
    const env = this.env['CLIENT_REGISTRY_ENV']?.trim() || DEFAULT_ENVIRONMENT;
    return env.toLowerCase();
  }

  /**
   * Loads configuration from the config file of the given environment,
   * falling back to the dev file when that one cannot be loaded.
   * @param environment Optional environment override
   */
  loadConfiguration(environment?: string): Observable<ClientRegistryConfiguration> {
    const env = environment || this.getEnvironmentFromEnv();

    if (this.configCache$ && this.currentEnvironment === env && this.currentConfig) {
      return of(this.currentConfig);
    }

    const configPath = this.configPath(env);
    this.currentEnvironment = env;

    this.configCache$ = this.readConfiguration(configPath, env).pipe(
      catchError((error: unknown) => {
        this.logger.error(toError(error), `Failed to load configuration from ${configPath}`);
        if (env !== DEFAULT_ENVIRONMENT) {
          const fallbackPath = this.configPath(DEFAULT_ENVIRONMENT);
          return this.readConfiguration(fallbackPath, DEFAULT_ENVIRONMENT).pipe(
            catchError((fallbackError: unknown) => {
              this.logger.error(toError(fallbackError), 'Failed to load fallback configuration');
              return throwError(
                () =>
                  new Error(
                    `Unable to load configuration. Tried ${configPath} and ${fallbackPath}`
                  )
              );
            })
          );
        }
        return throwError(() => error);
      }),
      shareReplay(1)
    );

    return this.configCache$;
  }

  /**
   * Gets the current configuration synchronously
   * @returns The current configuration or undefined if not loaded
   */
  getConfiguration(): ClientRegistryConfiguration | undefined {
    return this.currentConfig;
  }

  /**
   * Gets the current configuration, loading it first if needed
   */
  getConfiguration$(): Observable<ClientRegistryConfiguration> {
    if (this.currentConfig) {
      return of(this.currentConfig);
    }
    return this.loadConfiguration();
  }

  clearCache(): void {
    this.configCache$ = undefined;
    this.currentConfig = undefined;
    this.currentEnvironment = undefined;
  }

  getCurrentEnvironment(): string {
    return this.currentEnvironment || this.getEnvironmentFromEnv();
  }

  private configPath(env: string): string {
    return join(this.configDir, `config-${env}.json`);
  }

  private readConfiguration(
    configPath: string,
    env: string
  ): Observable<ClientRegistryConfiguration> {
    return defer(() => this.readConfigFile(configPath)).pipe(
      map((text) => {
        const config = clientRegistryConfigurationSchema.parse(JSON.parse(text));
        config.app = {
          ...config.app,
          environment: env,
        };
        this.currentConfig = config;
        this.currentEnvironment = env;
        this.logger.info({ environment: env, path: configPath }, 'Configuration loaded');
        return config;
      })
    );
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
