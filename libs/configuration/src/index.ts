export * from './lib/configuration.service';
export * from './lib/client-registry-configuration';
