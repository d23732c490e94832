export * from './lib/file-system.port';
export * from './lib/storage-error';
export * from './lib/client-record';
export * from './lib/json-client-storage.service';
