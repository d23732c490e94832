/**
 * Raised when the registry cannot be written to its data file.
 */
export class StorageError extends Error {
  constructor(
    message: string,
    readonly filePath: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'StorageError';
  }
}
