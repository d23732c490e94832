/**
 * Raised when a value type is constructed from text that breaks its
 * format rules. Parsing utilities check validity first, so reaching this
 * means a caller skipped validation.
 */
export class InvalidFieldError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidFieldError';
  }
}

/**
 * Raised by the registry when an operation would leave two clients with
 * the same identity.
 */
export class DuplicateClientError extends Error {
  constructor() {
    super('Operation would result in duplicate clients');
    this.name = 'DuplicateClientError';
  }
}

/**
 * Raised by the registry when the client to replace or remove is absent.
 */
export class ClientNotFoundError extends Error {
  constructor() {
    super('The client could not be found in the registry');
    this.name = 'ClientNotFoundError';
  }
}
