export type CommandErrorCode =
  | 'invalid-index'
  | 'no-fields-edited'
  | 'duplicate-client'
  | 'invalid-filter'
  | 'unknown-rank-keyword';

/**
 * A well-formed command that cannot be carried out against the current
 * registry or view. Nothing has been changed when it is thrown.
 */
export class CommandError extends Error {
  constructor(
    readonly code: CommandErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'CommandError';
  }
}
