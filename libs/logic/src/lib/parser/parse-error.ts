/**
 * Command text that does not follow the grammar, or a field value that
 * breaks its format rules. The message is shown to the user as is.
 */
export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ParseError';
  }
}
