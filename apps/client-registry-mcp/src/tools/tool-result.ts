import { CommandError, ParseError } from '@client-registry/logic';

export function textResult(text: string, isError = false) {
  return {
    content: [{ type: 'text' as const, text }],
    ...(isError ? { isError: true } : {}),
  };
}

/**
 * Rejections a user can fix become error results; anything else propagates
 * to the server.
 */
export function userErrorResult(error: unknown) {
  if (error instanceof ParseError || error instanceof CommandError) {
    return textResult(error.message, true);
  }
  throw error;
}
