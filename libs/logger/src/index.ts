/**
 * Logger Library
 *
 * Structured logging for the client registry using Pino.
 */

export * from './lib/logger.service';
