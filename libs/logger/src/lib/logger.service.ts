import pino from 'pino';
import type { DestinationStream, Logger as PinoLogger, LoggerOptions } from 'pino';

/**
 * Log levels supported by the logger
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Logger configuration interface
 */
export interface LoggerConfig {
  level?: LogLevel | 'silent';
  /**
   * Where log lines go: a file path, a file descriptor (1 = stdout,
   * 2 = stderr), or stdout when omitted.
   */
  destination?: string | number;
  /** Pre-built destination; takes precedence over `destination`. */
  stream?: DestinationStream;
  base?: Record<string, unknown>;
}

const LEVEL_VALUES: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

/**
 * Logger Service
 *
 * Typed facade over Pino. Services take a child logger bound to their
 * name and log structured context first, message second.
 *
 * @example
 * ```typescript
 * const logger = new LoggerService({ level: 'debug' }).child({ service: 'LogicService' });
 * logger.info('Registry loaded');
 * logger.debug({ commandText }, 'Executing command');
 * logger.error(new Error('Error'), 'Failed to save');
 * ```
 */
export class LoggerService {
  private readonly logger: PinoLogger;
  private readonly config: LoggerConfig;

  constructor(config?: LoggerConfig, instance?: PinoLogger) {
    this.config = {
      level: 'info',
      ...config,
    };

    if (instance) {
      this.logger = instance;
      return;
    }

    const pinoOptions: LoggerOptions = {
      level: this.config.level || 'info',
      base: this.config.base || {},
    };

    this.logger = pino(pinoOptions, LoggerService.resolveDestination(this.config));
  }

  /**
   * Create a child logger with additional context
   *
   * @example
   * ```typescript
   * const storageLogger = logger.child({ service: 'JsonClientStorage' });
   * storageLogger.info('Message'); // includes service: 'JsonClientStorage'
   * ```
   */
  child(bindings: Record<string, unknown>): LoggerService {
    return new LoggerService(this.config, this.logger.child(bindings));
  }

  trace(obj: Record<string, unknown>, msg?: string): void;
  trace(msg: string): void;
  trace(objOrMsg: Record<string, unknown> | string, msg?: string): void {
    if (typeof objOrMsg === 'string') {
      this.logger.trace(objOrMsg);
    } else {
      this.logger.trace(objOrMsg, msg);
    }
  }

  debug(obj: Record<string, unknown>, msg?: string): void;
  debug(msg: string): void;
  debug(objOrMsg: Record<string, unknown> | string, msg?: string): void {
    if (typeof objOrMsg === 'string') {
      this.logger.debug(objOrMsg);
    } else {
      this.logger.debug(objOrMsg, msg);
    }
  }

  info(obj: Record<string, unknown>, msg?: string): void;
  info(msg: string): void;
  info(objOrMsg: Record<string, unknown> | string, msg?: string): void {
    if (typeof objOrMsg === 'string') {
      this.logger.info(objOrMsg);
    } else {
      this.logger.info(objOrMsg, msg);
    }
  }

  warn(obj: Record<string, unknown>, msg?: string): void;
  warn(msg: string): void;
  warn(objOrMsg: Record<string, unknown> | string, msg?: string): void {
    if (typeof objOrMsg === 'string') {
      this.logger.warn(objOrMsg);
    } else {
      this.logger.warn(objOrMsg, msg);
    }
  }

  /**
   * Log an error level message. An `Error` is logged under `err` so that
   * Pino's serializer captures its stack.
   */
  error(err: Error, msg?: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
  error(msg: string): void;
  error(errOrObjOrMsg: Error | Record<string, unknown> | string, msg?: string): void {
    if (errOrObjOrMsg instanceof Error) {
      this.logger.error({ err: errOrObjOrMsg }, msg || errOrObjOrMsg.message);
    } else if (typeof errOrObjOrMsg === 'string') {
      this.logger.error(errOrObjOrMsg);
    } else {
      this.logger.error(errOrObjOrMsg, msg);
    }
  }

  fatal(obj: Record<string, unknown>, msg?: string): void;
  fatal(msg: string): void;
  fatal(objOrMsg: Record<string, unknown> | string, msg?: string): void {
    if (typeof objOrMsg === 'string') {
      this.logger.fatal(objOrMsg);
    } else {
      this.logger.fatal(objOrMsg, msg);
    }
  }

  /**
   * Check if a log level is enabled
   */
  isLevelEnabled(level: LogLevel): boolean {
    return this.logger.levelVal <= LEVEL_VALUES[level];
  }

  /**
   * Get the current log level
   */
  get level(): LogLevel {
    const levelVal = this.logger.levelVal;
    if (levelVal <= 10) return 'trace';
    if (levelVal <= 20) return 'debug';
    if (levelVal <= 30) return 'info';
    if (levelVal <= 40) return 'warn';
    if (levelVal <= 50) return 'error';
    return 'fatal';
  }

  set level(level: LogLevel) {
    this.logger.level = level;
  }

  private static resolveDestination(config: LoggerConfig): DestinationStream {
    if (config.stream) {
      return config.stream;
    }
    if (typeof config.destination === 'number') {
      return pino.destination({ dest: config.destination, sync: true });
    }
    if (typeof config.destination === 'string') {
      return pino.destination({ dest: config.destination, sync: true, mkdir: true });
    }
    return pino.destination({ dest: 1, sync: true });
  }
}
