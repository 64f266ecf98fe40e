/**
 * Composite logger that fans every message out to several loggers,
 * typically console and file
 */

import type { ILogger } from '../../domain/interfaces';

export interface ClosableLogger extends ILogger {
  close(): void;
}

function isClosable(logger: ILogger): logger is ClosableLogger {
  return 'close' in logger && typeof logger.close === 'function';
}

export class CompositeLogger implements ClosableLogger {
  private readonly loggers: readonly ILogger[];

  constructor(...loggers: ILogger[]) {
    this.loggers = loggers;
  }

  log(message: string, ...args: unknown[]): void {
    this.loggers.forEach((logger) => logger.log(message, ...args));
  }

  error(message: string, ...args: unknown[]): void {
    this.loggers.forEach((logger) => logger.error(message, ...args));
  }

  warn(message: string, ...args: unknown[]): void {
    this.loggers.forEach((logger) => logger.warn(message, ...args));
  }

  info(message: string, ...args: unknown[]): void {
    this.loggers.forEach((logger) => logger.info(message, ...args));
  }

  debug(message: string, ...args: unknown[]): void {
    this.loggers.forEach((logger) => logger.debug(message, ...args));
  }

  /**
   * Close file streams (call on application shutdown)
   */
  close(): void {
    this.loggers.filter(isClosable).forEach((logger) => logger.close());
  }
}
