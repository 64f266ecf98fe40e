/**
 * Console logger implementation
 * Messages below the configured level are dropped; `log` is always written
 */

import { type ILogger, type LogLevel, isLevelEnabled } from '../../domain/interfaces';

export class ConsoleLogger implements ILogger {
  constructor(private readonly minLevel: LogLevel = 'debug') {}

  log(message: string, ...args: unknown[]): void {
    console.log(message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (isLevelEnabled('error', this.minLevel)) {
      console.error(message, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (isLevelEnabled('warn', this.minLevel)) {
      console.warn(message, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (isLevelEnabled('info', this.minLevel)) {
      console.info(message, ...args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (isLevelEnabled('debug', this.minLevel)) {
      console.debug(message, ...args);
    }
  }
}
