/**
 * File logger implementation
 * Appends formatted lines to dated files in the log directory; errors are
 * also copied to a separate error file
 */

import fs from 'fs';
import path from 'path';
import { type ILogger, type LogLevel, isLevelEnabled } from '../../domain/interfaces';

export class FileLogger implements ILogger {
  readonly logFile: string;
  readonly errorFile: string;
  private writeStream: fs.WriteStream | null;
  private errorStream: fs.WriteStream | null;

  constructor(
    logDir: string,
    private readonly minLevel: LogLevel = 'debug'
  ) {
    fs.mkdirSync(logDir, { recursive: true });

    const date = new Date().toISOString().split('T')[0];
    this.logFile = path.join(logDir, `service-${date}.log`);
    this.errorFile = path.join(logDir, `error-${date}.log`);

    this.writeStream = fs.createWriteStream(this.logFile, { flags: 'a' });
    this.errorStream = fs.createWriteStream(this.errorFile, { flags: 'a' });

    this.writeStream.on('error', (err) => {
      console.error('Error writing to log file:', err);
    });
    this.errorStream.on('error', (err) => {
      console.error('Error writing to error file:', err);
    });
  }

  static formatMessage(level: string, message: string, args: unknown[], timestamp: Date = new Date()): string {
    const argsStr = args.length > 0 ? ' ' + args.map(FileLogger.formatArg).join(' ') : '';
    return `[${timestamp.toISOString()}] [${level}] ${message}${argsStr}\n`;
  }

  private static formatArg(arg: unknown): string {
    if (arg instanceof Error) {
      return arg.stack ?? arg.message;
    }
    return typeof arg === 'object' ? JSON.stringify(arg) : String(arg);
  }

  private writeToFile(stream: fs.WriteStream | null, level: string, message: string, args: unknown[]): void {
    if (!stream || stream.destroyed || !stream.writable) {
      return;
    }
    stream.write(FileLogger.formatMessage(level, message, args));
  }

  log(message: string, ...args: unknown[]): void {
    this.writeToFile(this.writeStream, 'LOG', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    if (!isLevelEnabled('error', this.minLevel)) {
      return;
    }
    this.writeToFile(this.errorStream, 'ERROR', message, args);
    this.writeToFile(this.writeStream, 'ERROR', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (isLevelEnabled('warn', this.minLevel)) {
      this.writeToFile(this.writeStream, 'WARN', message, args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (isLevelEnabled('info', this.minLevel)) {
      this.writeToFile(this.writeStream, 'INFO', message, args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (isLevelEnabled('debug', this.minLevel)) {
      this.writeToFile(this.writeStream, 'DEBUG', message, args);
    }
  }

  /**
   * Close file streams (call on application shutdown)
   */
  close(): void {
    this.writeStream?.end();
    this.writeStream = null;
    this.errorStream?.end();
    this.errorStream = null;
  }
}
