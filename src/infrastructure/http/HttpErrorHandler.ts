import type { Response } from 'express';
import type { ILogger } from '../../domain/interfaces/ILogger';
import { HttpError, HTTP_ERRORS } from '../../domain/value-objects/HttpError';

/**
 * Sends errors as HttpError JSON bodies
 */
export class HttpErrorHandler {
  /**
   * Ensures headers are not sent before executing callback
   */
  static ensureHeadersNotSent(res: Response, callback: () => void): void {
    if (!res.headersSent) {
      callback();
    }
  }

  static send(res: Response, error: HttpError): void {
    this.ensureHeadersNotSent(res, () => {
      res.status(error.status).json(error.toJSON());
    });
  }

  /**
   * Handles errors that escaped a controller. HttpErrors are sent as they
   * are, anything else becomes a 500.
   */
  static handle(error: unknown, res: Response, logger: ILogger, context: string): void {
    if (error instanceof HttpError) {
      logger.warn(`[${context}] ${error.toString()}`);
      this.send(res, error);
      return;
    }

    const message = error instanceof Error ? error.message : String(error);
    logger.error(`[${context}] ${message}`, error);
    this.send(res, HTTP_ERRORS.INTERNAL);
  }
}
