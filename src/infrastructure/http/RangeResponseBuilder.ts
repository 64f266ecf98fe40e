import type { Response } from 'express';
import type { HttpError } from '../../domain/value-objects/HttpError';
import { HTTP_HEADERS, HTTP_STATUS } from './HttpConstants';
import { HttpErrorHandler } from './HttpErrorHandler';

/**
 * Builds and sends HTTP range responses
 */
export class RangeResponseBuilder {
  /**
   * Sends 200 when the range covers the whole collection, 206 otherwise
   */
  static sendRange<T>(res: Response, units: string, items: T[], contentRange: string, partial: boolean): void {
    res
      .status(partial ? HTTP_STATUS.PARTIAL_CONTENT : HTTP_STATUS.OK)
      .set({
        [HTTP_HEADERS.ACCEPT_RANGES]: units,
        [HTTP_HEADERS.CONTENT_RANGE]: contentRange
      })
      .json(items);
  }

  /**
   * Sends a range error; 416 responses carry the unsatisfied Content-Range
   */
  static sendRangeError(res: Response, units: string, error: HttpError, contentRange?: string): void {
    res.set(HTTP_HEADERS.ACCEPT_RANGES, units);
    if (contentRange) {
      res.set(HTTP_HEADERS.CONTENT_RANGE, contentRange);
    }
    HttpErrorHandler.send(res, error);
  }
}
