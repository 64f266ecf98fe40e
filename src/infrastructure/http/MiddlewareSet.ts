import type { Request, RequestHandler, Response } from 'express';
import type { ILogger } from '../../domain/interfaces/ILogger';

/**
 * Decorates a request handler
 */
export type Middleware = (next: RequestHandler) => RequestHandler;

/**
 * Ordered set of middleware applied around a request handler.
 *
 * Middleware run in FIFO order: the first one registered is the first
 * executed for each request.
 */
export class MiddlewareSet {
  private readonly middleware: Middleware[] = [];

  isEmpty(): boolean {
    return this.middleware.length === 0;
  }

  use(middleware: Middleware): void {
    this.middleware.push(middleware);
  }

  /**
   * Registers a plain handler that runs before the rest of the chain
   */
  useHandler(handler: (req: Request, res: Response) => void): void {
    this.middleware.push((next) => (req, res, done) => {
      handler(req, res);
      next(req, res, done);
    });
  }

  apply(handler: RequestHandler): RequestHandler {
    let wrapped = handler;
    for (let i = this.middleware.length - 1; i >= 0; i--) {
      wrapped = this.middleware[i](wrapped);
    }
    return wrapped;
  }
}

/**
 * Logs method, URL, status and duration once the response is finished
 */
export function requestLogger(logger: ILogger): Middleware {
  return (next) => (req, res, done) => {
    const startedAt = Date.now();
    res.on('finish', () => {
      logger.info(`${req.method} ${req.originalUrl} -> ${res.statusCode} (${Date.now() - startedAt}ms)`);
    });
    next(req, res, done);
  };
}
