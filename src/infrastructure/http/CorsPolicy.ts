import type { Request, Response } from 'express';
import { CORS_HEADERS, HTTP_HEADERS, HTTP_STATUS } from './HttpConstants';
import type { Middleware } from './MiddlewareSet';

export interface CorsConfig {
  CORS_ALLOWED_ORIGINS: readonly string[];
  CORS_MAX_AGE: number;
  CORS_ALLOW_CREDENTIALS: boolean;
}

const WILDCARD = '*';

/**
 * Cross-origin resource sharing policy
 * Writes the Access-Control-* response headers for a request
 */
export class CorsPolicy {
  private allowAllOriginsEnabled = false;
  private origins: string[] = [];

  private allowAllMethodsEnabled = false;
  private methods: string[] = [];

  private allowAllHeadersEnabled = false;
  private headers: string[] = [];

  private exposedHeaders: string[] = [];

  // seconds
  maxAge = 0;
  allowCredentials = false;

  static fromConfig(config: CorsConfig): CorsPolicy {
    const policy = new CorsPolicy();
    if (config.CORS_ALLOWED_ORIGINS.includes(WILDCARD)) {
      policy.allowAllOrigins();
    } else {
      policy.allowOrigins(...config.CORS_ALLOWED_ORIGINS);
    }
    policy.allowMethods('GET', 'POST', 'DELETE', 'OPTIONS');
    policy.allowHeaders(HTTP_HEADERS.RANGE, 'Content-Type');
    policy.exposeHeaders(HTTP_HEADERS.CONTENT_RANGE, HTTP_HEADERS.ACCEPT_RANGES);
    policy.maxAge = config.CORS_MAX_AGE;
    policy.allowCredentials = config.CORS_ALLOW_CREDENTIALS;
    return policy;
  }

  allowOrigins(...origins: string[]): void {
    this.allowAllOriginsEnabled = false;
    this.origins.push(...origins);
  }

  allowAllOrigins(): void {
    this.allowAllOriginsEnabled = true;
    this.origins = [];
  }

  allowMethods(...methods: string[]): void {
    this.allowAllMethodsEnabled = false;
    this.methods.push(...methods);
  }

  allowAllMethods(): void {
    this.allowAllMethodsEnabled = true;
    this.methods = [];
  }

  allowHeaders(...headers: string[]): void {
    this.allowAllHeadersEnabled = false;
    this.headers.push(...headers);
  }

  allowAllHeaders(): void {
    this.allowAllHeadersEnabled = true;
    this.headers = [];
  }

  exposeHeaders(...headers: string[]): void {
    this.exposedHeaders.push(...headers);
  }

  originAllowed(origin: string): boolean {
    return this.allowAllOriginsEnabled || this.origins.includes(origin);
  }

  writeHeaders(req: Request, res: Response): void {
    if (this.allowAllOriginsEnabled) {
      res.setHeader(CORS_HEADERS.ALLOW_ORIGIN, WILDCARD);
    } else {
      if (this.origins.length > 1) {
        res.setHeader(HTTP_HEADERS.VARY, HTTP_HEADERS.ORIGIN);
      }
      const origin = req.get(HTTP_HEADERS.ORIGIN) ?? '';
      // A listed-origin policy answers unknown origins with "null"
      res.setHeader(CORS_HEADERS.ALLOW_ORIGIN, this.originAllowed(origin) ? origin : 'null');
    }

    if (this.exposedHeaders.length > 0) {
      res.setHeader(CORS_HEADERS.EXPOSE_HEADERS, this.exposedHeaders.join(', '));
    }

    res.setHeader(CORS_HEADERS.MAX_AGE, String(Math.floor(this.maxAge)));
    res.setHeader(CORS_HEADERS.ALLOW_CREDENTIALS, this.allowCredentials ? 'true' : 'false');

    if (this.allowAllMethodsEnabled) {
      res.setHeader(CORS_HEADERS.ALLOW_METHODS, WILDCARD);
    } else if (this.methods.length > 0) {
      res.setHeader(CORS_HEADERS.ALLOW_METHODS, this.methods.join(', '));
    }

    if (this.allowAllHeadersEnabled) {
      res.setHeader(CORS_HEADERS.ALLOW_HEADERS, WILDCARD);
    } else if (this.headers.length > 0) {
      res.setHeader(CORS_HEADERS.ALLOW_HEADERS, this.headers.join(', '));
    }
  }

  /**
   * Writes the policy headers on every request and answers preflight
   * requests with 204 No Content
   */
  middleware(): Middleware {
    return (next) => (req, res, done) => {
      this.writeHeaders(req, res);
      if (req.method === 'OPTIONS') {
        res.status(HTTP_STATUS.NO_CONTENT).end();
        return;
      }
      next(req, res, done);
    };
  }
}
