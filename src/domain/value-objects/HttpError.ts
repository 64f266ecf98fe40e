import { RangeErrorKind } from './RangeError';

/**
 * JSON projection of an HttpError
 */
export interface HttpErrorBody {
  id: string;
  message: string;
  detail?: unknown;
}

/**
 * Consistently-structured error for HTTP APIs.
 *
 * `id` is a service-unique, machine-readable identifier; `message` is one or
 * two human-readable sentences; `detail` optionally carries serializable
 * context about this particular occurrence.
 */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly id: string,
    message: string,
    public readonly detail?: unknown
  ) {
    super(message);
    this.name = 'HttpError';
  }

  /**
   * Compares id, status and message. Detail is not compared.
   */
  equals(other: HttpError): boolean {
    return this.id === other.id && this.status === other.status && this.message === other.message;
  }

  /**
   * Clones the error with the given detail
   */
  withDetail(detail: unknown): HttpError {
    return new HttpError(this.status, this.id, this.message, detail);
  }

  toJSON(): HttpErrorBody {
    const body: HttpErrorBody = { id: this.id, message: this.message };
    if (this.detail !== undefined) {
      body.detail = this.detail;
    }
    return body;
  }

  toString(): string {
    if (this.detail !== undefined) {
      const detail = typeof this.detail === 'object' ? JSON.stringify(this.detail) : String(this.detail);
      return `${this.message} (${detail}) <HTTP ${this.status}:${this.id}>`;
    }
    return `${this.message} <HTTP ${this.status}:${this.id}>`;
  }
}

/**
 * Errors emitted by the service
 */
export const HTTP_ERRORS = {
  RANGE_INVALID: new HttpError(400, 'range_invalid', 'The Range header could not be parsed.'),
  RANGE_NOT_SATISFIABLE: new HttpError(416, 'range_not_satisfiable', 'The requested range cannot be satisfied.'),
  MALFORMED_BODY: new HttpError(400, 'malformed_body', 'The request body is not valid JSON.'),
  INVALID_RESOURCE: new HttpError(400, 'invalid_resource', 'A resource requires a non-empty name.'),
  RESOURCE_NOT_FOUND: new HttpError(404, 'resource_not_found', 'The resource does not exist.'),
  ROUTE_NOT_FOUND: new HttpError(404, 'route_not_found', 'No route matches the request.'),
  INTERNAL: new HttpError(500, 'internal_error', 'An unexpected error occurred.')
} as const;

/**
 * Maps a range failure to 400 (malformed) or 416 (unsatisfiable)
 */
export function fromRangeFailure(kind: RangeErrorKind, message: string): HttpError {
  switch (kind) {
    case RangeErrorKind.UNSATISFIABLE_ZERO_LENGTH:
    case RangeErrorKind.OUTSIDE_CONSTRAINTS:
      return HTTP_ERRORS.RANGE_NOT_SATISFIABLE.withDetail({ kind, reason: message });
    case RangeErrorKind.IS_SUFFIX:
    case RangeErrorKind.INVALID:
    case RangeErrorKind.UNBOUND:
      return HTTP_ERRORS.RANGE_INVALID.withDetail({ kind, reason: message });
  }
}
