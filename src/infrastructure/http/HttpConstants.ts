/**
 * HTTP status codes used by the service
 */
export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  NO_CONTENT: 204,
  PARTIAL_CONTENT: 206,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  RANGE_NOT_SATISFIABLE: 416,
  INTERNAL_SERVER_ERROR: 500
} as const;

/**
 * Header names
 */
export const HTTP_HEADERS = {
  RANGE: 'Range',
  CONTENT_RANGE: 'Content-Range',
  ACCEPT_RANGES: 'Accept-Ranges',
  ORIGIN: 'Origin',
  VARY: 'Vary'
} as const;

export const CORS_HEADERS = {
  ALLOW_ORIGIN: 'Access-Control-Allow-Origin',
  EXPOSE_HEADERS: 'Access-Control-Expose-Headers',
  MAX_AGE: 'Access-Control-Max-Age',
  ALLOW_CREDENTIALS: 'Access-Control-Allow-Credentials',
  ALLOW_METHODS: 'Access-Control-Allow-Methods',
  ALLOW_HEADERS: 'Access-Control-Allow-Headers'
} as const;
