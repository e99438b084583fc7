/**
 * authgate error codes
 */

export const ERROR_NOT_FOUND = 'not_found' as const;
export const ERROR_ALREADY_EXISTS = 'already_exists' as const;
export const ERROR_INVALID_CREDENTIALS = 'invalid_credentials' as const;
export const ERROR_EMAIL_NOT_VERIFIED = 'email_not_verified' as const;
export const ERROR_INVALID_TOKEN = 'invalid_token' as const;
export const ERROR_INVALID_APP_ID = 'invalid_app_id' as const;

// Request-level errors
export const ERROR_INVALID_REQUEST = 'invalid_request' as const;
export const ERROR_RATE_LIMITED = 'rate_limited' as const;

// Infrastructure errors
export const ERROR_DEADLINE_EXCEEDED = 'deadline_exceeded' as const;
export const ERROR_INTERNAL = 'internal_error' as const;

/**
 * All error codes
 */
export type AuthErrorCode =
  | typeof ERROR_NOT_FOUND
  | typeof ERROR_ALREADY_EXISTS
  | typeof ERROR_INVALID_CREDENTIALS
  | typeof ERROR_EMAIL_NOT_VERIFIED
  | typeof ERROR_INVALID_TOKEN
  | typeof ERROR_INVALID_APP_ID
  | typeof ERROR_INVALID_REQUEST
  | typeof ERROR_RATE_LIMITED
  | typeof ERROR_DEADLINE_EXCEEDED
  | typeof ERROR_INTERNAL;

export type AuthErrorStatus = 400 | 401 | 403 | 404 | 409 | 429 | 500 | 503;

/**
 * HTTP status codes
 */
export const ERROR_STATUS_CODES: Record<AuthErrorCode, AuthErrorStatus> = {
  [ERROR_NOT_FOUND]: 404,
  [ERROR_ALREADY_EXISTS]: 409,
  [ERROR_INVALID_CREDENTIALS]: 401,
  [ERROR_EMAIL_NOT_VERIFIED]: 403,
  [ERROR_INVALID_TOKEN]: 401,
  [ERROR_INVALID_APP_ID]: 400,
  [ERROR_INVALID_REQUEST]: 400,
  [ERROR_RATE_LIMITED]: 429,
  [ERROR_DEADLINE_EXCEEDED]: 503,
  [ERROR_INTERNAL]: 500,
};

/**
 * Default error descriptions
 */
export const ERROR_DESCRIPTIONS: Record<AuthErrorCode, string> = {
  [ERROR_NOT_FOUND]: 'The requested resource does not exist.',
  [ERROR_ALREADY_EXISTS]: 'A user with this email or username already exists.',
  [ERROR_INVALID_CREDENTIALS]: 'Invalid credentials.',
  [ERROR_EMAIL_NOT_VERIFIED]: 'The email address has not been verified.',
  [ERROR_INVALID_TOKEN]: 'The token is expired, malformed, or was issued for another purpose.',
  [ERROR_INVALID_APP_ID]: 'Unknown application.',
  [ERROR_INVALID_REQUEST]: 'The request is missing a required parameter or is otherwise malformed.',
  [ERROR_RATE_LIMITED]: 'Too many requests.',
  [ERROR_DEADLINE_EXCEEDED]: 'The operation did not complete in time. It is safe to retry.',
  [ERROR_INTERNAL]: 'The server encountered an unexpected condition.',
};

