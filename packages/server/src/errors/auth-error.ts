import {
  type AuthErrorCode,
  type AuthErrorStatus,
  ERROR_STATUS_CODES,
  ERROR_DESCRIPTIONS,
  ERROR_NOT_FOUND,
  ERROR_ALREADY_EXISTS,
  ERROR_INVALID_CREDENTIALS,
  ERROR_EMAIL_NOT_VERIFIED,
  ERROR_INVALID_TOKEN,
  ERROR_INVALID_APP_ID,
  ERROR_INVALID_REQUEST,
  ERROR_RATE_LIMITED,
  ERROR_DEADLINE_EXCEEDED,
  ERROR_INTERNAL,
} from './error-codes.js';

/**
 * Error response body
 */
export interface AuthErrorResponse {
  error: AuthErrorCode;
  error_description?: string;
}

/**
 * authgate error class
 *
 * Every failure of the core surfaces as one of these. The `operation` and
 * `cause` are for logs only and never reach the response body.
 */
export class AuthError extends Error {
  public readonly code: AuthErrorCode;
  public readonly statusCode: AuthErrorStatus;
  public readonly description: string;
  public readonly operation?: string;

  constructor(
    code: AuthErrorCode,
    description?: string,
    options?: {
      operation?: string;
      cause?: unknown;
    }
  ) {
    const desc = description ?? ERROR_DESCRIPTIONS[code];
    super(desc);
    this.name = 'AuthError';
    this.code = code;
    this.statusCode = ERROR_STATUS_CODES[code];
    this.description = desc;

    if (options?.operation) {
      this.operation = options.operation;
    }
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    // Maintains proper stack trace in V8
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON response body
   */
  toJSON(): AuthErrorResponse {
    const response: AuthErrorResponse = {
      error: this.code,
    };

    if (this.description) {
      response.error_description = this.description;
    }

    return response;
  }

  static is(error: unknown, code: AuthErrorCode): error is AuthError {
    return error instanceof AuthError && error.code === code;
  }

  // Factory methods for common errors

  static notFound(description?: string): AuthError {
    return new AuthError(ERROR_NOT_FOUND, description);
  }

  static alreadyExists(description?: string): AuthError {
    return new AuthError(ERROR_ALREADY_EXISTS, description);
  }

  static invalidCredentials(description?: string): AuthError {
    return new AuthError(ERROR_INVALID_CREDENTIALS, description);
  }

  static emailNotVerified(): AuthError {
    return new AuthError(ERROR_EMAIL_NOT_VERIFIED);
  }

  static invalidToken(description?: string, cause?: unknown): AuthError {
    return new AuthError(ERROR_INVALID_TOKEN, description, { cause });
  }

  static invalidAppId(): AuthError {
    return new AuthError(ERROR_INVALID_APP_ID);
  }

  static invalidRequest(description?: string): AuthError {
    return new AuthError(ERROR_INVALID_REQUEST, description);
  }

  static rateLimited(description?: string): AuthError {
    return new AuthError(ERROR_RATE_LIMITED, description);
  }

  static deadlineExceeded(operation: string): AuthError {
    return new AuthError(ERROR_DEADLINE_EXCEEDED, undefined, { operation });
  }

  static internal(operation: string, cause?: unknown): AuthError {
    return new AuthError(ERROR_INTERNAL, undefined, { operation, cause });
  }

  /**
   * Pass AuthErrors through and wrap anything else as an internal error
   */
  static wrap(operation: string, error: unknown): AuthError {
    if (error instanceof AuthError) {
      return error;
    }
    return AuthError.internal(operation, error);
  }
}
