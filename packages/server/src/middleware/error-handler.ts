import type { ErrorHandler, MiddlewareHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import type { AuthEnv } from '../types/hono.js';
import type { Logger } from '../logging/logger.js';
import { AuthError } from '../errors/auth-error.js';
import { TOKEN_CACHE_CONTROL, TOKEN_PRAGMA, HEADER_CACHE_CONTROL, HEADER_PRAGMA } from '../config/constants.js';

export interface ErrorHandlerOptions {
  logger: Logger;
  /**
   * Hide unexpected error messages from responses
   */
  production: boolean;
}

/**
 * Global error handler
 *
 * Renders AuthErrors as `{ error, error_description }`; the operation and
 * cause only ever reach the log.
 */
export function authErrorHandler(options: ErrorHandlerOptions): ErrorHandler<AuthEnv> {
  const { logger, production } = options;

  return (err, c) => {
    // Set no-cache headers for error responses
    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    const fields = { method: c.req.method, path: c.req.path };

    if (err instanceof AuthError) {
      if (err.statusCode >= 500) {
        logger.error('Request failed', { ...fields, code: err.code, operation: err.operation, error: err });
      } else {
        logger.debug('Request rejected', { ...fields, code: err.code });
      }
      return c.json(err.toJSON(), err.statusCode);
    }

    // Handle Zod validation errors
    if (err instanceof ZodError) {
      const messages = err.errors.map((e) => e.message).join(', ') || 'Validation failed';
      return c.json(AuthError.invalidRequest(messages).toJSON(), 400);
    }

    // Malformed bodies rejected by hono itself
    if (err instanceof HTTPException && err.status < 500) {
      return c.json(AuthError.invalidRequest(err.message).toJSON(), 400);
    }

    // Handle unexpected errors
    logger.error('Unhandled error', { ...fields, error: err });
    const serverError = new AuthError(
      'internal_error',
      production ? 'An unexpected error occurred' : err.message
    );

    return c.json(serverError.toJSON(), 500);
  };
}

/**
 * Security headers middleware
 */
export function securityHeaders(options: { production: boolean }): MiddlewareHandler<AuthEnv> {
  return async (c, next) => {
    await next();

    // Prevent clickjacking
    c.header('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    c.header('X-Content-Type-Options', 'nosniff');

    // Referrer policy; links carry tokens in the query string
    c.header('Referrer-Policy', 'no-referrer');

    c.header('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none'");

    // Strict Transport Security (enable in production with HTTPS)
    if (options.production) {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}

/**
 * Request logging middleware
 *
 * Query strings are never logged since they may hold tokens.
 */
export function requestLogger(logger: Logger): MiddlewareHandler<AuthEnv> {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;

    await next();

    logger.info('Request completed', {
      method,
      path,
      status: c.res.status,
      duration: Date.now() - start,
    });
  };
}

/**
 * Give every request a deadline signal that the services honour
 */
export function requestDeadline(timeoutMs: number): MiddlewareHandler<AuthEnv> {
  return async (c, next) => {
    c.set('signal', AbortSignal.timeout(timeoutMs));
    await next();
  };
}
