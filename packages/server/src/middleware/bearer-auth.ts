import type { MiddlewareHandler } from 'hono';
import type { AuthEnv } from '../types/hono.js';
import type { AuthService } from '../services/auth-service.js';
import { AuthError } from '../errors/auth-error.js';
import { ERROR_INVALID_TOKEN } from '../errors/error-codes.js';
import { BEARER_REALM, HEADER_AUTHORIZATION, HEADER_WWW_AUTHENTICATE } from '../config/constants.js';

export interface BearerAuthOptions {
  auth: AuthService;
}

/**
 * Extract bearer token from Authorization header
 */
function extractBearerToken(authHeader: string): string | null {
  if (!authHeader.startsWith('Bearer ')) {
    return null;
  }
  return authHeader.slice(7).trim() || null;
}

/**
 * Middleware to validate access tokens
 *
 * Sets `principal` in context variables on success
 */
export function bearerAuth(options: BearerAuthOptions): MiddlewareHandler<AuthEnv> {
  const { auth } = options;

  return async (c, next) => {
    const authHeader = c.req.header(HEADER_AUTHORIZATION);

    if (!authHeader) {
      c.header(HEADER_WWW_AUTHENTICATE, `Bearer realm="${BEARER_REALM}"`);
      throw AuthError.invalidToken('Missing authorization header');
    }

    const token = extractBearerToken(authHeader);

    if (!token) {
      c.header(HEADER_WWW_AUTHENTICATE, `Bearer realm="${BEARER_REALM}", error="invalid_request"`);
      throw AuthError.invalidToken('Invalid authorization header format');
    }

    try {
      c.set('principal', await auth.authenticate(token, { signal: c.get('signal') }));
    } catch (error) {
      if (AuthError.is(error, ERROR_INVALID_TOKEN)) {
        c.header(HEADER_WWW_AUTHENTICATE, `Bearer realm="${BEARER_REALM}", error="invalid_token"`);
      }
      throw error;
    }

    await next();
  };
}
