import type { Context, MiddlewareHandler } from 'hono';
import type { AuthEnv } from '../types/hono.js';
import { AuthError } from '../errors/auth-error.js';
import {
  RATE_LIMIT_LOGIN,
  RATE_LIMIT_REGISTER,
  RATE_LIMIT_REFRESH,
  RATE_LIMIT_LOGOUT,
  RATE_LIMIT_VERIFY,
  RATE_LIMIT_RESEND_VERIFICATION,
  RATE_LIMIT_MAGIC_LINK_SEND,
  RATE_LIMIT_MAGIC_LINK_VERIFY,
} from '../config/constants.js';

export interface RateLimiterOptions {
  windowMs: number; // Time window in milliseconds
  maxRequests: number; // Maximum requests per window
  keyGenerator?: (c: Context<AuthEnv>) => string; // Custom key generator
}

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

/**
 * Client address as reported by the proxy in front of the service
 */
export function clientIp(c: Context<AuthEnv>): string | undefined {
  return c.req.header('x-forwarded-for')?.split(',')[0]?.trim() || c.req.header('x-real-ip') || undefined;
}

/**
 * Simple in-memory fixed-window rate limiter
 * Counts are per process; run one instance or put a shared limiter in front
 */
export function rateLimiter(options: RateLimiterOptions): MiddlewareHandler<AuthEnv> {
  const { windowMs, maxRequests, keyGenerator = defaultKeyGenerator } = options;

  const store = new Map<string, RateLimitEntry>();

  // Cleanup expired entries periodically
  const cleanupInterval = setInterval(() => {
    const now = Date.now();
    for (const [key, entry] of store) {
      if (entry.resetAt <= now) {
        store.delete(key);
      }
    }
  }, windowMs);

  // Prevent the interval from keeping the process alive
  cleanupInterval.unref();

  return async (c, next) => {
    const key = keyGenerator(c);
    const now = Date.now();

    let entry = store.get(key);

    // Create new entry if doesn't exist or window has passed
    if (!entry || entry.resetAt <= now) {
      entry = {
        count: 0,
        resetAt: now + windowMs,
      };
      store.set(key, entry);
    }

    // Check if over limit
    if (entry.count >= maxRequests) {
      const retryAfter = Math.ceil((entry.resetAt - now) / 1000);
      c.header('Retry-After', String(retryAfter));
      c.header('X-RateLimit-Limit', String(maxRequests));
      c.header('X-RateLimit-Remaining', '0');
      c.header('X-RateLimit-Reset', String(Math.ceil(entry.resetAt / 1000)));

      throw AuthError.rateLimited(`Rate limit exceeded. Try again in ${retryAfter} seconds.`);
    }

    entry.count++;

    // Set rate limit headers
    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Remaining', String(maxRequests - entry.count));
    c.header('X-RateLimit-Reset', String(Math.ceil(entry.resetAt / 1000)));

    await next();
  };
}

/**
 * Default key generator: client IP address
 */
function defaultKeyGenerator(c: Context<AuthEnv>): string {
  return clientIp(c) ?? 'unknown';
}

/**
 * Create endpoint-specific rate limiter
 */
export function endpointRateLimiter(
  endpoint: string,
  options: RateLimiterOptions
): MiddlewareHandler<AuthEnv> {
  return rateLimiter({
    ...options,
    keyGenerator: (c) => `${endpoint}:${defaultKeyGenerator(c)}`,
  });
}

export type RateLimitedEndpoint =
  | 'login'
  | 'register'
  | 'refresh'
  | 'logout'
  | 'verify'
  | 'resendVerification'
  | 'magicLinkSend'
  | 'magicLinkVerify';

export type RateLimitRule = Pick<RateLimiterOptions, 'windowMs' | 'maxRequests'>;

export type RateLimitSettings = Record<RateLimitedEndpoint, RateLimitRule>;

function rule([maxRequests, windowMs]: readonly [number, number]): RateLimitRule {
  return { maxRequests, windowMs };
}

export const DEFAULT_RATE_LIMITS: RateLimitSettings = {
  login: rule(RATE_LIMIT_LOGIN),
  register: rule(RATE_LIMIT_REGISTER),
  refresh: rule(RATE_LIMIT_REFRESH),
  logout: rule(RATE_LIMIT_LOGOUT),
  verify: rule(RATE_LIMIT_VERIFY),
  resendVerification: rule(RATE_LIMIT_RESEND_VERIFICATION),
  magicLinkSend: rule(RATE_LIMIT_MAGIC_LINK_SEND),
  magicLinkVerify: rule(RATE_LIMIT_MAGIC_LINK_VERIFY),
};

/**
 * Build the limiter for one endpoint; `false` disables rate limiting
 */
export function limiterFor(
  settings: Partial<RateLimitSettings> | false,
  endpoint: RateLimitedEndpoint
): MiddlewareHandler<AuthEnv> {
  if (settings === false) {
    return async (_c, next) => {
      await next();
    };
  }
  return endpointRateLimiter(endpoint, settings[endpoint] ?? DEFAULT_RATE_LIMITS[endpoint]);
}
