import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { AuthEnv } from './types/hono.js';
import type { AuthService } from './services/auth-service.js';
import type { EmailVerificationService } from './services/email-verification-service.js';
import type { TwoFactorService } from './services/two-factor-service.js';
import type { Logger } from './logging/logger.js';
import { authErrorHandler, securityHeaders, requestLogger, requestDeadline } from './middleware/error-handler.js';
import type { RateLimitSettings } from './middleware/rate-limiter.js';
import { createAuthRoutes } from './routes/auth/index.js';
import { createTwoFactorRoutes } from './routes/two-factor/index.js';
import { DEFAULT_REQUEST_TIMEOUT_MS } from './config/constants.js';
import { AuthError } from './errors/auth-error.js';

export interface AuthServerOptions {
  auth: AuthService;
  emailVerification: EmailVerificationService;
  twoFactor: TwoFactorService;
  logger: Logger;
  /**
   * Deadline applied to every request, in milliseconds
   */
  requestTimeoutMs?: number;
  /**
   * Per-endpoint overrides of the default limits, or false to disable
   */
  rateLimits?: Partial<RateLimitSettings> | false;
  enableCors?: boolean;
  enableLogging?: boolean;
  /**
   * Hide unexpected error messages and send HSTS
   */
  production?: boolean;
}

/**
 * Create the authentication server application
 */
export function createAuthServer(options: AuthServerOptions): Hono<AuthEnv> {
  const {
    auth,
    emailVerification,
    twoFactor,
    logger,
    requestTimeoutMs = DEFAULT_REQUEST_TIMEOUT_MS,
    rateLimits = {},
    enableCors = true,
    enableLogging = true,
    production = false,
  } = options;

  const app = new Hono<AuthEnv>();

  // Global error handler
  app.onError(authErrorHandler({ logger, production }));

  // Security headers
  app.use('*', securityHeaders({ production }));

  // Logging
  if (enableLogging) {
    app.use('*', requestLogger(logger));
  }

  // CORS (needed for browser clients)
  if (enableCors) {
    app.use(
      '*',
      cors({
        origin: '*',
        allowMethods: ['GET', 'POST', 'OPTIONS'],
        allowHeaders: ['Content-Type', 'Authorization'],
        maxAge: 86400,
      })
    );
  }

  app.use('*', requestDeadline(requestTimeoutMs));

  // Health check
  app.get('/health', (c) => c.json({ status: 'ok' }));

  app.route('/auth/2fa', createTwoFactorRoutes({ auth, twoFactor, rateLimits }));
  app.route('/auth', createAuthRoutes({ auth, emailVerification, logger, rateLimits }));

  app.notFound((c) => c.json(AuthError.notFound().toJSON(), 404));

  return app;
}
