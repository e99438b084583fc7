import { Hono, type Context } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type {
  RegisterResponse,
  StatusResponse,
  TokenPairResponse,
} from '@authgate/shared';
import type { AuthEnv } from '../../types/hono.js';
import type { TokenPair } from '../../types/index.js';
import type { AuthService } from '../../services/auth-service.js';
import type { EmailVerificationService } from '../../services/email-verification-service.js';
import type { Logger } from '../../logging/logger.js';
import { limiterFor, type RateLimitSettings } from '../../middleware/rate-limiter.js';
import { rejectInvalid } from '../../middleware/validator.js';
import {
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
  TOKEN_TYPE_BEARER,
} from '../../config/constants.js';
import {
  registerSchema,
  loginSchema,
  refreshTokenSchema,
  verifyQuerySchema,
  resendVerificationSchema,
} from './schemas.js';

export interface AuthRoutesOptions {
  auth: AuthService;
  emailVerification: EmailVerificationService;
  logger: Logger;
  rateLimits: Partial<RateLimitSettings> | false;
}

function tokenPairResponse(c: Context<AuthEnv>, pair: TokenPair) {
  c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
  c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

  const body: TokenPairResponse = {
    access_token: pair.accessToken,
    refresh_token: pair.refreshToken,
    token_type: TOKEN_TYPE_BEARER,
    expires_in: pair.expiresIn,
  };
  return c.json(body, 200);
}

const OK: StatusResponse = { status: 'ok' };

/**
 * Create the /auth routes
 */
export function createAuthRoutes(options: AuthRoutesOptions) {
  const { auth, emailVerification, logger, rateLimits } = options;

  const router = new Hono<AuthEnv>();

  // POST /register
  router.post(
    '/register',
    limiterFor(rateLimits, 'register'),
    zValidator('json', registerSchema, rejectInvalid),
    async (c) => {
      const { email, username, password } = c.req.valid('json');
      const signal = c.get('signal');

      const userId = await auth.registerNewUser(email, username, password, { signal });

      // The account exists now; a failed hand-off is recoverable via resend
      try {
        await emailVerification.issue(userId, email, { signal });
      } catch (error) {
        logger.error('Verification email not issued', { op: 'routes.register', userId, error });
      }

      const body: RegisterResponse = { user_id: userId };
      return c.json(body, 201);
    }
  );

  // POST /login
  router.post(
    '/login',
    limiterFor(rateLimits, 'login'),
    zValidator('json', loginSchema, rejectInvalid),
    async (c) => {
      const { email, password, app_id } = c.req.valid('json');
      const pair = await auth.login(email, password, app_id, { signal: c.get('signal') });
      return tokenPairResponse(c, pair);
    }
  );

  // POST /refresh
  router.post(
    '/refresh',
    limiterFor(rateLimits, 'refresh'),
    zValidator('json', refreshTokenSchema, rejectInvalid),
    async (c) => {
      const { refresh_token } = c.req.valid('json');
      const pair = await auth.refresh(refresh_token, { signal: c.get('signal') });
      return tokenPairResponse(c, pair);
    }
  );

  // POST /logout
  router.post(
    '/logout',
    limiterFor(rateLimits, 'logout'),
    zValidator('json', refreshTokenSchema, rejectInvalid),
    async (c) => {
      const { refresh_token } = c.req.valid('json');
      await auth.logout(refresh_token, { signal: c.get('signal') });
      return c.json(OK, 200);
    }
  );

  // GET /verify?token=
  router.get(
    '/verify',
    limiterFor(rateLimits, 'verify'),
    zValidator('query', verifyQuerySchema, rejectInvalid),
    async (c) => {
      const { token } = c.req.valid('query');
      await auth.verifyUser(token, { signal: c.get('signal') });
      return c.json(OK, 200);
    }
  );

  // POST /verify/resend
  // Same answer for unknown, verified and pending addresses
  router.post(
    '/verify/resend',
    limiterFor(rateLimits, 'resendVerification'),
    zValidator('json', resendVerificationSchema, rejectInvalid),
    async (c) => {
      const { email } = c.req.valid('json');
      await emailVerification.resend(email, { signal: c.get('signal') });
      return c.json(OK, 200);
    }
  );

  return router;
}
