import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { MagicLinkVerifiedResponse, StatusResponse } from '@authgate/shared';
import type { AuthEnv } from '../../types/hono.js';
import type { AuthService } from '../../services/auth-service.js';
import type { TwoFactorService } from '../../services/two-factor-service.js';
import { limiterFor, clientIp, type RateLimitSettings } from '../../middleware/rate-limiter.js';
import { rejectInvalid } from '../../middleware/validator.js';
import { bearerAuth } from '../../middleware/bearer-auth.js';
import {
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  HEADER_USER_AGENT,
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
} from '../../config/constants.js';

const verifyLinkQuerySchema = z.object({
  token: z.string().min(1, 'token is required'),
});

const ipAddressSchema = z.string().ip();

const MAX_USER_AGENT_LENGTH = 512;

export interface TwoFactorRoutesOptions {
  auth: AuthService;
  twoFactor: TwoFactorService;
  rateLimits: Partial<RateLimitSettings> | false;
}

/**
 * Create the /auth/2fa routes
 */
export function createTwoFactorRoutes(options: TwoFactorRoutesOptions) {
  const { auth, twoFactor, rateLimits } = options;

  const router = new Hono<AuthEnv>();

  // POST /send (Authorization: Bearer <access token>)
  // The link goes to the address on record for the token's user
  router.post(
    '/send',
    limiterFor(rateLimits, 'magicLinkSend'),
    bearerAuth({ auth }),
    async (c) => {
      const { user, app } = c.get('principal');

      // Only store what parses as an address; the column is typed
      const ip = ipAddressSchema.safeParse(clientIp(c));
      const userAgent = c.req.header(HEADER_USER_AGENT)?.slice(0, MAX_USER_AGENT_LENGTH);

      await twoFactor.sendMagicLink(
        {
          userId: user.id,
          appId: app.id,
          email: user.email,
          ipAddress: ip.success ? ip.data : undefined,
          userAgent,
        },
        { signal: c.get('signal') }
      );

      const body: StatusResponse = { status: 'ok' };
      return c.json(body, 202);
    }
  );

  // GET /verify-link?token=
  router.get(
    '/verify-link',
    limiterFor(rateLimits, 'magicLinkVerify'),
    zValidator('query', verifyLinkQuerySchema, rejectInvalid),
    async (c) => {
      const { token } = c.req.valid('query');
      const consumed = await twoFactor.consumeMagicLink(token, { signal: c.get('signal') });

      c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
      c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

      const body: MagicLinkVerifiedResponse = {
        user_id: consumed.userId,
        app_id: consumed.appId,
        session_id: consumed.sessionId,
      };
      return c.json(body, 200);
    }
  );

  return router;
}
