import type { Hono } from 'hono';
import { z } from 'zod';
import type { AuthEnv } from '../../types/hono.js';
import { createAuthServer } from '../../app.js';
import { createServices, type Services } from '../../bootstrap.js';
import { loadConfig } from '../../config/index.js';
import { createMemoryStorage, type MemoryStorage } from '../../storage/memory/index.js';
import { MemoryNotifier } from '../../notifier/memory-notifier.js';
import { createSilentLogger } from '../../logging/logger.js';
import type { RateLimitSettings } from '../../middleware/rate-limiter.js';
import { TEST_APP, TEST_SECRETS, createFakeClock, tokenFromLink, type FakeClock } from '../fixtures.js';

/**
 * Test fixtures and helpers
 */

export const PUBLIC_URL = 'http://auth.test';

export const tokenPairSchema = z.object({
  access_token: z.string(),
  refresh_token: z.string(),
  token_type: z.literal('Bearer'),
  expires_in: z.number(),
});

export type TokenPairBody = z.infer<typeof tokenPairSchema>;

// Shared test context
export interface TestContext {
  app: Hono<AuthEnv>;
  services: Services;
  storage: MemoryStorage;
  notifier: MemoryNotifier;
  clock: FakeClock;
}

export interface TestContextOptions {
  rateLimits?: Partial<RateLimitSettings> | false;
  requestTimeoutMs?: number;
}

// Setup function for tests
export function setupTestContext(options: TestContextOptions = {}): TestContext {
  const clock = createFakeClock();
  const logger = createSilentLogger();
  const config = loadConfig({
    PUBLIC_URL,
    LOG_LEVEL: 'silent',
    SCRYPT_COST: '1024',
    VERIFICATION_TOKEN_SECRET: TEST_SECRETS.verification,
    TWO_FACTOR_TOKEN_SECRET: TEST_SECRETS.twoFactor,
  });

  const storage = createMemoryStorage({ apps: [TEST_APP], clock: clock.now });
  const notifier = new MemoryNotifier();
  const services = createServices({ config, storage, notifier, logger, clock: clock.now });

  // Rate limiting stays off unless a test asks for it
  const app = createAuthServer({
    auth: services.auth,
    emailVerification: services.emailVerification,
    twoFactor: services.twoFactor,
    logger,
    rateLimits: options.rateLimits ?? false,
    requestTimeoutMs: options.requestTimeoutMs,
    enableLogging: false,
  });

  return { app, services, storage, notifier, clock };
}

export async function postJson(
  app: Hono<AuthEnv>,
  path: string,
  body: unknown,
  headers: Record<string, string> = {}
): Promise<Response> {
  return app.request(path, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  });
}

/**
 * Token from the most recent email sent to `to`
 */
export function lastEmailToken(ctx: TestContext, to: string): string {
  const message = ctx.notifier.lastTo(to);
  if (!message) {
    throw new Error(`No email was sent to ${to}`);
  }
  return tokenFromLink(message.link);
}

/**
 * Register, verify and return the new user's id
 */
export async function registerVerifiedUser(
  ctx: TestContext,
  email = 'alice@example.com',
  username = 'alice',
  password = 'correct horse'
): Promise<number> {
  const res = await postJson(ctx.app, '/auth/register', { email, username, password });
  const { user_id } = z.object({ user_id: z.number() }).parse(await res.json());

  const verify = await ctx.app.request(`/auth/verify?token=${encodeURIComponent(lastEmailToken(ctx, email))}`);
  if (verify.status !== 200) {
    throw new Error(`Verification failed with ${verify.status}`);
  }

  return user_id;
}

export async function loginUser(
  ctx: TestContext,
  email = 'alice@example.com',
  password = 'correct horse'
): Promise<TokenPairBody> {
  const res = await postJson(ctx.app, '/auth/login', { email, password, app_id: TEST_APP.id });
  return tokenPairSchema.parse(await res.json());
}
