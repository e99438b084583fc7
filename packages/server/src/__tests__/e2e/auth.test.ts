import { describe, it, expect, beforeEach } from 'vitest';
import * as jose from 'jose';
import {
  setupTestContext,
  postJson,
  lastEmailToken,
  registerVerifiedUser,
  loginUser,
  tokenPairSchema,
  type TestContext,
} from './test-setup.js';
import { TEST_SECRETS } from '../fixtures.js';

describe('Auth endpoints', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = setupTestContext();
  });

  describe('full lifecycle', () => {
    it('should register, verify, log in, refresh and log out', async () => {
      // Register
      const registerRes = await postJson(ctx.app, '/auth/register', {
        email: 'Alice@Example.com',
        username: 'alice',
        password: 'correct horse',
      });
      expect(registerRes.status).toBe(201);
      expect(await registerRes.json()).toEqual({ user_id: 1 });

      // Not verified yet
      const early = await postJson(ctx.app, '/auth/login', {
        email: 'alice@example.com',
        password: 'correct horse',
        app_id: 1,
      });
      expect(early.status).toBe(403);
      expect(await early.json()).toEqual({
        error: 'email_not_verified',
        error_description: 'The email address has not been verified.',
      });

      // Verify
      const token = lastEmailToken(ctx, 'alice@example.com');
      const verifyRes = await ctx.app.request(`/auth/verify?token=${encodeURIComponent(token)}`);
      expect(verifyRes.status).toBe(200);
      expect(await verifyRes.json()).toEqual({ status: 'ok' });

      // Login
      const loginRes = await postJson(ctx.app, '/auth/login', {
        email: 'alice@example.com',
        password: 'correct horse',
        app_id: 1,
      });
      expect(loginRes.status).toBe(200);
      expect(loginRes.headers.get('Cache-Control')).toBe('no-store');
      expect(loginRes.headers.get('Pragma')).toBe('no-cache');
      const pair = tokenPairSchema.parse(await loginRes.json());
      expect(pair.token_type).toBe('Bearer');
      expect(pair.expires_in).toBe(900);

      const { payload } = await jose.jwtVerify(pair.access_token, new TextEncoder().encode(TEST_SECRETS.app), {
        audience: '1',
        currentDate: ctx.clock.now(),
      });
      expect(payload).toMatchObject({ sub: '1', purpose: 'access', app_id: 1, email: 'alice@example.com' });

      // Refresh
      const refreshRes = await postJson(ctx.app, '/auth/refresh', { refresh_token: pair.refresh_token });
      expect(refreshRes.status).toBe(200);
      const rotated = tokenPairSchema.parse(await refreshRes.json());
      expect(rotated.refresh_token).not.toBe(pair.refresh_token);

      // Logout
      const logoutRes = await postJson(ctx.app, '/auth/logout', { refresh_token: rotated.refresh_token });
      expect(logoutRes.status).toBe(200);
      expect(await logoutRes.json()).toEqual({ status: 'ok' });

      const reuse = await postJson(ctx.app, '/auth/refresh', { refresh_token: rotated.refresh_token });
      expect(reuse.status).toBe(401);
    });
  });

  describe('POST /auth/register', () => {
    it('should send a verification email', async () => {
      await postJson(ctx.app, '/auth/register', {
        email: 'alice@example.com',
        username: 'alice',
        password: 'correct horse',
      });

      const message = ctx.notifier.lastTo('alice@example.com');
      expect(message?.purpose).toBe('email_verification');
      expect(message?.link.startsWith('http://auth.test/auth/verify?token=')).toBe(true);
    });

    it('should reject a duplicate account', async () => {
      const body = { email: 'alice@example.com', username: 'alice', password: 'correct horse' };
      await postJson(ctx.app, '/auth/register', body);

      const res = await postJson(ctx.app, '/auth/register', body);

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({
        error: 'already_exists',
        error_description: 'A user with this email or username already exists.',
      });
    });

    it('should validate the body', async () => {
      const res = await postJson(ctx.app, '/auth/register', {
        email: 'not-an-email',
        username: 'alice',
        password: 'short',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'invalid_request',
        error_description: 'A valid email address is required, Password must be at least 8 characters',
      });
    });

    it('should reject malformed JSON', async () => {
      const res = await ctx.app.request('/auth/register', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"email":',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'invalid_request',
        error_description: 'Malformed JSON in request body',
      });
    });
  });

  describe('POST /auth/login', () => {
    it('should answer not_found for an unknown address', async () => {
      const res = await postJson(ctx.app, '/auth/login', {
        email: 'nobody@example.com',
        password: 'correct horse',
        app_id: 1,
      });

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'not_found', error_description: 'User not found.' });
    });

    it('should answer invalid_credentials for a wrong password', async () => {
      await registerVerifiedUser(ctx);

      const res = await postJson(ctx.app, '/auth/login', {
        email: 'alice@example.com',
        password: 'wrong password',
        app_id: 1,
      });

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: 'invalid_credentials', error_description: 'Invalid credentials.' });
    });

    it('should answer invalid_app_id for an unknown app', async () => {
      await registerVerifiedUser(ctx);

      const res = await postJson(ctx.app, '/auth/login', {
        email: 'alice@example.com',
        password: 'correct horse',
        app_id: 42,
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'invalid_app_id', error_description: 'Unknown application.' });
    });

    it('should require a numeric app_id', async () => {
      const res = await postJson(ctx.app, '/auth/login', {
        email: 'alice@example.com',
        password: 'correct horse',
        app_id: '1',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: 'invalid_request' });
    });
  });

  describe('POST /auth/refresh', () => {
    it('should reject the previous refresh token after rotation', async () => {
      await registerVerifiedUser(ctx);
      const pair = await loginUser(ctx);
      await postJson(ctx.app, '/auth/refresh', { refresh_token: pair.refresh_token });

      const res = await postJson(ctx.app, '/auth/refresh', { refresh_token: pair.refresh_token });

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({
        error: 'invalid_credentials',
        error_description: 'Refresh token is invalid or expired.',
      });
    });

    it('should rotate exactly once under concurrent use', async () => {
      await registerVerifiedUser(ctx);
      const pair = await loginUser(ctx);

      const responses = await Promise.all(
        Array.from({ length: 3 }, () => postJson(ctx.app, '/auth/refresh', { refresh_token: pair.refresh_token }))
      );

      expect(responses.map((res) => res.status).sort()).toEqual([200, 401, 401]);
    });

    it('should reject an expired refresh token', async () => {
      await registerVerifiedUser(ctx);
      const pair = await loginUser(ctx);
      ctx.clock.advance(30 * 24 * 60 * 60);

      const res = await postJson(ctx.app, '/auth/refresh', { refresh_token: pair.refresh_token });

      expect(res.status).toBe(401);
    });
  });

  describe('POST /auth/logout', () => {
    it('should revoke only once', async () => {
      await registerVerifiedUser(ctx);
      const pair = await loginUser(ctx);

      const first = await postJson(ctx.app, '/auth/logout', { refresh_token: pair.refresh_token });
      const second = await postJson(ctx.app, '/auth/logout', { refresh_token: pair.refresh_token });

      expect(first.status).toBe(200);
      expect(second.status).toBe(401);
      expect(await second.json()).toMatchObject({ error: 'invalid_credentials' });
    });
  });

  describe('GET /auth/verify', () => {
    it('should reject a forged token', async () => {
      const res = await ctx.app.request('/auth/verify?token=not-a-token');

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: 'invalid_token', error_description: 'Token is malformed' });
    });

    it('should require a token', async () => {
      const res = await ctx.app.request('/auth/verify');

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: 'invalid_request' });
    });

    it('should reject an expired token', async () => {
      await postJson(ctx.app, '/auth/register', {
        email: 'alice@example.com',
        username: 'alice',
        password: 'correct horse',
      });
      const token = lastEmailToken(ctx, 'alice@example.com');
      ctx.clock.advance(24 * 60 * 60);

      const res = await ctx.app.request(`/auth/verify?token=${encodeURIComponent(token)}`);

      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: 'invalid_token', error_description: 'Token has expired' });
    });
  });

  describe('POST /auth/verify/resend', () => {
    it('should answer the same for unknown and pending addresses', async () => {
      await postJson(ctx.app, '/auth/register', {
        email: 'alice@example.com',
        username: 'alice',
        password: 'correct horse',
      });

      const unknown = await postJson(ctx.app, '/auth/verify/resend', { email: 'nobody@example.com' });
      const pending = await postJson(ctx.app, '/auth/verify/resend', { email: 'alice@example.com' });

      expect(unknown.status).toBe(200);
      expect(await unknown.json()).toEqual({ status: 'ok' });
      expect(pending.status).toBe(200);
      expect(await pending.json()).toEqual({ status: 'ok' });
      expect(ctx.notifier.messages.map((message) => message.to)).toEqual([
        'alice@example.com',
        'alice@example.com',
      ]);
    });
  });
});
