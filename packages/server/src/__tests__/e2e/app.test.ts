import { describe, it, expect, vi } from 'vitest';
import { setupTestContext, postJson } from './test-setup.js';

describe('Server', () => {
  describe('GET /health', () => {
    it('should report ok with security headers', async () => {
      const { app } = setupTestContext();

      const res = await app.request('/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: 'ok' });
      expect(res.headers.get('X-Frame-Options')).toBe('DENY');
      expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff');
      expect(res.headers.get('Referrer-Policy')).toBe('no-referrer');
      expect(res.headers.get('Strict-Transport-Security')).toBeNull();
    });
  });

  describe('unknown routes', () => {
    it('should answer not_found in the error format', async () => {
      const { app } = setupTestContext();

      const res = await app.request('/auth/unknown');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: 'not_found',
        error_description: 'The requested resource does not exist.',
      });
    });
  });

  describe('errors', () => {
    it('should never be cached', async () => {
      const { app } = setupTestContext();

      const res = await postJson(app, '/auth/refresh', { refresh_token: 'never-issued' });

      expect(res.status).toBe(401);
      expect(res.headers.get('Cache-Control')).toBe('no-store');
      expect(res.headers.get('Pragma')).toBe('no-cache');
    });

    it('should hide the cause of unexpected failures', async () => {
      const ctx = setupTestContext();
      vi.spyOn(ctx.storage.credentials, 'getUserByEmail').mockRejectedValueOnce(new Error('db password rejected'));

      const res = await postJson(ctx.app, '/auth/login', {
        email: 'alice@example.com',
        password: 'correct horse',
        app_id: 1,
      });

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        error: 'internal_error',
        error_description: 'The server encountered an unexpected condition.',
      });
    });
  });

  describe('request deadline', () => {
    it('should answer deadline_exceeded when a store stalls', async () => {
      const ctx = setupTestContext({ requestTimeoutMs: 20 });
      vi.spyOn(ctx.storage.credentials, 'getUserByEmail').mockReturnValueOnce(new Promise<null>(() => {}));

      const res = await postJson(ctx.app, '/auth/login', {
        email: 'alice@example.com',
        password: 'correct horse',
        app_id: 1,
      });

      expect(res.status).toBe(503);
      expect(await res.json()).toEqual({
        error: 'deadline_exceeded',
        error_description: 'The operation did not complete in time. It is safe to retry.',
      });
    });
  });

  describe('rate limiting', () => {
    it('should reject requests over the endpoint limit', async () => {
      const { app } = setupTestContext({ rateLimits: { login: { maxRequests: 2, windowMs: 60_000 } } });

      const first = await postJson(app, '/auth/login', {});
      const second = await postJson(app, '/auth/login', {});
      const third = await postJson(app, '/auth/login', {});

      expect(first.status).toBe(400);
      expect(first.headers.get('X-RateLimit-Limit')).toBe('2');
      expect(first.headers.get('X-RateLimit-Remaining')).toBe('1');
      expect(second.status).toBe(400);
      expect(second.headers.get('X-RateLimit-Remaining')).toBe('0');

      expect(third.status).toBe(429);
      expect(third.headers.get('Retry-After')).toBe('60');
      expect(await third.json()).toEqual({
        error: 'rate_limited',
        error_description: 'Rate limit exceeded. Try again in 60 seconds.',
      });
    });

    it('should count each client separately', async () => {
      const { app } = setupTestContext({ rateLimits: { login: { maxRequests: 1, windowMs: 60_000 } } });

      const a = await postJson(app, '/auth/login', {}, { 'X-Forwarded-For': '198.51.100.1' });
      const b = await postJson(app, '/auth/login', {}, { 'X-Forwarded-For': '198.51.100.2' });
      const again = await postJson(app, '/auth/login', {}, { 'X-Forwarded-For': '198.51.100.1' });

      expect(a.status).toBe(400);
      expect(b.status).toBe(400);
      expect(again.status).toBe(429);
    });
  });
});
