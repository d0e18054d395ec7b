/**
 * Rate Limit Middleware Tests
 */

import { Hono } from 'hono';
import type { MiddlewareHandler } from 'hono';
import { describe, it, expect, vi } from 'vitest';

import {
  RATE_LIMITS,
  createInMemoryRateLimiter,
  createRateLimitMiddleware,
  createRateLimiters,
} from '@/api/middleware/rateLimit.js';
import type { RateLimiter } from '@/api/middleware/rateLimit.js';

// ─────────────────────────────────────────────────────────────
// TEST FIXTURES
// ─────────────────────────────────────────────────────────────

function setUser(userId: string): MiddlewareHandler {
  return async (c, next) => {
    c.set('actor', { type: 'user', userId, requestId: `req-${userId}` });
    c.set('requestId', `req-${userId}`);
    await next();
  };
}

function createTestApp(limiter: RateLimiter, userId: string = 'user-a'): Hono {
  const app = new Hono();
  app.use('*', setUser(userId));
  app.use('*', createRateLimitMiddleware(limiter));
  app.get('/ping', (c) => c.json({ ok: true }));
  return app;
}

describe('In-Memory Rate Limiter', () => {
  it('should allow requests up to the limit', async () => {
    const limiter = createInMemoryRateLimiter({ limit: 2, window: 60 }, () => 0);

    const first = await limiter.limit('user:a');
    const second = await limiter.limit('user:a');
    const third = await limiter.limit('user:a');

    expect(first).toEqual({ success: true, limit: 2, remaining: 1, reset: 60 });
    expect(second).toEqual({ success: true, limit: 2, remaining: 0, reset: 60 });
    expect(third).toEqual({ success: false, limit: 2, remaining: 0, reset: 60 });
  });

  it('should count identifiers separately', async () => {
    const limiter = createInMemoryRateLimiter({ limit: 1, window: 60 }, () => 0);

    await limiter.limit('user:a');
    const other = await limiter.limit('user:b');

    expect(other.success).toBe(true);
  });

  it('should start a new window after the reset time', async () => {
    let now = 0;
    const limiter = createInMemoryRateLimiter({ limit: 1, window: 60 }, () => now);

    await limiter.limit('user:a');
    now = 30_000;
    const blocked = await limiter.limit('user:a');
    now = 60_000;
    const fresh = await limiter.limit('user:a');

    expect(blocked).toEqual({ success: false, limit: 1, remaining: 0, reset: 30 });
    expect(fresh).toEqual({ success: true, limit: 1, remaining: 0, reset: 60 });
  });
});

describe('Rate Limit Middleware', () => {
  it('should set rate limit headers on allowed requests', async () => {
    const app = createTestApp(
      createInMemoryRateLimiter({ limit: 5, window: 60 }, () => 0)
    );

    const res = await app.request('/ping');

    expect(res.status).toBe(200);
    expect(res.headers.get('X-RateLimit-Limit')).toBe('5');
    expect(res.headers.get('X-RateLimit-Remaining')).toBe('4');
    expect(res.headers.get('X-RateLimit-Reset')).toBe('60');
  });

  it('should return 429 once the limit is exhausted', async () => {
    const app = createTestApp(
      createInMemoryRateLimiter({ limit: 1, window: 60 }, () => 0)
    );

    await app.request('/ping');
    const res = await app.request('/ping');

    expect(res.status).toBe(429);
    expect(await res.json()).toEqual({
      error: {
        code: 'RATE_LIMITED',
        message: 'Too many requests',
        details: { retryAfter: 60, limit: 1 },
        requestId: 'req-user-a',
      },
    });
  });

  it('should key by user id', async () => {
    const limiter: RateLimiter = {
      limit: vi.fn().mockResolvedValue({
        success: true,
        limit: 10,
        remaining: 9,
        reset: 60,
      }),
    };
    const app = createTestApp(limiter, 'user-b');

    await app.request('/ping');

    expect(limiter.limit).toHaveBeenCalledWith('user:user-b');
  });

  it('should fall back to the client IP without an actor', async () => {
    const limiter: RateLimiter = {
      limit: vi.fn().mockResolvedValue({
        success: true,
        limit: 10,
        remaining: 9,
        reset: 60,
      }),
    };
    const app = new Hono();
    app.use('*', createRateLimitMiddleware(limiter));
    app.get('/ping', (c) => c.json({ ok: true }));

    await app.request('/ping', { headers: { 'X-Forwarded-For': '198.51.100.4' } });

    expect(limiter.limit).toHaveBeenCalledWith('ip:198.51.100.4');
  });
});

describe('createRateLimiters', () => {
  it('should build in-memory limiters with the group limits when Redis is absent', async () => {
    const limiters = createRateLimiters(null);

    const upload = await limiters.upload.limit('user:a');
    const download = await limiters.download.limit('user:a');
    const api = await limiters.api.limit('user:a');

    expect(upload.limit).toBe(RATE_LIMITS.upload.limit);
    expect(download.limit).toBe(RATE_LIMITS.download.limit);
    expect(api.limit).toBe(RATE_LIMITS.api.limit);
    expect(upload.remaining).toBe(RATE_LIMITS.upload.limit - 1);
  });
});
