/**
 * Rate Limiting Middleware
 * Uses Upstash Redis for distributed rate limiting, or an in-memory
 * fixed window when Redis is not configured
 */

import { Ratelimit } from '@upstash/ratelimit';
import type { Redis } from '@upstash/redis';
import type { Context, Next } from 'hono';

import type { ActorContext } from '../../types/index.js';

/**
 * Rate limit configuration
 */
export interface RateLimitConfig {
  /**
   * Maximum requests allowed in the window
   */
  limit: number;

  /**
   * Window duration in seconds
   */
  window: number;

  /**
   * Optional: Get identifier from context (defaults to user, then IP)
   */
  getIdentifier?: (c: Context) => string;
}

/**
 * Rate limit result
 */
export interface RateLimitResult {
  success: boolean;
  limit: number;
  remaining: number;
  reset: number;
}

/**
 * Rate limiter interface (injectable for testing)
 */
export interface RateLimiter {
  limit: (identifier: string) => Promise<RateLimitResult>;
}

const HOUR_SECONDS = 60 * 60;

/**
 * Per-user limits by route group
 */
export const RATE_LIMITS = {
  upload: { limit: 20, window: HOUR_SECONDS },
  download: { limit: 100, window: HOUR_SECONDS },
  api: { limit: 1000, window: HOUR_SECONDS },
} satisfies Record<string, RateLimitConfig>;

export type RateLimitGroup = keyof typeof RATE_LIMITS;

/**
 * Get identifier from context
 * Priority: userId > IP > 'unknown'
 */
function defaultGetIdentifier(c: Context): string {
  const actor: ActorContext | undefined = c.get('actor');
  if (actor?.userId !== undefined) {
    return `user:${actor.userId}`;
  }
  const ip =
    c.req.header('x-forwarded-for') ?? c.req.header('x-real-ip') ?? 'unknown';
  return `ip:${ip}`;
}

/**
 * Create rate limit middleware
 */
export function createRateLimitMiddleware(
  rateLimiter: RateLimiter,
  config: Pick<RateLimitConfig, 'getIdentifier'> = {}
) {
  const getIdentifier = config.getIdentifier ?? defaultGetIdentifier;

  return async function rateLimitMiddleware(c: Context, next: Next) {
    const identifier = getIdentifier(c);

    const result = await rateLimiter.limit(identifier);

    c.header('X-RateLimit-Limit', result.limit.toString());
    c.header('X-RateLimit-Remaining', result.remaining.toString());
    c.header('X-RateLimit-Reset', result.reset.toString());

    if (!result.success) {
      const requestId: string | undefined = c.get('requestId');

      return c.json(
        {
          error: {
            code: 'RATE_LIMITED',
            message: 'Too many requests',
            details: {
              retryAfter: result.reset,
              limit: result.limit,
            },
            requestId: requestId ?? 'unknown',
          },
        },
        429
      );
    }

    return next();
  };
}

/**
 * Wrap an @upstash/ratelimit instance
 */
export function createUpstashRateLimiter(ratelimit: Ratelimit): RateLimiter {
  return {
    async limit(identifier: string): Promise<RateLimitResult> {
      const result = await ratelimit.limit(identifier);
      return {
        success: result.success,
        limit: result.limit,
        remaining: result.remaining,
        reset: result.reset,
      };
    },
  };
}

/**
 * Create in-memory rate limiter (for testing/development)
 */
export function createInMemoryRateLimiter(
  config: Pick<RateLimitConfig, 'limit' | 'window'>,
  now: () => number = Date.now
): RateLimiter {
  const store = new Map<string, { count: number; resetAt: number }>();

  return {
    async limit(identifier: string): Promise<RateLimitResult> {
      const current = now();
      let entry = store.get(identifier);

      if (entry !== undefined && entry.resetAt <= current) {
        store.delete(identifier);
        entry = undefined;
      }

      if (entry === undefined) {
        entry = { count: 0, resetAt: current + config.window * 1000 };
        store.set(identifier, entry);
      }

      entry.count++;

      return {
        success: entry.count <= config.limit,
        limit: config.limit,
        remaining: Math.max(0, config.limit - entry.count),
        reset: Math.ceil((entry.resetAt - current) / 1000),
      };
    },
  };
}

/**
 * One limiter per route group: Upstash sliding window when a Redis
 * client is given, in-memory otherwise
 */
export function createRateLimiters(
  redis: Redis | null
): Record<RateLimitGroup, RateLimiter> {
  function build(group: RateLimitGroup): RateLimiter {
    const { limit, window } = RATE_LIMITS[group];
    if (redis === null) {
      return createInMemoryRateLimiter({ limit, window });
    }
    return createUpstashRateLimiter(
      new Ratelimit({
        redis,
        limiter: Ratelimit.slidingWindow(limit, `${window} s`),
        prefix: `ratelimit:${group}`,
      })
    );
  }

  return {
    upload: build('upload'),
    download: build('download'),
    api: build('api'),
  };
}
