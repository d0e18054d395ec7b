/**
 * Upstash Redis Client Configuration
 * Backs the distributed rate limiter
 */

import { Redis } from '@upstash/redis';

/**
 * Create a Redis client from explicit credentials
 */
export function createRedisClient(credentials: {
  url: string;
  token: string;
}): Redis {
  return new Redis({
    url: credentials.url,
    token: credentials.token,
  });
}
