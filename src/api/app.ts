/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger as accessLogger } from 'hono/logger';

import type { Logger } from '../lib/logger.js';
import type { HealthChecks } from '../services/index.js';
import type { ActorContext, TokenVerifier } from '../types/index.js';

import {
  createAuthMiddleware,
  createPublicMiddleware,
} from './middleware/auth.js';
import type { RateLimitGroup, RateLimiter } from './middleware/rateLimit.js';
import { createRateLimitMiddleware } from './middleware/rateLimit.js';
import { createFileRoutes } from './routes/files.js';
import { createHealthRoutes } from './routes/health.js';
import { createUserRoutes } from './routes/users.js';
import type { ApiServices } from './types.js';

export const API_VERSION = 'v1';

/**
 * App configuration
 */
interface CreateAppOptions {
  services: ApiServices;
  tokenVerifier: TokenVerifier;
  rateLimiters: Record<RateLimitGroup, RateLimiter>;
  healthChecks: HealthChecks;
  logger: Logger;
  maxFileSizeBytes: number;
  backendTimeoutMs: number;
  allowedOrigins?: string[];
}

/**
 * Create the main Hono application
 */
export function createApp(options: CreateAppOptions): Hono {
  const { services, tokenVerifier, rateLimiters, logger, allowedOrigins } =
    options;
  const app = new Hono();

  // Global middleware
  app.use('*', accessLogger((message) => logger.info(message)));
  app.use(
    '*',
    cors({
      origin: allowedOrigins ?? ['http://localhost:3000'],
      credentials: true,
    })
  );

  // Public routes (no auth)
  app.use('/api/v1/health', createPublicMiddleware());
  app.route(
    '/api/v1',
    createHealthRoutes({
      version: API_VERSION,
      checks: options.healthChecks,
      timeoutMs: options.backendTimeoutMs,
      logger,
    })
  );

  // Auth middleware for protected routes
  const authMiddleware = createAuthMiddleware({
    tokenVerifier,
    userService: services.userService,
    logger,
  });

  app.use('/api/v1/files/*', authMiddleware);
  app.use('/api/v1/users/*', authMiddleware);

  // Rate limits (per user; auth has already set the actor)
  const apiLimit = createRateLimitMiddleware(rateLimiters.api);
  const downloadLimit = createRateLimitMiddleware(rateLimiters.download);

  app.use('/api/v1/files/*', apiLimit);
  app.use('/api/v1/users/*', apiLimit);
  app.use(
    '/api/v1/files/upload',
    createRateLimitMiddleware(rateLimiters.upload)
  );
  app.use('/api/v1/files/:id/download', downloadLimit);
  app.use('/api/v1/files/:id/content', downloadLimit);

  // File routes
  app.route(
    '/api/v1',
    createFileRoutes({
      fileService: services.fileService,
      maxFileSizeBytes: options.maxFileSizeBytes,
    })
  );

  // User routes
  app.route(
    '/api/v1',
    createUserRoutes({
      userService: services.userService,
    })
  );

  // 404 handler
  app.notFound((c) => {
    const actor: ActorContext | undefined = c.get('actor');

    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId: actor?.requestId ?? 'unknown',
        },
      },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    const actor: ActorContext | undefined = c.get('actor');
    const requestId = actor?.requestId ?? 'unknown';
    logger.error({ err, requestId }, 'Unhandled error');

    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId,
        },
      },
      500
    );
  });

  return app;
}
