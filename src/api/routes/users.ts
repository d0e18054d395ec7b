/**
 * User Routes
 * Endpoints for the caller's profile, storage statistics and deactivation
 */

import type { Context } from 'hono';
import { Hono } from 'hono';

import type { UserService } from '../../services/index.js';
import type { ActorContext } from '../../types/index.js';
import { errorResponse, successResponse } from '../utils/response.js';

interface UserRoutesDeps {
  userService: Pick<
    UserService,
    'getProfile' | 'getStorageStats' | 'deactivateUser'
  >;
}

/**
 * Helper to get actor from context
 */
function getActor(c: Context): ActorContext {
  return c.get('actor');
}

/**
 * Helper to get request ID from context
 */
function getRequestId(c: Context): string {
  return c.get('requestId') || getActor(c).requestId;
}

function unauthorized(c: Context, requestId: string): Response {
  return errorResponse(
    c,
    { code: 'UNAUTHORIZED', message: 'User ID not found in token' },
    requestId
  );
}

/**
 * Create user routes
 */
export function createUserRoutes(deps: UserRoutesDeps): Hono {
  const { userService } = deps;
  const app = new Hono();

  /**
   * GET /users/me
   * Current user's profile with usage summary
   */
  app.get('/users/me', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);
    const userId = actor.userId;

    if (userId === undefined || userId === '') {
      return unauthorized(c, requestId);
    }

    const result = await userService.getProfile(actor, userId);

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(
      c,
      {
        ...result.data,
        createdAt: result.data.createdAt.toISOString(),
      },
      requestId
    );
  });

  /**
   * GET /users/me/storage
   * Detailed storage statistics
   */
  app.get('/users/me/storage', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);
    const userId = actor.userId;

    if (userId === undefined || userId === '') {
      return unauthorized(c, requestId);
    }

    const result = await userService.getStorageStats(actor, userId);

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  /**
   * DELETE /users/me
   * Deactivate the current account (files are kept)
   */
  app.delete('/users/me', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);
    const userId = actor.userId;

    if (userId === undefined || userId === '') {
      return unauthorized(c, requestId);
    }

    const result = await userService.deactivateUser(actor, userId);

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(
      c,
      { id: result.data.id, isActive: result.data.isActive },
      requestId
    );
  });

  return app;
}
