/**
 * Auth Middleware
 * Constructs ActorContext from a verified access token
 *
 * Token verification is delegated to a TokenVerifier (Supabase Auth in
 * production). First-time users are provisioned through UserService.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';

import { describeError } from '../../lib/errors.js';
import type { Logger } from '../../lib/logger.js';
import { createTimeoutGuard } from '../../lib/timeout.js';
import type { UserService } from '../../services/index.js';
import type {
  ActorContext,
  TokenVerifier,
  VerifiedIdentity,
} from '../../types/index.js';
import { errorResponse } from '../utils/response.js';

/**
 * Auth middleware dependencies
 */
interface AuthMiddlewareDeps {
  tokenVerifier: TokenVerifier;
  userService: Pick<UserService, 'ensureUser'>;
  logger: Logger;
}

/**
 * Generate a unique request ID
 */
function generateRequestId(): string {
  return nanoid();
}

/**
 * Client metadata recorded on the actor
 */
function clientInfo(c: Context): { ip?: string; userAgent?: string } {
  const ip = c.req.header('x-forwarded-for') ?? c.req.header('x-real-ip');
  const userAgent = c.req.header('user-agent');
  return {
    ...(ip !== undefined && { ip }),
    ...(userAgent !== undefined && { userAgent }),
  };
}

/**
 * TokenVerifier backed by Supabase Auth
 */
export function createSupabaseTokenVerifier(
  supabase: SupabaseClient,
  timeoutMs: number
): TokenVerifier {
  const guard = createTimeoutGuard(timeoutMs);

  return {
    async verify(token: string): Promise<VerifiedIdentity | null> {
      const {
        data: { user },
        error,
      } = await guard('auth.getUser', supabase.auth.getUser(token));

      if (error !== null || user === null) {
        return null;
      }

      return { userId: user.id, email: user.email ?? '' };
    },
  };
}

/**
 * Create auth middleware for protected routes
 * Extracts the bearer token, verifies it, ensures the user row exists
 */
export function createAuthMiddleware(deps: AuthMiddlewareDeps) {
  const { tokenVerifier, userService, logger } = deps;

  return async function authMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    // 1. Extract token from Authorization header
    const authHeader = c.req.header('Authorization');
    const token =
      authHeader !== undefined && authHeader.startsWith('Bearer ')
        ? authHeader.slice(7).trim()
        : '';

    if (token === '') {
      return errorResponse(
        c,
        {
          code: 'UNAUTHORIZED',
          message: 'Missing or invalid authorization header',
        },
        requestId
      );
    }

    // 2. Verify token
    let identity: VerifiedIdentity | null;
    try {
      identity = await tokenVerifier.verify(token);
    } catch (err) {
      logger.error(
        { err, requestId },
        `Token verification failed: ${describeError(err)}`
      );
      return errorResponse(
        c,
        { code: 'INTERNAL_ERROR', message: 'Authentication failed' },
        requestId
      );
    }

    if (identity === null) {
      return errorResponse(
        c,
        { code: 'UNAUTHORIZED', message: 'Invalid or expired token' },
        requestId
      );
    }

    // 3. Construct ActorContext
    const actor: ActorContext = {
      type: 'user',
      userId: identity.userId,
      requestId,
      ...clientInfo(c),
    };

    // 4. Ensure user exists in application database
    const user = await userService.ensureUser(actor, {
      id: identity.userId,
      email: identity.email,
    });

    if (!user.success) {
      return errorResponse(c, user.error, requestId);
    }

    if (!user.data.isActive) {
      return errorResponse(
        c,
        { code: 'PERMISSION_DENIED', message: 'Account is deactivated' },
        requestId
      );
    }

    // 5. Attach to context
    c.set('actor', actor);
    c.set('requestId', requestId);

    return next();
  };
}

/**
 * Create public middleware for routes that don't require auth
 * Creates an anonymous actor
 */
export function createPublicMiddleware() {
  return function publicMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    const actor: ActorContext = {
      type: 'anonymous',
      requestId,
      ...clientInfo(c),
    };

    c.set('actor', actor);
    c.set('requestId', requestId);

    return next();
  };
}
