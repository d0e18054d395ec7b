/**
 * UserService Implementation
 *
 * SCOPE: Provisioning on first authentication, usage summaries, deactivation
 * NOT IN SCOPE: Credentials and tokens (held by the auth provider)
 *
 * Dependencies: FileCatalog (file stats), AuditService (for logging)
 *
 * GUARDRAILS:
 * - Users can only read or deactivate themselves; the system actor may act
 *   on anyone
 * - Users are never physically deleted
 * - Result pattern required (no thrown errors)
 * - Every backend call is bounded by a timeout
 */

import type { AppConfig } from '../config/env.js';
import { DuplicateIdError, describeError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import { createTimeoutGuard } from '../lib/timeout.js';
import type {
  ActorContext,
  AuditEvent,
  EnsureUserParams,
  Failure,
  FileStats,
  Result,
  StorageStats,
  User,
  UserProfile,
} from '../types/index.js';
import { success, failure } from '../types/index.js';

/**
 * Database abstraction interface for UserService
 */
export interface UserServiceDb {
  getUser: (userId: string) => Promise<User | null>;
  createUser: (params: {
    id: string;
    email: string;
    storageLimit: number;
  }) => Promise<User>;
  setUserActive: (userId: string, isActive: boolean) => Promise<User | null>;
}

/**
 * Minimal FileCatalog interface (subset needed by UserService)
 */
export interface UserServiceCatalog {
  getStats: (userId: string) => Promise<Result<FileStats>>;
}

/**
 * Minimal AuditService interface (subset needed by UserService)
 */
export interface UserServiceAudit {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

/**
 * UserService interface
 */
export interface UserService {
  ensureUser(
    actor: ActorContext,
    params: EnsureUserParams
  ): Promise<Result<User>>;
  getUser(actor: ActorContext, userId: string): Promise<Result<User>>;
  getProfile(actor: ActorContext, userId: string): Promise<Result<UserProfile>>;
  getStorageStats(
    actor: ActorContext,
    userId: string
  ): Promise<Result<StorageStats>>;
  deactivateUser(actor: ActorContext, userId: string): Promise<Result<User>>;
}

// ─────────────────────────────────────────────────────────────
// HELPER FUNCTIONS
// ─────────────────────────────────────────────────────────────

const EMAIL_REGEX = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

/**
 * Self-access, or the system actor
 */
function canAccessUser(actor: ActorContext, targetUserId: string): boolean {
  if (actor.type === 'system') {
    return true;
  }
  return actor.type === 'user' && actor.userId === targetUserId;
}

/**
 * Percentage of `limit` used, rounded to 2 decimals
 */
export function usagePercentage(used: number, limit: number): number {
  if (limit <= 0) {
    return 0;
  }
  return Math.round((used / limit) * 100 * 100) / 100;
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

/**
 * Create UserService instance
 */
export function createUserService(deps: {
  db: UserServiceDb;
  catalog: UserServiceCatalog;
  auditService: UserServiceAudit;
  logger: Logger;
  config: Pick<AppConfig, 'defaultStorageLimitBytes' | 'backendTimeoutMs'>;
}): UserService {
  const { db, catalog, auditService, logger, config } = deps;
  const guard = createTimeoutGuard(config.backendTimeoutMs);

  function backendFailure(operation: string, err: unknown): Failure {
    logger.error(
      { err, operation },
      `User backend failure: ${describeError(err)}`
    );
    return failure('STORAGE_BACKEND_ERROR', 'Storage backend unavailable');
  }

  async function loadUser(
    actor: ActorContext,
    userId: string
  ): Promise<Result<User>> {
    if (!canAccessUser(actor, userId)) {
      return failure('PERMISSION_DENIED', 'Cannot access other users');
    }

    try {
      const user = await guard('user.get', db.getUser(userId));
      if (user === null) {
        return failure('USER_NOT_FOUND', 'User not found');
      }
      return success(user);
    } catch (err) {
      return backendFailure('user.get', err);
    }
  }

  return {
    /**
     * Return the user, provisioning it with the default storage limit
     * on first authentication
     */
    async ensureUser(
      actor: ActorContext,
      params: EnsureUserParams
    ): Promise<Result<User>> {
      if (!canAccessUser(actor, params.id)) {
        return failure('PERMISSION_DENIED', 'Cannot provision other users');
      }
      if (!EMAIL_REGEX.test(params.email)) {
        return failure('VALIDATION_ERROR', 'Invalid email format');
      }

      try {
        const existing = await guard('user.get', db.getUser(params.id));
        if (existing !== null) {
          return success(existing);
        }

        // A create that timed out but landed is found, or refused as a
        // duplicate, on the next request
        const user = await guard(
          'user.create',
          db.createUser({
            id: params.id,
            email: params.email,
            storageLimit: config.defaultStorageLimitBytes,
          })
        );

        await auditService.log(actor, {
          action: 'user:provisioned',
          resourceType: 'user',
          resourceId: user.id,
          details: { storageLimit: user.storageLimit },
        });

        logger.info({ userId: user.id }, 'User provisioned');
        return success(user);
      } catch (err) {
        // A concurrent first request provisioned the same user
        if (err instanceof DuplicateIdError) {
          return loadUser(actor, params.id);
        }
        return backendFailure('user.ensure', err);
      }
    },

    async getUser(actor: ActorContext, userId: string): Promise<Result<User>> {
      return loadUser(actor, userId);
    },

    /**
     * Profile with usage summary
     */
    async getProfile(
      actor: ActorContext,
      userId: string
    ): Promise<Result<UserProfile>> {
      const user = await loadUser(actor, userId);
      if (!user.success) {
        return user;
      }

      const stats = await catalog.getStats(userId);
      if (!stats.success) {
        return stats;
      }

      const { id, email, createdAt, storageUsed, storageLimit } = user.data;
      return success({
        id,
        email,
        createdAt,
        storageUsed,
        storageLimit,
        storagePercentage: usagePercentage(storageUsed, storageLimit),
        totalFiles: stats.data.fileCount,
      });
    },

    /**
     * Detailed storage statistics
     */
    async getStorageStats(
      actor: ActorContext,
      userId: string
    ): Promise<Result<StorageStats>> {
      const user = await loadUser(actor, userId);
      if (!user.success) {
        return user;
      }

      const stats = await catalog.getStats(userId);
      if (!stats.success) {
        return stats;
      }

      const { storageUsed: used, storageLimit: limit } = user.data;
      return success({
        used,
        limit,
        available: Math.max(0, limit - used),
        percentage: usagePercentage(used, limit),
        fileCount: stats.data.fileCount,
        largestFile: stats.data.largestFile,
      });
    },

    /**
     * Deactivate an account; the row and its files are kept
     */
    async deactivateUser(
      actor: ActorContext,
      userId: string
    ): Promise<Result<User>> {
      if (!canAccessUser(actor, userId)) {
        return failure('PERMISSION_DENIED', 'Cannot deactivate other users');
      }

      let user: User | null;
      try {
        user = await guard(
          'user.deactivate',
          db.setUserActive(userId, false)
        );
      } catch (err) {
        return backendFailure('user.deactivate', err);
      }

      if (user === null) {
        return failure('USER_NOT_FOUND', 'User not found');
      }

      await auditService.log(actor, {
        action: 'user:deactivated',
        resourceType: 'user',
        resourceId: userId,
      });

      logger.info({ userId }, 'User deactivated');
      return success(user);
    },
  };
}
