/**
 * AuditService Implementation
 *
 * Purpose: Append-only audit logging of file mutations and
 * storage consistency warnings.
 * Owns: audit_logs
 * Dependencies: None (lowest level service)
 */

import { describeError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import { createTimeoutGuard } from '../lib/timeout.js';
import type {
  ActorContext,
  AuditEvent,
  AuditLog,
  AuditLogEntry,
  AuditQueryParams,
  PagedResult,
  Result,
} from '../types/index.js';
import {
  success,
  failure,
  validatePageParams,
  pageOffset,
  countPages,
} from '../types/index.js';

/**
 * Database abstraction interface for AuditService
 * Allows mocking in tests
 */
export interface AuditServiceDb {
  insertLog: (entry: AuditLogEntry) => Promise<{ id: string }>;
  queryLogs: (
    params: Omit<AuditQueryParams, 'page' | 'limit'> & {
      offset: number;
      limit: number;
    }
  ) => Promise<{ items: AuditLog[]; total: number }>;
}

/**
 * AuditService interface
 */
export interface AuditService {
  log(actor: ActorContext, event: AuditEvent): Promise<Result<void>>;
  queryLogs(
    actor: ActorContext,
    params: AuditQueryParams
  ): Promise<Result<PagedResult<AuditLog>>>;
}

/**
 * Build log entry from actor and event
 */
function buildLogEntry(actor: ActorContext, event: AuditEvent): AuditLogEntry {
  return {
    actorId: actor.userId ?? null,
    actorType: actor.type,
    action: event.action,
    resourceType: event.resourceType,
    resourceId: event.resourceId ?? null,
    details: event.details ?? {},
    ipAddress: actor.ip ?? null,
    userAgent: actor.userAgent ?? null,
    requestId: actor.requestId,
  };
}

/**
 * Create AuditService instance
 */
export function createAuditService(deps: {
  db: AuditServiceDb;
  logger: Logger;
  timeoutMs: number;
}): AuditService {
  const { db, logger } = deps;
  const guard = createTimeoutGuard(deps.timeoutMs);

  return {
    /**
     * Log an audit event
     * Never throws; a failed write is reported in the Result and logged
     */
    async log(actor: ActorContext, event: AuditEvent): Promise<Result<void>> {
      try {
        await guard(
          'audit.insert',
          db.insertLog(buildLogEntry(actor, event))
        );
        return success(undefined);
      } catch (err) {
        logger.error(
          { err, action: event.action, resourceId: event.resourceId },
          `Failed to write audit log: ${describeError(err)}`
        );
        return failure('INTERNAL_ERROR', 'Failed to write audit log');
      }
    },

    /**
     * Query audit logs
     * Requires: system actor
     */
    async queryLogs(
      actor: ActorContext,
      params: AuditQueryParams
    ): Promise<Result<PagedResult<AuditLog>>> {
      if (actor.type !== 'system') {
        return failure('PERMISSION_DENIED', 'System actor required');
      }

      const pageError = validatePageParams(params);
      if (pageError !== null) {
        return failure('VALIDATION_ERROR', pageError);
      }

      const { page, limit, ...filters } = params;

      try {
        const { items, total } = await guard(
          'audit.query',
          db.queryLogs({ ...filters, offset: pageOffset(params), limit })
        );
        return success({
          items,
          total,
          page,
          limit,
          totalPages: countPages(total, limit),
        });
      } catch (err) {
        logger.error(
          { err },
          `Failed to query audit logs: ${describeError(err)}`
        );
        return failure('INTERNAL_ERROR', 'Failed to query audit logs');
      }
    },
  };
}
