/**
 * QuotaLedger Implementation
 *
 * SCOPE: Per-user storage_used accounting against storage_limit
 * NOT IN SCOPE: Object storage, file records
 *
 * GUARDRAILS:
 * - reserve() is a single atomic conditional update in the backend;
 *   concurrent reservations for one user are linearizable
 * - Each reservation is recorded as pending under the file id it pays
 *   for. Inserting that file's record commits it; cancelReservation()
 *   gives the bytes back. Exactly one of the two wins.
 * - Cancelling an unknown id leaves a tombstone, so a reserve that
 *   lands after its caller gave up changes nothing
 * - release() clamps at zero instead of going negative
 * - check() never mutates; it only exists for early rejection
 * - Every backend call is bounded by a timeout
 *
 * Dependencies: QuotaLedgerDb
 */

import { describeError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import { createTimeoutGuard } from '../lib/timeout.js';
import type {
  QuotaUsage,
  ReconcileResult,
  Result,
} from '../types/index.js';
import { success, failure } from '../types/index.js';

/**
 * Outcome of the atomic reserve statement
 */
export type ReserveOutcome =
  | { status: 'reserved'; usage: QuotaUsage }
  | { status: 'quota_exceeded'; usage: QuotaUsage }
  | { status: 'user_not_found' }
  | { status: 'duplicate_reservation' };

/**
 * What cancelling a reservation found:
 * - cancelled: it was pending; its bytes were given back
 * - committed: the file record was inserted; the bytes stay charged
 * - absent: nothing was reserved under the id; none can be now
 */
export type CancelOutcome = 'cancelled' | 'committed' | 'absent';

/** Pending reservations older than this are treated as abandoned */
export const DEFAULT_RESERVATION_TTL_MS = 60 * 60 * 1000;

/**
 * Database abstraction interface for QuotaLedger
 * Implementations MUST make reserve/release/cancel/recalculate atomic per
 * user row
 */
export interface QuotaLedgerDb {
  getUsage: (userId: string) => Promise<QuotaUsage | null>;
  reserve: (
    userId: string,
    deltaBytes: number,
    reservationId: string
  ) => Promise<ReserveOutcome>;
  release: (userId: string, deltaBytes: number) => Promise<QuotaUsage | null>;
  cancelReservation: (reservationId: string) => Promise<CancelOutcome>;
  /**
   * storage_used := recorded file bytes + pending reservations created at
   * or after `staleBefore`; older pending reservations are cancelled
   */
  recalculate: (
    userId: string,
    staleBefore: Date
  ) => Promise<ReconcileResult | null>;
}

/**
 * QuotaLedger interface
 */
export interface QuotaLedger {
  check(userId: string, deltaBytes: number): Promise<Result<boolean>>;
  reserve(
    userId: string,
    deltaBytes: number,
    reservationId: string
  ): Promise<Result<QuotaUsage>>;
  release(userId: string, deltaBytes: number): Promise<Result<QuotaUsage>>;
  cancelReservation(reservationId: string): Promise<Result<CancelOutcome>>;
  getUsage(userId: string): Promise<Result<QuotaUsage>>;
  reconcile(
    userId: string,
    options?: { now?: Date }
  ): Promise<Result<ReconcileResult>>;
}

function isPositiveInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0;
}

/**
 * Create QuotaLedger instance
 */
export function createQuotaLedger(deps: {
  db: QuotaLedgerDb;
  logger: Logger;
  timeoutMs: number;
  reservationTtlMs?: number;
}): QuotaLedger {
  const { db, logger } = deps;
  const guard = createTimeoutGuard(deps.timeoutMs);
  const reservationTtlMs = deps.reservationTtlMs ?? DEFAULT_RESERVATION_TTL_MS;

  function backendFailure(operation: string, subject: string, err: unknown) {
    logger.error(
      { err, operation, subject },
      `Quota ledger backend failure: ${describeError(err)}`
    );
    return failure('STORAGE_BACKEND_ERROR', 'Storage backend unavailable');
  }

  return {
    /**
     * Non-mutating pre-check: would `deltaBytes` more still fit?
     */
    async check(userId: string, deltaBytes: number): Promise<Result<boolean>> {
      if (!isPositiveInteger(deltaBytes)) {
        return failure('VALIDATION_ERROR', 'Size must be a positive integer');
      }

      try {
        const usage = await guard('quota.getUsage', db.getUsage(userId));
        if (usage === null) {
          return failure('USER_NOT_FOUND', 'User not found');
        }
        return success(usage.storageUsed + deltaBytes <= usage.storageLimit);
      } catch (err) {
        return backendFailure('quota.check', userId, err);
      }
    },

    /**
     * Atomically add `deltaBytes` to storage_used if the result stays
     * within storage_limit, recorded as pending under `reservationId`
     *
     * On STORAGE_BACKEND_ERROR the reservation may still land; callers
     * cancel it to settle the outcome.
     */
    async reserve(
      userId: string,
      deltaBytes: number,
      reservationId: string
    ): Promise<Result<QuotaUsage>> {
      if (!isPositiveInteger(deltaBytes)) {
        return failure('VALIDATION_ERROR', 'Size must be a positive integer');
      }

      let outcome: ReserveOutcome;
      try {
        outcome = await guard(
          'quota.reserve',
          db.reserve(userId, deltaBytes, reservationId)
        );
      } catch (err) {
        return backendFailure('quota.reserve', userId, err);
      }

      switch (outcome.status) {
        case 'reserved':
          logger.debug(
            { userId, deltaBytes, storageUsed: outcome.usage.storageUsed },
            'Quota reserved'
          );
          return success(outcome.usage);
        case 'quota_exceeded':
          return failure('QUOTA_EXCEEDED', 'Storage quota exceeded', {
            storageUsed: outcome.usage.storageUsed,
            storageLimit: outcome.usage.storageLimit,
            requested: deltaBytes,
          });
        case 'user_not_found':
          return failure('USER_NOT_FOUND', 'User not found');
        case 'duplicate_reservation':
          return failure('DUPLICATE_ID', 'File ID already exists');
      }
    },

    /**
     * Give back a pending reservation, or learn that its file was recorded
     */
    async cancelReservation(
      reservationId: string
    ): Promise<Result<CancelOutcome>> {
      try {
        const outcome = await guard(
          'quota.cancelReservation',
          db.cancelReservation(reservationId)
        );
        logger.debug({ reservationId, outcome }, 'Reservation cancelled');
        return success(outcome);
      } catch (err) {
        return backendFailure('quota.cancelReservation', reservationId, err);
      }
    },

    /**
     * Subtract `deltaBytes` from storage_used, clamped at zero
     */
    async release(
      userId: string,
      deltaBytes: number
    ): Promise<Result<QuotaUsage>> {
      if (!isPositiveInteger(deltaBytes)) {
        return failure('VALIDATION_ERROR', 'Size must be a positive integer');
      }

      try {
        const usage = await guard(
          'quota.release',
          db.release(userId, deltaBytes)
        );
        if (usage === null) {
          return failure('USER_NOT_FOUND', 'User not found');
        }
        logger.debug(
          { userId, deltaBytes, storageUsed: usage.storageUsed },
          'Quota released'
        );
        return success(usage);
      } catch (err) {
        return backendFailure('quota.release', userId, err);
      }
    },

    /**
     * Current usage and limit
     */
    async getUsage(userId: string): Promise<Result<QuotaUsage>> {
      try {
        const usage = await guard('quota.getUsage', db.getUsage(userId));
        if (usage === null) {
          return failure('USER_NOT_FOUND', 'User not found');
        }
        return success(usage);
      } catch (err) {
        return backendFailure('quota.getUsage', userId, err);
      }
    },

    /**
     * Recompute storage_used from the user's file records (live and
     * soft-deleted; both are billed) plus uploads still in flight
     */
    async reconcile(
      userId: string,
      options: { now?: Date } = {}
    ): Promise<Result<ReconcileResult>> {
      const now = options.now ?? new Date();
      const staleBefore = new Date(now.getTime() - reservationTtlMs);

      try {
        const result = await guard(
          'quota.recalculate',
          db.recalculate(userId, staleBefore)
        );
        if (result === null) {
          return failure('USER_NOT_FOUND', 'User not found');
        }
        if (result.previous !== result.current) {
          logger.warn(
            { kind: 'quota_drift', userId, ...result },
            'Accounted storage drifted from stored files'
          );
        }
        return success(result);
      } catch (err) {
        return backendFailure('quota.reconcile', userId, err);
      }
    },
  };
}
