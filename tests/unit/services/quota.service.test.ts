/**
 * QuotaLedger Unit Tests
 */

import { randomUUID } from 'node:crypto';

import { describe, it, expect, beforeEach, vi } from 'vitest';

import { BackendError } from '@/lib/errors.js';
import { createSilentLogger } from '@/lib/logger.js';
import type { QuotaLedger, QuotaLedgerDb } from '@/services/quota.service.js';
import {
  DEFAULT_RESERVATION_TTL_MS,
  createQuotaLedger,
} from '@/services/quota.service.js';

import { createMemoryBackend } from '../../helpers/memory-backend.js';
import type { MemoryBackend } from '../../helpers/memory-backend.js';
import { createTestMetadata } from '../../helpers/test-utils.js';

// ─────────────────────────────────────────────────────────────
// TEST FIXTURES
// ─────────────────────────────────────────────────────────────

const LIMIT = 1000;

describe('QuotaLedger', () => {
  let backend: MemoryBackend;
  let ledger: QuotaLedger;
  let userId: string;

  beforeEach(() => {
    backend = createMemoryBackend();
    ledger = createQuotaLedger({
      db: backend.quotaDb,
      logger: createSilentLogger(),
      timeoutMs: 1000,
    });
    userId = randomUUID();
    backend.addUser({ id: userId, storageLimit: LIMIT });
  });

  describe('check', () => {
    it('should accept a delta that lands exactly on the limit', async () => {
      const result = await ledger.check(userId, LIMIT);

      expect(result).toEqual({ success: true, data: true });
    });

    it('should reject a delta one byte over the limit', async () => {
      const result = await ledger.check(userId, LIMIT + 1);

      expect(result).toEqual({ success: true, data: false });
    });

    it('should not change usage', async () => {
      await ledger.check(userId, 10);

      expect(backend.users.get(userId)?.storageUsed).toBe(0);
    });

    it('should return USER_NOT_FOUND for an unknown user', async () => {
      const result = await ledger.check(randomUUID(), 10);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('USER_NOT_FOUND');
      }
    });

    it('should reject non-positive sizes', async () => {
      for (const size of [0, -1, 1.5, Number.NaN]) {
        const result = await ledger.check(userId, size);
        expect(result.success).toBe(false);
        if (!result.success) {
          expect(result.error.code).toBe('VALIDATION_ERROR');
        }
      }
    });
  });

  describe('reserve', () => {
    it('should add the delta and return the new usage', async () => {
      const result = await ledger.reserve(userId, 600, randomUUID());

      expect(result).toEqual({
        success: true,
        data: { storageUsed: 600, storageLimit: LIMIT },
      });
    });

    it('should allow reaching the limit exactly', async () => {
      await ledger.reserve(userId, 600, randomUUID());
      const result = await ledger.reserve(userId, 400, randomUUID());

      expect(result.success).toBe(true);
      expect(backend.users.get(userId)?.storageUsed).toBe(LIMIT);
    });

    it('should refuse to exceed the limit and leave usage unchanged', async () => {
      await ledger.reserve(userId, 600, randomUUID());
      const result = await ledger.reserve(userId, 401, randomUUID());

      expect(result).toEqual({
        success: false,
        error: {
          code: 'QUOTA_EXCEEDED',
          message: 'Storage quota exceeded',
          details: { storageUsed: 600, storageLimit: LIMIT, requested: 401 },
        },
      });
      expect(backend.users.get(userId)?.storageUsed).toBe(600);
    });

    it('should admit exactly one of two concurrent reservations that only fit alone', async () => {
      const results = await Promise.all([
        ledger.reserve(userId, 501, randomUUID()),
        ledger.reserve(userId, 501, randomUUID()),
      ]);

      expect(results.filter((r) => r.success)).toHaveLength(1);
      expect(backend.users.get(userId)?.storageUsed).toBe(501);
    });

    it('should refuse a reservation id that was already used', async () => {
      const reservationId = randomUUID();
      await ledger.reserve(userId, 100, reservationId);

      const result = await ledger.reserve(userId, 100, reservationId);

      expect(result).toEqual({
        success: false,
        error: { code: 'DUPLICATE_ID', message: 'File ID already exists' },
      });
      expect(backend.users.get(userId)?.storageUsed).toBe(100);
    });

    it('should record the reservation as pending', async () => {
      const reservationId = randomUUID();

      await ledger.reserve(userId, 250, reservationId);

      expect(backend.reservations.get(reservationId)).toMatchObject({
        userId,
        bytes: 250,
        status: 'pending',
      });
    });

    it('should return USER_NOT_FOUND for a deactivated user', async () => {
      const inactive = randomUUID();
      backend.addUser({ id: inactive, storageLimit: LIMIT, isActive: false });

      const result = await ledger.reserve(inactive, 10, randomUUID());

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('USER_NOT_FOUND');
      }
    });
  });

  describe('release', () => {
    it('should subtract the delta', async () => {
      await ledger.reserve(userId, 600, randomUUID());
      const result = await ledger.release(userId, 100);

      expect(result).toEqual({
        success: true,
        data: { storageUsed: 500, storageLimit: LIMIT },
      });
    });

    it('should clamp at zero', async () => {
      await ledger.reserve(userId, 100, randomUUID());
      const result = await ledger.release(userId, 250);

      expect(result.success).toBe(true);
      expect(backend.users.get(userId)?.storageUsed).toBe(0);
    });

    it('should return USER_NOT_FOUND for an unknown user', async () => {
      const result = await ledger.release(randomUUID(), 10);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('USER_NOT_FOUND');
      }
    });
  });

  describe('cancelReservation', () => {
    it('should give back the bytes of a pending reservation', async () => {
      const reservationId = randomUUID();
      await ledger.reserve(userId, 300, reservationId);

      const result = await ledger.cancelReservation(reservationId);

      expect(result).toEqual({ success: true, data: 'cancelled' });
      expect(backend.users.get(userId)?.storageUsed).toBe(0);
    });

    it('should only give the bytes back once', async () => {
      const reservationId = randomUUID();
      await ledger.reserve(userId, 300, reservationId);
      await ledger.reserve(userId, 200, randomUUID());

      await Promise.all([
        ledger.cancelReservation(reservationId),
        ledger.cancelReservation(reservationId),
      ]);

      expect(backend.users.get(userId)?.storageUsed).toBe(200);
    });

    it('should report a reservation whose file was recorded', async () => {
      const reservationId = randomUUID();
      await ledger.reserve(userId, 300, reservationId);
      await backend.catalogDb.insertFile({
        id: reservationId,
        userId,
        encryptedFilename: 'enc_name',
        encryptedMetadata: createTestMetadata(),
        fileSize: 300,
        storagePath: `${userId}/${reservationId}.enc`,
        uploadedAt: new Date(),
        encryptionAlgorithm: 'AES-256-GCM',
      });

      const result = await ledger.cancelReservation(reservationId);

      expect(result).toEqual({ success: true, data: 'committed' });
      expect(backend.users.get(userId)?.storageUsed).toBe(300);
    });

    it('should leave a tombstone that blocks a later reserve', async () => {
      const reservationId = randomUUID();

      const cancelled = await ledger.cancelReservation(reservationId);
      const reserved = await ledger.reserve(userId, 300, reservationId);

      expect(cancelled).toEqual({ success: true, data: 'absent' });
      expect(reserved.success).toBe(false);
      if (!reserved.success) {
        expect(reserved.error.code).toBe('DUPLICATE_ID');
      }
      expect(backend.users.get(userId)?.storageUsed).toBe(0);
    });
  });

  describe('getUsage', () => {
    it('should return used and limit', async () => {
      await ledger.reserve(userId, 42, randomUUID());

      const result = await ledger.getUsage(userId);

      expect(result).toEqual({
        success: true,
        data: { storageUsed: 42, storageLimit: LIMIT },
      });
    });
  });

  describe('reconcile', () => {
    it('should report previous and recomputed usage', async () => {
      const drifted = randomUUID();
      backend.addUser({ id: drifted, storageLimit: LIMIT, storageUsed: 77 });

      const result = await ledger.reconcile(drifted);

      expect(result).toEqual({
        success: true,
        data: { previous: 77, current: 0 },
      });
      expect(backend.users.get(drifted)?.storageUsed).toBe(0);
    });

    it('should keep the bytes of reservations still in flight', async () => {
      await ledger.reserve(userId, 400, randomUUID());

      const result = await ledger.reconcile(userId);

      expect(result).toEqual({
        success: true,
        data: { previous: 400, current: 400 },
      });
    });

    it('should cancel reservations older than the reservation TTL', async () => {
      const reservationId = randomUUID();
      await ledger.reserve(userId, 400, reservationId);

      const result = await ledger.reconcile(userId, {
        now: new Date(Date.now() + DEFAULT_RESERVATION_TTL_MS + 1000),
      });

      expect(result).toEqual({
        success: true,
        data: { previous: 400, current: 0 },
      });
      expect(backend.reservations.get(reservationId)?.status).toBe(
        'cancelled'
      );
    });

    it('should honour a configured reservation TTL', async () => {
      const shortLived = createQuotaLedger({
        db: backend.quotaDb,
        logger: createSilentLogger(),
        timeoutMs: 1000,
        reservationTtlMs: 10_000,
      });
      await shortLived.reserve(userId, 400, randomUUID());

      const result = await shortLived.reconcile(userId, {
        now: new Date(Date.now() + 20_000),
      });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.current).toBe(0);
      }
    });

    it('should return USER_NOT_FOUND for an unknown user', async () => {
      const result = await ledger.reconcile(randomUUID());

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('USER_NOT_FOUND');
      }
    });
  });

  describe('backend failures', () => {
    let db: {
      getUsage: ReturnType<typeof vi.fn>;
      reserve: ReturnType<typeof vi.fn>;
      release: ReturnType<typeof vi.fn>;
      cancelReservation: ReturnType<typeof vi.fn>;
      recalculate: ReturnType<typeof vi.fn>;
    };

    beforeEach(() => {
      db = {
        getUsage: vi.fn(),
        reserve: vi.fn(),
        release: vi.fn(),
        cancelReservation: vi.fn(),
        recalculate: vi.fn(),
      };
    });

    function ledgerOver(mockDb: QuotaLedgerDb, timeoutMs = 1000): QuotaLedger {
      return createQuotaLedger({
        db: mockDb,
        logger: createSilentLogger(),
        timeoutMs,
      });
    }

    it('should map a thrown backend error to STORAGE_BACKEND_ERROR', async () => {
      db.reserve.mockRejectedValue(
        new BackendError('quota.reserve', 'connection refused')
      );

      const result = await ledgerOver(db).reserve(userId, 10, randomUUID());

      expect(result).toEqual({
        success: false,
        error: {
          code: 'STORAGE_BACKEND_ERROR',
          message: 'Storage backend unavailable',
        },
      });
    });

    it('should map a timeout to STORAGE_BACKEND_ERROR', async () => {
      db.getUsage.mockReturnValue(new Promise(() => undefined));

      const result = await ledgerOver(db, 5).getUsage(userId);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('STORAGE_BACKEND_ERROR');
      }
    });

    it('should map a failed cancel to STORAGE_BACKEND_ERROR', async () => {
      db.cancelReservation.mockRejectedValue(new Error('ledger down'));

      const result = await ledgerOver(db).cancelReservation(randomUUID());

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('STORAGE_BACKEND_ERROR');
      }
    });

    it('should not call the backend for an invalid size', async () => {
      await ledgerOver(db).release(userId, 0);

      expect(db.release).not.toHaveBeenCalled();
    });
  });
});
