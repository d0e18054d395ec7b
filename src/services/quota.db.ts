/**
 * QuotaLedger Database Adapter
 * Implements QuotaLedgerDb using Supabase RPC
 *
 * reserve/release/cancel/recalculate are plpgsql functions (see
 * supabase/migrations/) so each runs under the users row lock.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import { BackendError } from '../lib/errors.js';

import type {
  CancelOutcome,
  QuotaLedgerDb,
  ReserveOutcome,
} from './quota.service.js';

const usageRowSchema = z.object({
  storage_used: z.coerce.number(),
  storage_limit: z.coerce.number(),
});

const reserveResponseSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('ok'),
    storage_used: z.coerce.number(),
    storage_limit: z.coerce.number(),
  }),
  z.object({
    status: z.literal('quota_exceeded'),
    storage_used: z.coerce.number(),
    storage_limit: z.coerce.number(),
  }),
  z.object({ status: z.literal('user_not_found') }),
  z.object({ status: z.literal('duplicate_reservation') }),
]);

const cancelResponseSchema = z.enum(['cancelled', 'committed', 'absent']);

const reconcileResponseSchema = z.object({
  previous: z.coerce.number(),
  current: z.coerce.number(),
});

/**
 * Create QuotaLedgerDb implementation using Supabase
 */
export function createQuotaLedgerDb(supabase: SupabaseClient): QuotaLedgerDb {
  return {
    async getUsage(userId: string) {
      const { data, error } = await supabase
        .from('users')
        .select('storage_used, storage_limit')
        .eq('id', userId)
        .single();

      if (error !== null) {
        if (error.code === 'PGRST116') {
          return null;
        }
        throw new BackendError('quota.getUsage', error.message);
      }

      const row = usageRowSchema.parse(data);
      return { storageUsed: row.storage_used, storageLimit: row.storage_limit };
    },

    async reserve(
      userId: string,
      deltaBytes: number,
      reservationId: string
    ): Promise<ReserveOutcome> {
      const { data, error } = await supabase.rpc('reserve_storage', {
        p_user_id: userId,
        p_delta: deltaBytes,
        p_reservation_id: reservationId,
      });

      if (error !== null) {
        throw new BackendError('quota.reserve', error.message);
      }

      const response = reserveResponseSchema.parse(data);
      switch (response.status) {
        case 'ok':
          return {
            status: 'reserved',
            usage: {
              storageUsed: response.storage_used,
              storageLimit: response.storage_limit,
            },
          };
        case 'quota_exceeded':
          return {
            status: 'quota_exceeded',
            usage: {
              storageUsed: response.storage_used,
              storageLimit: response.storage_limit,
            },
          };
        case 'user_not_found':
          return { status: 'user_not_found' };
        case 'duplicate_reservation':
          return { status: 'duplicate_reservation' };
      }
    },

    async cancelReservation(reservationId: string): Promise<CancelOutcome> {
      const { data, error } = await supabase.rpc('cancel_reservation', {
        p_reservation_id: reservationId,
      });

      if (error !== null) {
        throw new BackendError('quota.cancelReservation', error.message);
      }

      return cancelResponseSchema.parse(data);
    },

    async release(userId: string, deltaBytes: number) {
      const { data, error } = await supabase.rpc('release_storage', {
        p_user_id: userId,
        p_delta: deltaBytes,
      });

      if (error !== null) {
        throw new BackendError('quota.release', error.message);
      }

      // The function returns no row when the user does not exist
      if (data === null) {
        return null;
      }

      const row = usageRowSchema.parse(data);
      return { storageUsed: row.storage_used, storageLimit: row.storage_limit };
    },

    async recalculate(userId: string, staleBefore: Date) {
      const { data, error } = await supabase.rpc('reconcile_storage', {
        p_user_id: userId,
        p_stale_before: staleBefore.toISOString(),
      });

      if (error !== null) {
        throw new BackendError('quota.recalculate', error.message);
      }

      if (data === null) {
        return null;
      }

      return reconcileResponseSchema.parse(data);
    },
  };
}
