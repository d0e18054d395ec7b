/**
 * Backend Health Checks
 * Reachability of the metadata store and the ciphertext bucket
 *
 * Checks throw BackendError when the backend cannot be asked at all;
 * the health route turns that into an 'error' status.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import { BackendError } from '../lib/errors.js';

export type DatabaseStatus = 'connected' | 'error';
export type StorageStatus = 'connected' | 'bucket_not_found' | 'error';

export interface HealthChecks {
  database(): Promise<DatabaseStatus>;
  storage(): Promise<StorageStatus>;
}

/**
 * Create health checks against Supabase
 */
export function createSupabaseHealthChecks(
  supabase: SupabaseClient,
  bucket: string
): HealthChecks {
  return {
    /**
     * Count users without fetching any row
     */
    async database() {
      const { count, error } = await supabase
        .from('users')
        .select('id', { count: 'exact', head: true });

      if (error !== null) {
        throw new BackendError('health.database', error.message);
      }

      return count === null ? 'error' : 'connected';
    },

    /**
     * The configured bucket must exist
     */
    async storage() {
      const { data, error } = await supabase.storage.listBuckets();

      if (error !== null) {
        throw new BackendError('health.storage', error.message, {
          cause: error,
        });
      }

      return data.some((entry) => entry.name === bucket)
        ? 'connected'
        : 'bucket_not_found';
    },
  };
}
