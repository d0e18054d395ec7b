/**
 * UserService Database Adapter
 * Implements UserServiceDb interface using Supabase
 *
 * SCOPE: users table (identity anchor, quota columns, active flag)
 * NOT IN SCOPE: storage_used mutation (owned by the quota ledger)
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import { BackendError, DuplicateIdError } from '../lib/errors.js';
import type { User } from '../types/index.js';

import type { UserServiceDb } from './user.service.js';

const USER_COLUMNS =
  'id, email, storage_used, storage_limit, is_active, created_at, updated_at';

/**
 * Database row schema
 */
const userRowSchema = z.object({
  id: z.string(),
  email: z.string(),
  storage_used: z.coerce.number(),
  storage_limit: z.coerce.number(),
  is_active: z.boolean(),
  created_at: z.string(),
  updated_at: z.string(),
});

type UserRow = z.infer<typeof userRowSchema>;

/**
 * Map database row to User entity
 */
function mapRowToUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    storageUsed: row.storage_used,
    storageLimit: row.storage_limit,
    isActive: row.is_active,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

/**
 * Create UserServiceDb implementation using Supabase
 */
export function createUserServiceDb(supabase: SupabaseClient): UserServiceDb {
  return {
    /**
     * Get user by ID
     */
    async getUser(userId: string): Promise<User | null> {
      const { data, error } = await supabase
        .from('users')
        .select(USER_COLUMNS)
        .eq('id', userId)
        .single();

      if (error !== null) {
        if (error.code === 'PGRST116') {
          return null; // Not found
        }
        throw new BackendError('user.get', error.message, { cause: error });
      }

      return mapRowToUser(userRowSchema.parse(data));
    },

    /**
     * Create a user with storage_used = 0
     */
    async createUser(params: {
      id: string;
      email: string;
      storageLimit: number;
    }): Promise<User> {
      const { data, error } = await supabase
        .from('users')
        .insert({
          id: params.id,
          email: params.email,
          storage_used: 0,
          storage_limit: params.storageLimit,
          is_active: true,
        })
        .select(USER_COLUMNS)
        .single();

      if (error !== null) {
        if (error.code === '23505') {
          throw new DuplicateIdError('user.create', params.id);
        }
        throw new BackendError('user.create', error.message, { cause: error });
      }

      return mapRowToUser(userRowSchema.parse(data));
    },

    /**
     * Update the active flag; null when the user does not exist
     */
    async setUserActive(
      userId: string,
      isActive: boolean
    ): Promise<User | null> {
      const { data, error } = await supabase
        .from('users')
        .update({ is_active: isActive, updated_at: new Date().toISOString() })
        .eq('id', userId)
        .select(USER_COLUMNS)
        .maybeSingle();

      if (error !== null) {
        throw new BackendError('user.setActive', error.message, {
          cause: error,
        });
      }

      return data !== null ? mapRowToUser(userRowSchema.parse(data)) : null;
    },
  };
}
