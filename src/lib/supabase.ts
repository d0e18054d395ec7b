/**
 * Supabase Client Configuration
 *
 * One service-role client per process, constructed by the entry point
 * and passed to every adapter. Row-level security is bypassed: every
 * query scopes by user_id explicitly.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

import type { AppConfig } from '../config/env.js';

/**
 * Create a Supabase admin client
 * NEVER expose this client or its key to user-facing code
 */
export function createSupabaseAdmin(
  config: Pick<AppConfig, 'supabaseUrl' | 'supabaseServiceKey'>
): SupabaseClient {
  return createClient(config.supabaseUrl, config.supabaseServiceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
  });
}
