/**
 * AuditService Database Adapter
 * Implements AuditServiceDb interface using Supabase
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import { BackendError } from '../lib/errors.js';
import type { AuditLog, AuditLogEntry } from '../types/index.js';

import type { AuditServiceDb } from './audit.service.js';

/**
 * Database row schema
 */
const auditLogRowSchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  actor_id: z.string().nullable(),
  actor_type: z.enum(['user', 'system', 'anonymous']),
  action: z.string(),
  resource_type: z.string(),
  resource_id: z.string().nullable(),
  details: z.record(z.unknown()),
  ip_address: z.string().nullable(),
  user_agent: z.string().nullable(),
  request_id: z.string().nullable(),
});

type AuditLogRow = z.infer<typeof auditLogRowSchema>;

/**
 * Map database row to AuditLog entity
 */
function mapRowToAuditLog(row: AuditLogRow): AuditLog {
  return {
    id: row.id,
    timestamp: new Date(row.timestamp),
    actorId: row.actor_id,
    actorType: row.actor_type,
    action: row.action,
    resourceType: row.resource_type,
    resourceId: row.resource_id,
    details: row.details,
    ipAddress: row.ip_address,
    userAgent: row.user_agent,
    requestId: row.request_id,
  };
}

/**
 * Create AuditServiceDb implementation using Supabase
 */
export function createAuditServiceDb(supabase: SupabaseClient): AuditServiceDb {
  return {
    /**
     * Insert a single audit log entry
     */
    async insertLog(entry: AuditLogEntry): Promise<{ id: string }> {
      const { data, error } = await supabase
        .from('audit_logs')
        .insert({
          actor_id: entry.actorId,
          actor_type: entry.actorType,
          action: entry.action,
          resource_type: entry.resourceType,
          resource_id: entry.resourceId,
          details: entry.details,
          ip_address: entry.ipAddress,
          user_agent: entry.userAgent,
          request_id: entry.requestId,
        })
        .select('id')
        .single();

      if (error !== null) {
        throw new BackendError('audit.insert', error.message, { cause: error });
      }

      return z.object({ id: z.string() }).parse(data);
    },

    /**
     * Query audit logs with filters, newest first
     */
    async queryLogs(params) {
      let query = supabase
        .from('audit_logs')
        .select('*', { count: 'exact' })
        .order('timestamp', { ascending: false });

      if (params.action !== undefined) {
        query = query.eq('action', params.action);
      }
      if (params.resourceType !== undefined) {
        query = query.eq('resource_type', params.resourceType);
      }
      if (params.resourceId !== undefined) {
        query = query.eq('resource_id', params.resourceId);
      }
      if (params.since !== undefined) {
        query = query.gte('timestamp', params.since.toISOString());
      }

      const { data, error, count } = await query.range(
        params.offset,
        params.offset + params.limit - 1
      );

      if (error !== null) {
        throw new BackendError('audit.query', error.message, { cause: error });
      }

      return {
        items: z.array(auditLogRowSchema).parse(data).map(mapRowToAuditLog),
        total: count ?? 0,
      };
    },
  };
}
