/**
 * Audit Types
 * Types for the AuditService
 */

import type { PageParams } from './pagination.js';

/**
 * Actor types for audit logging
 */
export type AuditActorType = 'user' | 'system' | 'anonymous';

/**
 * Known audit actions
 */
export type AuditAction =
  | 'file:uploaded'
  | 'file:soft_deleted'
  | 'file:hard_deleted'
  | 'user:provisioned'
  | 'user:deactivated'
  | 'storage:consistency_warning'
  | 'storage:reconciled';

/**
 * Event to be logged to the audit system
 * Used as input to AuditService.log()
 */
export interface AuditEvent {
  action: AuditAction;
  resourceType: 'file' | 'user' | 'object';
  resourceId?: string;
  details?: Record<string, unknown>;
}

/**
 * Full audit log record (from database)
 */
export interface AuditLog {
  id: string;
  timestamp: Date;
  actorId: string | null; // NULL for system actions
  actorType: AuditActorType;
  action: string;
  resourceType: string;
  resourceId: string | null;
  details: Record<string, unknown>;
  ipAddress: string | null;
  userAgent: string | null;
  requestId: string | null;
}

/**
 * Row written by AuditService.log()
 */
export interface AuditLogEntry {
  actorId: string | null;
  actorType: AuditActorType;
  action: AuditAction;
  resourceType: string;
  resourceId: string | null;
  details: Record<string, unknown>;
  ipAddress: string | null;
  userAgent: string | null;
  requestId: string | null;
}

/**
 * Parameters for querying audit logs
 */
export interface AuditQueryParams extends PageParams {
  action?: AuditAction;
  resourceType?: string;
  resourceId?: string;
  since?: Date;
}
