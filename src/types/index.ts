/**
 * Core type definitions
 * This file exports all shared types used across the application
 */

export type { ErrorCode, Result, Success, Failure } from './result.js';
export { success, failure, isSuccess, isFailure } from './result.js';
export type {
  ActorContext,
  VerifiedIdentity,
  TokenVerifier,
} from './auth.js';
export { SYSTEM_ACTOR } from './auth.js';
export type { PageParams, PagedResult } from './pagination.js';
export {
  DEFAULT_PAGE,
  DEFAULT_PAGE_LIMIT,
  MAX_PAGE_LIMIT,
  validatePageParams,
  pageOffset,
  countPages,
} from './pagination.js';
export type {
  AuditActorType,
  AuditAction,
  AuditEvent,
  AuditLog,
  AuditLogEntry,
  AuditQueryParams,
} from './audit.js';
export type {
  User,
  QuotaUsage,
  ReconcileResult,
  UserProfile,
  LargestFile,
  StorageStats,
  FileStats,
  EnsureUserParams,
} from './user.js';
export type {
  EncryptedMetadata,
  FileRecord,
  NewFileRecord,
  FileSortField,
  SortOrder,
  UploadFileParams,
  ListFilesParams,
  FileListQuery,
  DownloadUrl,
  FileContent,
  DeleteConfirmation,
  PurgeSummary,
} from './file.js';
export {
  DEFAULT_ENCRYPTION_ALGORITHM,
  FILE_SORT_FIELDS,
  SORT_ORDERS,
} from './file.js';
