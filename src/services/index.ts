/**
 * Service Layer Exports
 *
 * Services are the ONLY gateway to the database and the object store.
 * All business logic lives here.
 */

// AuditService
export type { AuditService, AuditServiceDb } from './audit.service.js';
export { createAuditService } from './audit.service.js';
export { createAuditServiceDb } from './audit.db.js';

// QuotaLedger
export type {
  CancelOutcome,
  QuotaLedger,
  QuotaLedgerDb,
  ReserveOutcome,
} from './quota.service.js';
export {
  DEFAULT_RESERVATION_TTL_MS,
  createQuotaLedger,
} from './quota.service.js';
export { createQuotaLedgerDb } from './quota.db.js';

// FileCatalog
export type { FileCatalog, FileCatalogDb } from './file.catalog.js';
export { createFileCatalog, validateFileId } from './file.catalog.js';
export { createFileCatalogDb } from './file.db.js';

// ObjectStore
export type { ObjectStore } from './file.storage.js';
export { createSupabaseObjectStore, storagePathFor } from './file.storage.js';

// FileService
export type {
  FileService,
  FileServiceAudit,
  FileServiceConfig,
} from './file.service.js';
export {
  createFileService,
  MIN_SIGNED_URL_TTL_SECONDS,
  MAX_SIGNED_URL_TTL_SECONDS,
} from './file.service.js';

// UserService
export type {
  UserService,
  UserServiceDb,
  UserServiceCatalog,
  UserServiceAudit,
} from './user.service.js';
export { createUserService, usagePercentage } from './user.service.js';
export { createUserServiceDb } from './user.db.js';

// Health checks
export type {
  DatabaseStatus,
  HealthChecks,
  StorageStatus,
} from './health.checks.js';
export { createSupabaseHealthChecks } from './health.checks.js';
