/**
 * FileService Implementation
 * File lifecycle orchestration over QuotaLedger, FileCatalog and ObjectStore
 *
 * SCOPE: Upload, read, list, download, delete, purge of encrypted files
 * NOT IN SCOPE: Inspecting or decrypting file contents
 *
 * Upload saga:
 *   validate → ledger.check → ledger.reserve → objectStore.put → catalog.insert
 *   The reservation is keyed by the new file id and committed by the
 *   insert. Any failure after reserve cancels it; the object is deleted
 *   unless the cancel reports the record was committed after all, or the
 *   ledger cannot say (then both stay for reconciliation).
 *
 * Hard delete saga:
 *   objectStore.delete (best-effort) → catalog.hardDelete → ledger.release
 *   Quota is released only by the caller whose hardDelete removed the row.
 *
 * GUARDRAILS:
 * - Users can only access their own files (NOT_FOUND for foreign ids)
 * - Validation and quota errors are returned before any side effect
 * - Compensation failures are ConsistencyWarnings: logged and audited,
 *   never surfaced to the caller
 * - Sagas take no abort signal; once started they run to completion
 *
 * Dependencies: FileCatalog, QuotaLedger, ObjectStore, AuditService
 */

import { randomUUID } from 'node:crypto';

import type { AppConfig } from '../config/env.js';
import {
  ObjectExistsError,
  TimeoutError,
  describeError,
} from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import { createTimeoutGuard, settleWithin } from '../lib/timeout.js';
import type {
  ActorContext,
  AuditEvent,
  DeleteConfirmation,
  DownloadUrl,
  Failure,
  FileContent,
  FileRecord,
  ListFilesParams,
  NewFileRecord,
  PagedResult,
  PurgeSummary,
  Result,
  UploadFileParams,
} from '../types/index.js';
import {
  DEFAULT_ENCRYPTION_ALGORITHM,
  success,
  failure,
} from '../types/index.js';

import type { FileCatalog } from './file.catalog.js';
import type { ObjectStore } from './file.storage.js';
import { storagePathFor } from './file.storage.js';
import type { CancelOutcome, QuotaLedger } from './quota.service.js';

/**
 * Minimal AuditService interface (subset needed by FileService)
 */
export interface FileServiceAudit {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

export type FileServiceConfig = Pick<
  AppConfig,
  | 'maxFileSizeBytes'
  | 'signedUrlTtlSeconds'
  | 'softDeleteRetentionDays'
  | 'backendTimeoutMs'
>;

export const MIN_SIGNED_URL_TTL_SECONDS = 1;
export const MAX_SIGNED_URL_TTL_SECONDS = 3600;
export const DEFAULT_PURGE_BATCH_SIZE = 100;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * FileService interface
 */
export interface FileService {
  uploadFile(
    actor: ActorContext,
    params: UploadFileParams
  ): Promise<Result<FileRecord>>;
  listFiles(
    actor: ActorContext,
    params: ListFilesParams
  ): Promise<Result<PagedResult<FileRecord>>>;
  getFileMetadata(
    actor: ActorContext,
    fileId: string
  ): Promise<Result<FileRecord>>;
  getDownloadUrl(
    actor: ActorContext,
    fileId: string,
    ttlSeconds?: number
  ): Promise<Result<DownloadUrl>>;
  downloadFileContent(
    actor: ActorContext,
    fileId: string
  ): Promise<Result<FileContent>>;
  deleteFile(
    actor: ActorContext,
    fileId: string,
    options: { permanent: boolean }
  ): Promise<Result<DeleteConfirmation>>;
  purgeExpiredFiles(
    actor: ActorContext,
    options?: { now?: Date; batchSize?: number }
  ): Promise<Result<PurgeSummary>>;
}

// ─────────────────────────────────────────────────────────────
// HELPER FUNCTIONS
// ─────────────────────────────────────────────────────────────

/**
 * User id of an authenticated user actor, or null
 */
function userIdOf(actor: ActorContext): string | null {
  if (actor.type !== 'user' || actor.userId === undefined) {
    return null;
  }
  return actor.userId;
}

function unauthorized(): Failure {
  return failure('UNAUTHORIZED', 'Authentication required');
}

/**
 * Validate upload input before any side effect
 */
function validateUpload(
  params: UploadFileParams,
  maxFileSizeBytes: number
): Failure | null {
  if (params.encryptedFilename.trim() === '') {
    return failure('VALIDATION_ERROR', 'Encrypted filename is required');
  }
  if (!Number.isSafeInteger(params.declaredSize) || params.declaredSize <= 0) {
    return failure('VALIDATION_ERROR', 'File size must be a positive integer');
  }
  if (params.bytes.byteLength === 0) {
    return failure('VALIDATION_ERROR', 'File is empty');
  }
  if (
    params.declaredSize > maxFileSizeBytes ||
    params.bytes.byteLength > maxFileSizeBytes
  ) {
    return failure('FILE_TOO_LARGE', 'File exceeds maximum size', {
      maxFileSize: maxFileSizeBytes,
    });
  }
  return null;
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

/**
 * Create FileService instance
 */
export function createFileService(deps: {
  catalog: FileCatalog;
  ledger: QuotaLedger;
  objectStore: ObjectStore;
  auditService: FileServiceAudit;
  logger: Logger;
  config: FileServiceConfig;
  generateId?: () => string;
}): FileService {
  const { catalog, ledger, objectStore, auditService, logger, config } = deps;
  const generateId = deps.generateId ?? randomUUID;
  const guard = createTimeoutGuard(config.backendTimeoutMs);

  /**
   * Record a compensation that could not be completed
   */
  async function consistencyWarning(
    actor: ActorContext,
    message: string,
    details: { storagePath: string } & Record<string, unknown>
  ): Promise<void> {
    logger.warn({ kind: 'consistency_warning', ...details }, message);
    await auditService.log(actor, {
      action: 'storage:consistency_warning',
      resourceType: 'object',
      resourceId: details.storagePath,
      details: { message, ...details },
    });
  }

  /**
   * Remove an object written by an upload that will not be recorded
   */
  async function removeUploadedObject(
    actor: ActorContext,
    userId: string,
    fileId: string,
    storagePath: string
  ): Promise<void> {
    try {
      await guard('objectStore.delete', objectStore.delete(storagePath));
    } catch (err) {
      await consistencyWarning(actor, 'Orphaned object after failed upload', {
        storagePath,
        userId,
        fileId,
        error: describeError(err),
      });
    }
  }

  /**
   * Settle an upload's reservation; null when the ledger could not be reached
   * and the reservation is left for reconciliation
   */
  async function cancelUploadReservation(
    actor: ActorContext,
    userId: string,
    fileId: string,
    storagePath: string
  ): Promise<CancelOutcome | null> {
    const cancelled = await ledger.cancelReservation(fileId);
    if (!cancelled.success) {
      await consistencyWarning(
        actor,
        'Reservation not cancelled after failed upload',
        { storagePath, userId, fileId, error: cancelled.error.code }
      );
      return null;
    }
    return cancelled.data;
  }

  /**
   * Audit and return a recorded upload
   */
  async function completeUpload(
    actor: ActorContext,
    record: FileRecord
  ): Promise<Result<FileRecord>> {
    await auditService.log(actor, {
      action: 'file:uploaded',
      resourceType: 'file',
      resourceId: record.id,
      details: { fileSize: record.fileSize, storagePath: record.storagePath },
    });

    logger.info(
      { userId: record.userId, fileId: record.id, fileSize: record.fileSize },
      'File uploaded'
    );

    return success(record);
  }

  /**
   * Remove object and row, then release the removed row's size
   */
  async function hardDeleteRecord(
    actor: ActorContext,
    record: FileRecord
  ): Promise<Result<DeleteConfirmation>> {
    let objectRemoved = true;
    try {
      await guard('objectStore.delete', objectStore.delete(record.storagePath));
    } catch (err) {
      objectRemoved = false;
      await consistencyWarning(actor, 'Object delete failed during hard delete', {
        storagePath: record.storagePath,
        userId: record.userId,
        fileId: record.id,
        error: describeError(err),
      });
    }

    const removed = await catalog.hardDelete(record.userId, record.id);
    if (!removed.success) {
      if (objectRemoved && removed.error.code === 'STORAGE_BACKEND_ERROR') {
        await consistencyWarning(actor, 'File record survives its object', {
          storagePath: record.storagePath,
          userId: record.userId,
          fileId: record.id,
        });
      }
      return removed;
    }

    const released = await ledger.release(
      removed.data.userId,
      removed.data.fileSize
    );
    if (!released.success) {
      await consistencyWarning(actor, 'Quota not released after hard delete', {
        storagePath: record.storagePath,
        userId: record.userId,
        fileId: record.id,
        fileSize: removed.data.fileSize,
        error: released.error.code,
      });
    }

    await auditService.log(actor, {
      action: 'file:hard_deleted',
      resourceType: 'file',
      resourceId: record.id,
      details: { fileSize: removed.data.fileSize },
    });

    logger.info(
      { userId: record.userId, fileId: record.id },
      'File permanently deleted'
    );

    return success({
      fileId: record.id,
      deletedAt: new Date(),
      permanent: true,
    });
  }

  return {
    /**
     * Upload an encrypted file
     */
    async uploadFile(
      actor: ActorContext,
      params: UploadFileParams
    ): Promise<Result<FileRecord>> {
      const userId = userIdOf(actor);
      if (userId === null) {
        return unauthorized();
      }

      const invalid = validateUpload(params, config.maxFileSizeBytes);
      if (invalid !== null) {
        return invalid;
      }

      const fileSize = params.declaredSize;

      // Early rejection; the reservation below is the authoritative check
      const fits = await ledger.check(userId, fileSize);
      if (!fits.success) {
        return fits;
      }
      if (!fits.data) {
        return failure('QUOTA_EXCEEDED', 'Storage quota exceeded', {
          requested: fileSize,
        });
      }

      const fileId = generateId();
      const storagePath = storagePathFor(userId, fileId);

      const reserved = await ledger.reserve(userId, fileSize, fileId);
      if (!reserved.success) {
        // A reserve that timed out may still land; cancelling settles it
        if (reserved.error.code === 'STORAGE_BACKEND_ERROR') {
          await cancelUploadReservation(actor, userId, fileId, storagePath);
        }
        return reserved;
      }

      const put = objectStore.put(
        storagePath,
        params.bytes,
        params.contentType
      );
      try {
        await guard('objectStore.put', put);
      } catch (err) {
        if (err instanceof ObjectExistsError) {
          // The object belongs to someone else's upload; leave it alone
          await cancelUploadReservation(actor, userId, fileId, storagePath);
          return failure('DUPLICATE_ID', 'File ID already exists');
        }

        logger.error(
          { err, userId, fileId },
          `Object upload failed: ${describeError(err)}`
        );
        if (err instanceof TimeoutError) {
          const outcome = await settleWithin(put, config.backendTimeoutMs);
          if (outcome === 'pending') {
            await consistencyWarning(actor, 'Object write outcome unknown', {
              storagePath,
              userId,
              fileId,
            });
          }
        }
        await removeUploadedObject(actor, userId, fileId, storagePath);
        await cancelUploadReservation(actor, userId, fileId, storagePath);
        return failure('STORAGE_BACKEND_ERROR', 'Storage backend unavailable');
      }

      const newRecord: NewFileRecord = {
        id: fileId,
        userId,
        encryptedFilename: params.encryptedFilename,
        encryptedMetadata: params.encryptedMetadata,
        fileSize,
        storagePath,
        uploadedAt: new Date(),
        encryptionAlgorithm: DEFAULT_ENCRYPTION_ALGORITHM,
      };

      const inserted = await catalog.insert(newRecord);
      if (inserted.success) {
        return completeUpload(actor, inserted.data);
      }

      // The insert may have committed without answering; the reservation
      // tells us which
      const settled = await cancelUploadReservation(
        actor,
        userId,
        fileId,
        storagePath
      );
      if (settled === 'committed') {
        return completeUpload(actor, {
          ...newRecord,
          lastAccessed: null,
          isDeleted: false,
          deletedAt: null,
        });
      }
      if (settled !== null) {
        await removeUploadedObject(actor, userId, fileId, storagePath);
      }
      return inserted;
    },

    /**
     * List the actor's live files
     */
    async listFiles(
      actor: ActorContext,
      params: ListFilesParams
    ): Promise<Result<PagedResult<FileRecord>>> {
      const userId = userIdOf(actor);
      if (userId === null) {
        return unauthorized();
      }
      return catalog.list(userId, params);
    },

    async getFileMetadata(
      actor: ActorContext,
      fileId: string
    ): Promise<Result<FileRecord>> {
      const userId = userIdOf(actor);
      if (userId === null) {
        return unauthorized();
      }
      return catalog.get(userId, fileId);
    },

    /**
     * Signed, time-limited URL for the ciphertext
     */
    async getDownloadUrl(
      actor: ActorContext,
      fileId: string,
      ttlSeconds: number = config.signedUrlTtlSeconds
    ): Promise<Result<DownloadUrl>> {
      const userId = userIdOf(actor);
      if (userId === null) {
        return unauthorized();
      }

      if (
        !Number.isInteger(ttlSeconds) ||
        ttlSeconds < MIN_SIGNED_URL_TTL_SECONDS ||
        ttlSeconds > MAX_SIGNED_URL_TTL_SECONDS
      ) {
        return failure(
          'VALIDATION_ERROR',
          `Expiry must be between ${MIN_SIGNED_URL_TTL_SECONDS} and ${MAX_SIGNED_URL_TTL_SECONDS} seconds`
        );
      }

      const record = await catalog.get(userId, fileId);
      if (!record.success) {
        return record;
      }

      try {
        const url = await guard(
          'objectStore.sign',
          objectStore.sign(record.data.storagePath, ttlSeconds)
        );
        return success({ url, expiresIn: ttlSeconds });
      } catch (err) {
        logger.error(
          { err, userId, fileId },
          `Failed to sign download URL: ${describeError(err)}`
        );
        return failure('STORAGE_BACKEND_ERROR', 'Storage backend unavailable');
      }
    },

    /**
     * Raw ciphertext of a live file
     */
    async downloadFileContent(
      actor: ActorContext,
      fileId: string
    ): Promise<Result<FileContent>> {
      const userId = userIdOf(actor);
      if (userId === null) {
        return unauthorized();
      }

      const record = await catalog.get(userId, fileId);
      if (!record.success) {
        return record;
      }

      let bytes: Uint8Array | null;
      try {
        bytes = await guard(
          'objectStore.get',
          objectStore.get(record.data.storagePath)
        );
      } catch (err) {
        logger.error(
          { err, userId, fileId },
          `Object download failed: ${describeError(err)}`
        );
        return failure('STORAGE_BACKEND_ERROR', 'Storage backend unavailable');
      }

      if (bytes === null) {
        await consistencyWarning(actor, 'File record has no object', {
          storagePath: record.data.storagePath,
          userId,
          fileId,
        });
        return failure('NOT_FOUND', 'File not found');
      }

      return success({ record: record.data, bytes });
    },

    /**
     * Soft delete a live file; hard delete when permanent or already
     * soft-deleted
     */
    async deleteFile(
      actor: ActorContext,
      fileId: string,
      options: { permanent: boolean }
    ): Promise<Result<DeleteConfirmation>> {
      const userId = userIdOf(actor);
      if (userId === null) {
        return unauthorized();
      }

      const existing = await catalog.getIncludingDeleted(userId, fileId);
      if (!existing.success) {
        return existing;
      }

      if (options.permanent || existing.data.isDeleted) {
        return hardDeleteRecord(actor, existing.data);
      }

      const deleted = await catalog.softDelete(userId, fileId);
      if (!deleted.success) {
        return deleted;
      }

      await auditService.log(actor, {
        action: 'file:soft_deleted',
        resourceType: 'file',
        resourceId: fileId,
      });

      return success({
        fileId,
        deletedAt: deleted.data.deletedAt ?? new Date(),
        permanent: false,
      });
    },

    /**
     * Hard delete soft-deleted files past the retention period
     * System actor only
     */
    async purgeExpiredFiles(
      actor: ActorContext,
      options: { now?: Date; batchSize?: number } = {}
    ): Promise<Result<PurgeSummary>> {
      if (actor.type !== 'system') {
        return failure('PERMISSION_DENIED', 'System actor required');
      }

      const now = options.now ?? new Date();
      const batchSize = options.batchSize ?? DEFAULT_PURGE_BATCH_SIZE;
      const cutoff = new Date(
        now.getTime() - config.softDeleteRetentionDays * DAY_MS
      );
      const summary: PurgeSummary = { scanned: 0, purged: 0, failed: 0 };

      for (;;) {
        const batch = await catalog.listExpired(cutoff, batchSize);
        if (!batch.success) {
          if (summary.scanned === 0) {
            return batch;
          }
          break;
        }

        let purgedInBatch = 0;
        for (const record of batch.data) {
          summary.scanned += 1;
          const result = await hardDeleteRecord(actor, record);
          if (result.success) {
            purgedInBatch += 1;
          } else {
            summary.failed += 1;
          }
        }
        summary.purged += purgedInBatch;

        // A batch with no progress would be returned again unchanged
        if (batch.data.length < batchSize || purgedInBatch === 0) {
          break;
        }
      }

      if (summary.scanned > 0) {
        logger.info({ ...summary, cutoff }, 'Purged expired files');
      }

      return success(summary);
    },
  };
}
