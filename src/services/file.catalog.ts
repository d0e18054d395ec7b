/**
 * FileCatalog Implementation
 *
 * SCOPE: File records (metadata rows), soft/hard delete, listing
 * NOT IN SCOPE: Object bytes, quota accounting
 *
 * GUARDRAILS:
 * - Every access is scoped by user_id; a foreign id looks exactly like a
 *   missing one
 * - File ids are validated as UUIDs before any query
 * - Sort field and order come from an allow-list, never from raw input
 * - hardDelete() returns the removed row only to the caller that removed it
 *
 * Dependencies: FileCatalogDb
 */

import { z } from 'zod';

import {
  DuplicateIdError,
  UserNotFoundError,
  describeError,
} from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import { createTimeoutGuard } from '../lib/timeout.js';
import type {
  FileRecord,
  FileListQuery,
  FileStats,
  ListFilesParams,
  NewFileRecord,
  PagedResult,
  Result,
  Failure,
} from '../types/index.js';
import {
  FILE_SORT_FIELDS,
  SORT_ORDERS,
  success,
  failure,
  validatePageParams,
  pageOffset,
  countPages,
} from '../types/index.js';

/**
 * Database abstraction interface for FileCatalog
 * Adapters throw BackendError (or a subclass) on failure
 */
export interface FileCatalogDb {
  insertFile: (record: NewFileRecord) => Promise<FileRecord>;
  listFiles: (
    userId: string,
    query: FileListQuery
  ) => Promise<{ items: FileRecord[]; total: number }>;
  getFile: (
    userId: string,
    fileId: string,
    options: { includeDeleted: boolean }
  ) => Promise<FileRecord | null>;
  touchFile: (userId: string, fileId: string, at: Date) => Promise<void>;
  softDeleteFile: (
    userId: string,
    fileId: string,
    at: Date
  ) => Promise<FileRecord | null>;
  hardDeleteFile: (userId: string, fileId: string) => Promise<FileRecord | null>;
  listExpiredFiles: (cutoff: Date, limit: number) => Promise<FileRecord[]>;
  getFileStats: (userId: string) => Promise<FileStats>;
}

/**
 * FileCatalog interface
 */
export interface FileCatalog {
  insert(record: NewFileRecord): Promise<Result<FileRecord>>;
  list(
    userId: string,
    params: ListFilesParams
  ): Promise<Result<PagedResult<FileRecord>>>;
  get(userId: string, fileId: string): Promise<Result<FileRecord>>;
  getIncludingDeleted(
    userId: string,
    fileId: string
  ): Promise<Result<FileRecord>>;
  softDelete(userId: string, fileId: string): Promise<Result<FileRecord>>;
  hardDelete(userId: string, fileId: string): Promise<Result<FileRecord>>;
  listExpired(cutoff: Date, limit: number): Promise<Result<FileRecord[]>>;
  getStats(userId: string): Promise<Result<FileStats>>;
}

const fileIdSchema = z.string().uuid();
const sortFieldSchema = z.enum(FILE_SORT_FIELDS);
const sortOrderSchema = z.enum(SORT_ORDERS);

/**
 * Returns an error message when `fileId` is not a well-formed UUID
 */
export function validateFileId(fileId: string): string | null {
  return fileIdSchema.safeParse(fileId).success ? null : 'Invalid file ID';
}

/**
 * Create FileCatalog instance
 */
export function createFileCatalog(deps: {
  db: FileCatalogDb;
  logger: Logger;
  timeoutMs: number;
}): FileCatalog {
  const { db, logger } = deps;
  const guard = createTimeoutGuard(deps.timeoutMs);

  function backendFailure(operation: string, err: unknown): Failure {
    if (err instanceof DuplicateIdError) {
      return failure('DUPLICATE_ID', 'File ID already exists');
    }
    if (err instanceof UserNotFoundError) {
      return failure('USER_NOT_FOUND', 'User not found');
    }
    logger.error(
      { err, operation },
      `File catalog backend failure: ${describeError(err)}`
    );
    return failure('STORAGE_BACKEND_ERROR', 'Storage backend unavailable');
  }

  function invalidFileId(fileId: string): Failure | null {
    const message = validateFileId(fileId);
    return message !== null ? failure('VALIDATION_ERROR', message) : null;
  }

  function notFound(): Failure {
    return failure('NOT_FOUND', 'File not found');
  }

  return {
    async insert(record: NewFileRecord): Promise<Result<FileRecord>> {
      const invalid = invalidFileId(record.id);
      if (invalid !== null) {
        return invalid;
      }

      try {
        const inserted = await guard('catalog.insert', db.insertFile(record));
        return success(inserted);
      } catch (err) {
        return backendFailure('catalog.insert', err);
      }
    },

    /**
     * List live files with offset pagination
     * total counts the same rows (user_id match, is_deleted = false)
     */
    async list(
      userId: string,
      params: ListFilesParams
    ): Promise<Result<PagedResult<FileRecord>>> {
      const pageError = validatePageParams(params);
      if (pageError !== null) {
        return failure('VALIDATION_ERROR', pageError);
      }

      const sortBy = sortFieldSchema.safeParse(params.sortBy);
      if (!sortBy.success) {
        return failure(
          'VALIDATION_ERROR',
          `sort_by must be one of: ${FILE_SORT_FIELDS.join(', ')}`
        );
      }

      const order = sortOrderSchema.safeParse(params.order);
      if (!order.success) {
        return failure(
          'VALIDATION_ERROR',
          `order must be one of: ${SORT_ORDERS.join(', ')}`
        );
      }

      const query: FileListQuery = {
        offset: pageOffset(params),
        limit: params.limit,
        sortBy: sortBy.data,
        order: order.data,
      };

      try {
        const { items, total } = await guard(
          'catalog.list',
          db.listFiles(userId, query)
        );
        return success({
          items,
          total,
          page: params.page,
          limit: params.limit,
          totalPages: countPages(total, params.limit),
        });
      } catch (err) {
        return backendFailure('catalog.list', err);
      }
    },

    /**
     * Get a live file and refresh last_accessed
     */
    async get(userId: string, fileId: string): Promise<Result<FileRecord>> {
      const invalid = invalidFileId(fileId);
      if (invalid !== null) {
        return invalid;
      }

      let record: FileRecord | null;
      try {
        record = await guard(
          'catalog.get',
          db.getFile(userId, fileId, { includeDeleted: false })
        );
      } catch (err) {
        return backendFailure('catalog.get', err);
      }

      if (record === null) {
        return notFound();
      }

      const accessedAt = new Date();
      try {
        await guard('catalog.touch', db.touchFile(userId, fileId, accessedAt));
        return success({ ...record, lastAccessed: accessedAt });
      } catch (err) {
        logger.warn(
          { err, userId, fileId },
          `Failed to refresh last_accessed: ${describeError(err)}`
        );
        return success(record);
      }
    },

    async getIncludingDeleted(
      userId: string,
      fileId: string
    ): Promise<Result<FileRecord>> {
      const invalid = invalidFileId(fileId);
      if (invalid !== null) {
        return invalid;
      }

      try {
        const record = await guard(
          'catalog.get',
          db.getFile(userId, fileId, { includeDeleted: true })
        );
        return record !== null ? success(record) : notFound();
      } catch (err) {
        return backendFailure('catalog.get', err);
      }
    },

    /**
     * Mark a file deleted; repeating re-stamps deleted_at
     */
    async softDelete(
      userId: string,
      fileId: string
    ): Promise<Result<FileRecord>> {
      const invalid = invalidFileId(fileId);
      if (invalid !== null) {
        return invalid;
      }

      try {
        const record = await guard(
          'catalog.softDelete',
          db.softDeleteFile(userId, fileId, new Date())
        );
        return record !== null ? success(record) : notFound();
      } catch (err) {
        return backendFailure('catalog.softDelete', err);
      }
    },

    /**
     * Remove the row regardless of soft-delete state
     */
    async hardDelete(
      userId: string,
      fileId: string
    ): Promise<Result<FileRecord>> {
      const invalid = invalidFileId(fileId);
      if (invalid !== null) {
        return invalid;
      }

      try {
        const removed = await guard(
          'catalog.hardDelete',
          db.hardDeleteFile(userId, fileId)
        );
        return removed !== null ? success(removed) : notFound();
      } catch (err) {
        return backendFailure('catalog.hardDelete', err);
      }
    },

    /**
     * Soft-deleted records whose deleted_at is older than `cutoff`
     */
    async listExpired(
      cutoff: Date,
      limit: number
    ): Promise<Result<FileRecord[]>> {
      try {
        const records = await guard(
          'catalog.listExpired',
          db.listExpiredFiles(cutoff, limit)
        );
        return success(records);
      } catch (err) {
        return backendFailure('catalog.listExpired', err);
      }
    },

    /**
     * Live file count and largest live file
     */
    async getStats(userId: string): Promise<Result<FileStats>> {
      try {
        const stats = await guard('catalog.stats', db.getFileStats(userId));
        return success(stats);
      } catch (err) {
        return backendFailure('catalog.stats', err);
      }
    },
  };
}
