/**
 * FileCatalog Database Adapter
 * Implements FileCatalogDb interface using Supabase
 *
 * SCOPE: files table reads and writes
 * NOT IN SCOPE: Object storage, quota accounting
 */

import type { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import {
  BackendError,
  DuplicateIdError,
  UserNotFoundError,
} from '../lib/errors.js';
import type {
  FileRecord,
  FileListQuery,
  FileStats,
  NewFileRecord,
} from '../types/index.js';

import type { FileCatalogDb } from './file.catalog.js';

const FILE_COLUMNS =
  'id, user_id, encrypted_filename, encrypted_metadata, file_size, storage_path, uploaded_at, last_accessed, is_deleted, deleted_at, encryption_algorithm';

/**
 * Database row schema
 */
const fileRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  encrypted_filename: z.string(),
  encrypted_metadata: z.object({
    encrypted_size: z.string(),
    encrypted_type: z.string(),
    encrypted_original_name: z.string(),
  }),
  file_size: z.coerce.number(),
  storage_path: z.string(),
  uploaded_at: z.string(),
  last_accessed: z.string().nullable(),
  is_deleted: z.boolean(),
  deleted_at: z.string().nullable(),
  encryption_algorithm: z.string(),
});

type FileRow = z.infer<typeof fileRowSchema>;

const largestFileRowSchema = z.object({
  id: z.string(),
  encrypted_filename: z.string(),
  file_size: z.coerce.number(),
});

/**
 * Map database row to FileRecord entity
 */
function mapRowToFile(row: FileRow): FileRecord {
  return {
    id: row.id,
    userId: row.user_id,
    encryptedFilename: row.encrypted_filename,
    encryptedMetadata: {
      encryptedSize: row.encrypted_metadata.encrypted_size,
      encryptedType: row.encrypted_metadata.encrypted_type,
      encryptedOriginalName: row.encrypted_metadata.encrypted_original_name,
    },
    fileSize: row.file_size,
    storagePath: row.storage_path,
    uploadedAt: new Date(row.uploaded_at),
    lastAccessed: row.last_accessed !== null ? new Date(row.last_accessed) : null,
    isDeleted: row.is_deleted,
    deletedAt: row.deleted_at !== null ? new Date(row.deleted_at) : null,
    encryptionAlgorithm: row.encryption_algorithm,
  };
}

function parseRow(data: unknown): FileRecord {
  return mapRowToFile(fileRowSchema.parse(data));
}

function parseRows(data: unknown): FileRecord[] {
  return z.array(fileRowSchema).parse(data).map(mapRowToFile);
}

function toBackendError(operation: string, error: PostgrestError): BackendError {
  return new BackendError(operation, error.message, { cause: error });
}

/**
 * Create FileCatalogDb implementation using Supabase
 */
export function createFileCatalogDb(supabase: SupabaseClient): FileCatalogDb {
  return {
    /**
     * Insert a new file record
     */
    async insertFile(record: NewFileRecord): Promise<FileRecord> {
      const { data, error } = await supabase
        .from('files')
        .insert({
          id: record.id,
          user_id: record.userId,
          encrypted_filename: record.encryptedFilename,
          encrypted_metadata: {
            encrypted_size: record.encryptedMetadata.encryptedSize,
            encrypted_type: record.encryptedMetadata.encryptedType,
            encrypted_original_name:
              record.encryptedMetadata.encryptedOriginalName,
          },
          file_size: record.fileSize,
          storage_path: record.storagePath,
          uploaded_at: record.uploadedAt.toISOString(),
          encryption_algorithm: record.encryptionAlgorithm,
          is_deleted: false,
        })
        .select(FILE_COLUMNS)
        .single();

      if (error !== null) {
        // unique_violation / foreign_key_violation
        if (error.code === '23505') {
          throw new DuplicateIdError('catalog.insert', record.id);
        }
        if (error.code === '23503') {
          throw new UserNotFoundError('catalog.insert', record.userId);
        }
        throw toBackendError('catalog.insert', error);
      }

      return parseRow(data);
    },

    /**
     * List live files for a user
     */
    async listFiles(userId: string, query: FileListQuery) {
      const { data, error, count } = await supabase
        .from('files')
        .select(FILE_COLUMNS, { count: 'exact' })
        .eq('user_id', userId)
        .eq('is_deleted', false)
        .order(query.sortBy, { ascending: query.order === 'asc' })
        .order('id', { ascending: true })
        .range(query.offset, query.offset + query.limit - 1);

      if (error !== null) {
        throw toBackendError('catalog.list', error);
      }

      return { items: parseRows(data), total: count ?? 0 };
    },

    /**
     * Get file by ID, scoped to its owner
     */
    async getFile(
      userId: string,
      fileId: string,
      options: { includeDeleted: boolean }
    ): Promise<FileRecord | null> {
      let query = supabase
        .from('files')
        .select(FILE_COLUMNS)
        .eq('id', fileId)
        .eq('user_id', userId);

      if (!options.includeDeleted) {
        query = query.eq('is_deleted', false);
      }

      const { data, error } = await query.maybeSingle();

      if (error !== null) {
        throw toBackendError('catalog.get', error);
      }

      return data !== null ? parseRow(data) : null;
    },

    async touchFile(userId: string, fileId: string, at: Date): Promise<void> {
      const { error } = await supabase
        .from('files')
        .update({ last_accessed: at.toISOString() })
        .eq('id', fileId)
        .eq('user_id', userId);

      if (error !== null) {
        throw toBackendError('catalog.touch', error);
      }
    },

    /**
     * Set is_deleted and deleted_at
     */
    async softDeleteFile(
      userId: string,
      fileId: string,
      at: Date
    ): Promise<FileRecord | null> {
      const { data, error } = await supabase
        .from('files')
        .update({ is_deleted: true, deleted_at: at.toISOString() })
        .eq('id', fileId)
        .eq('user_id', userId)
        .select(FILE_COLUMNS)
        .maybeSingle();

      if (error !== null) {
        throw toBackendError('catalog.softDelete', error);
      }

      return data !== null ? parseRow(data) : null;
    },

    /**
     * Delete the row and return it; null when no row was removed
     */
    async hardDeleteFile(
      userId: string,
      fileId: string
    ): Promise<FileRecord | null> {
      const { data, error } = await supabase
        .from('files')
        .delete()
        .eq('id', fileId)
        .eq('user_id', userId)
        .select(FILE_COLUMNS)
        .maybeSingle();

      if (error !== null) {
        throw toBackendError('catalog.hardDelete', error);
      }

      return data !== null ? parseRow(data) : null;
    },

    /**
     * Soft-deleted files past the cutoff, oldest first
     */
    async listExpiredFiles(cutoff: Date, limit: number) {
      const { data, error } = await supabase
        .from('files')
        .select(FILE_COLUMNS)
        .eq('is_deleted', true)
        .lt('deleted_at', cutoff.toISOString())
        .order('deleted_at', { ascending: true })
        .limit(limit);

      if (error !== null) {
        throw toBackendError('catalog.listExpired', error);
      }

      return parseRows(data);
    },

    /**
     * Count and largest of a user's live files
     */
    async getFileStats(userId: string): Promise<FileStats> {
      const { data, error, count } = await supabase
        .from('files')
        .select('id, encrypted_filename, file_size', { count: 'exact' })
        .eq('user_id', userId)
        .eq('is_deleted', false)
        .order('file_size', { ascending: false })
        .limit(1);

      if (error !== null) {
        throw toBackendError('catalog.stats', error);
      }

      const largest = z.array(largestFileRowSchema).parse(data)[0];

      return {
        fileCount: count ?? 0,
        largestFile:
          largest !== undefined
            ? {
                id: largest.id,
                encryptedFilename: largest.encrypted_filename,
                size: largest.file_size,
              }
            : null,
      };
    },
  };
}
