/**
 * File Domain Types
 *
 * SCOPE: Encrypted file records, quota accounting inputs, listings
 *
 * The server never interprets encrypted names or metadata; it stores
 * them verbatim and only uses `fileSize` for quota accounting.
 */

import type { PageParams } from './pagination.js';

/**
 * Client-encrypted metadata blob (opaque to the server)
 */
export interface EncryptedMetadata {
  encryptedSize: string;
  encryptedType: string;
  encryptedOriginalName: string;
}

/**
 * File record entity
 */
export interface FileRecord {
  id: string;
  userId: string;
  encryptedFilename: string;
  encryptedMetadata: EncryptedMetadata;
  fileSize: number;
  storagePath: string;
  uploadedAt: Date;
  lastAccessed: Date | null;
  isDeleted: boolean;
  deletedAt: Date | null;
  encryptionAlgorithm: string;
}

/**
 * Fields written when a record is first inserted
 */
export interface NewFileRecord {
  id: string;
  userId: string;
  encryptedFilename: string;
  encryptedMetadata: EncryptedMetadata;
  fileSize: number;
  storagePath: string;
  uploadedAt: Date;
  encryptionAlgorithm: string;
}

export const DEFAULT_ENCRYPTION_ALGORITHM = 'AES-256-GCM';

/**
 * Allow-listed sort fields and orders
 */
export const FILE_SORT_FIELDS = [
  'uploaded_at',
  'file_size',
  'encrypted_filename',
] as const;
export const SORT_ORDERS = ['asc', 'desc'] as const;

export type FileSortField = (typeof FILE_SORT_FIELDS)[number];
export type SortOrder = (typeof SORT_ORDERS)[number];

/**
 * Parameters for uploading a file
 */
export interface UploadFileParams {
  encryptedFilename: string;
  encryptedMetadata: EncryptedMetadata;
  declaredSize: number;
  bytes: Uint8Array;
  contentType: string;
}

/**
 * Parameters for listing files (raw, validated by the catalog)
 */
export interface ListFilesParams extends PageParams {
  sortBy: string;
  order: string;
}

/**
 * Validated listing query handed to the database adapter
 */
export interface FileListQuery {
  offset: number;
  limit: number;
  sortBy: FileSortField;
  order: SortOrder;
}

/**
 * Signed download URL
 */
export interface DownloadUrl {
  url: string;
  expiresIn: number; // seconds
}

/**
 * Raw encrypted bytes of a stored object
 */
export interface FileContent {
  record: FileRecord;
  bytes: Uint8Array;
}

/**
 * Confirmation returned by DeleteFile
 */
export interface DeleteConfirmation {
  fileId: string;
  deletedAt: Date;
  permanent: boolean;
}

/**
 * Summary of a purge run
 */
export interface PurgeSummary {
  scanned: number;
  purged: number;
  failed: number;
}
