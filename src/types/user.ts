/**
 * User Types
 *
 * SCOPE: Identity anchor and quota state
 * NOT IN SCOPE: Credentials (held by the auth provider)
 */

/**
 * User entity
 */
export interface User {
  id: string;
  email: string;
  storageUsed: number; // bytes
  storageLimit: number; // bytes
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Current quota position of a user
 */
export interface QuotaUsage {
  storageUsed: number;
  storageLimit: number;
}

/**
 * Outcome of recomputing a user's accounted usage
 */
export interface ReconcileResult {
  previous: number;
  current: number;
}

/**
 * Profile view (usage summary)
 */
export interface UserProfile {
  id: string;
  email: string;
  createdAt: Date;
  storageUsed: number;
  storageLimit: number;
  storagePercentage: number;
  totalFiles: number;
}

/**
 * Largest live file of a user
 */
export interface LargestFile {
  id: string;
  encryptedFilename: string;
  size: number;
}

/**
 * Detailed storage statistics
 */
export interface StorageStats {
  used: number;
  limit: number;
  available: number;
  percentage: number;
  fileCount: number;
  largestFile: LargestFile | null;
}

/**
 * Live-file statistics computed from the catalog
 */
export interface FileStats {
  fileCount: number;
  largestFile: LargestFile | null;
}

/**
 * Parameters for provisioning a user on first authentication
 */
export interface EnsureUserParams {
  id: string;
  email: string;
}
