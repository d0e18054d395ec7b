/**
 * Object Store Adapter
 * Ciphertext blobs in a Supabase Storage bucket, keyed by storage path
 *
 * SCOPE: put / get / delete / sign of opaque byte objects
 * NOT IN SCOPE: Quota, file records, any interpretation of the bytes
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import { BackendError, ObjectExistsError } from '../lib/errors.js';

/**
 * Object store interface consumed by the file lifecycle service
 * Adapters throw BackendError on transport failure, and
 * ObjectExistsError when put would overwrite
 */
export interface ObjectStore {
  put(path: string, bytes: Uint8Array, contentType: string): Promise<void>;
  /** null when no object exists at `path` */
  get(path: string): Promise<Uint8Array | null>;
  /** Idempotent: deleting a missing object succeeds */
  delete(path: string): Promise<void>;
  sign(path: string, ttlSeconds: number): Promise<string>;
}

/**
 * Deterministic object key for a file
 */
export function storagePathFor(userId: string, fileId: string): string {
  return `${userId}/${fileId}.enc`;
}

function isNotFoundMessage(message: string): boolean {
  const normalized = message.toLowerCase();
  return normalized.includes('not found') || normalized.includes('not_found');
}

function isAlreadyExists(error: { message: string }): boolean {
  const normalized = error.message.toLowerCase();
  return (
    normalized.includes('already exists') || normalized.includes('duplicate')
  );
}

/**
 * Raw downloads surface a missing object only through the wrapped
 * HTTP response, not the error message
 */
async function isMissingObject(error: { message: string }): Promise<boolean> {
  if (isNotFoundMessage(error.message)) {
    return true;
  }
  const original = 'originalError' in error ? error.originalError : undefined;
  if (!(original instanceof Response)) {
    return false;
  }
  if (original.status === 404) {
    return true;
  }
  return isNotFoundMessage(await original.text());
}

/**
 * Create Supabase Storage adapter
 */
export function createSupabaseObjectStore(
  supabase: SupabaseClient,
  bucket: string
): ObjectStore {
  return {
    /**
     * Upload ciphertext; never overwrites an existing object
     */
    async put(path: string, bytes: Uint8Array, contentType: string) {
      const { error } = await supabase.storage
        .from(bucket)
        .upload(path, bytes, { contentType, upsert: false });

      if (error) {
        if (isAlreadyExists(error)) {
          throw new ObjectExistsError('objectStore.put', path);
        }
        throw new BackendError('objectStore.put', error.message, {
          cause: error,
        });
      }
    },

    /**
     * Download ciphertext
     */
    async get(path: string) {
      const { data, error } = await supabase.storage
        .from(bucket)
        .download(path);

      if (error) {
        if (await isMissingObject(error)) {
          return null;
        }
        throw new BackendError('objectStore.get', error.message, {
          cause: error,
        });
      }

      return new Uint8Array(await data.arrayBuffer());
    },

    /**
     * Remove an object (Supabase reports success for missing keys)
     */
    async delete(path: string) {
      const { error } = await supabase.storage.from(bucket).remove([path]);

      if (error) {
        if (isNotFoundMessage(error.message)) {
          return;
        }
        throw new BackendError('objectStore.delete', error.message, {
          cause: error,
        });
      }
    },

    /**
     * Generate a time-limited download URL
     */
    async sign(path: string, ttlSeconds: number) {
      const { data, error } = await supabase.storage
        .from(bucket)
        .createSignedUrl(path, ttlSeconds);

      if (error) {
        throw new BackendError('objectStore.sign', error.message, {
          cause: error,
        });
      }

      return data.signedUrl;
    },
  };
}
