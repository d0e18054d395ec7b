/**
 * File Routes
 * API endpoints for encrypted file storage
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import { z } from 'zod';

import type { FileService } from '../../services/index.js';
import type { ActorContext, FileRecord } from '../../types/index.js';
import {
  DEFAULT_PAGE,
  DEFAULT_PAGE_LIMIT,
} from '../../types/index.js';
import { errorResponse, successResponse } from '../utils/response.js';

/**
 * Multipart overhead allowed on top of the maximum file size
 */
const MULTIPART_OVERHEAD_BYTES = 1024 * 1024;

interface FileRoutesDeps {
  fileService: FileService;
  maxFileSizeBytes: number;
}

/**
 * Helper to get actor from context
 */
function getActor(c: Context): ActorContext {
  return c.get('actor');
}

/**
 * Helper to get request ID from context
 */
function getRequestId(c: Context): string {
  return c.get('requestId') || getActor(c).requestId;
}

/**
 * Format file record for response
 */
function formatFile(file: FileRecord) {
  return {
    id: file.id,
    encryptedFilename: file.encryptedFilename,
    encryptedMetadata: file.encryptedMetadata,
    fileSize: file.fileSize,
    storagePath: file.storagePath,
    uploadedAt: file.uploadedAt.toISOString(),
    lastAccessed: file.lastAccessed?.toISOString() ?? null,
    encryptionAlgorithm: file.encryptionAlgorithm,
  };
}

// Zod Schemas
const encryptedMetadataSchema = z.object({
  encrypted_size: z.string(),
  encrypted_type: z.string(),
  encrypted_original_name: z.string(),
});

const uploadFormSchema = z.object({
  encrypted_filename: z.string().min(1, 'encrypted_filename is required'),
  encrypted_metadata: z
    .string({ required_error: 'encrypted_metadata is required' })
    .transform((value, ctx): unknown => {
      try {
        return JSON.parse(value);
      } catch {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'encrypted_metadata must be valid JSON',
        });
        return z.NEVER;
      }
    })
    .pipe(encryptedMetadataSchema),
  file_size: z.coerce
    .number({ invalid_type_error: 'file_size must be a number' })
    .int('file_size must be an integer')
    .positive('file_size must be positive'),
});

const listQuerySchema = z.object({
  page: z.coerce.number().int().default(DEFAULT_PAGE),
  limit: z.coerce.number().int().default(DEFAULT_PAGE_LIMIT),
  sort_by: z.string().default('uploaded_at'),
  order: z.string().default('desc'),
});

const downloadQuerySchema = z.object({
  expires_in: z.coerce.number().int().optional(),
});

/**
 * Create file routes
 */
export function createFileRoutes(deps: FileRoutesDeps): Hono {
  const { fileService, maxFileSizeBytes } = deps;
  const app = new Hono();

  // ─────────────────────────────────────────────────────────────
  // UPLOAD
  // ─────────────────────────────────────────────────────────────

  /**
   * POST /files/upload
   * Multipart: file, encrypted_filename, encrypted_metadata (JSON), file_size
   */
  app.post(
    '/files/upload',
    bodyLimit({
      maxSize: maxFileSizeBytes + MULTIPART_OVERHEAD_BYTES,
      onError: (c) =>
        errorResponse(
          c,
          { code: 'FILE_TOO_LARGE', message: 'File exceeds maximum size' },
          getRequestId(c)
        ),
    }),
    async (c) => {
      const actor = getActor(c);
      const requestId = getRequestId(c);

      const contentType = c.req.header('content-type') ?? '';
      if (!contentType.startsWith('multipart/form-data')) {
        return errorResponse(
          c,
          { code: 'VALIDATION_ERROR', message: 'Expected multipart form data' },
          requestId
        );
      }

      // Read errors propagate so bodyLimit can answer 413
      const body = await c.req.parseBody();

      const file = body['file'];
      if (!(file instanceof Blob)) {
        return errorResponse(
          c,
          { code: 'VALIDATION_ERROR', message: 'file is required' },
          requestId
        );
      }

      const validation = uploadFormSchema.safeParse(body);
      if (!validation.success) {
        return errorResponse(
          c,
          {
            code: 'VALIDATION_ERROR',
            message:
              validation.error.issues[0]?.message ?? 'Invalid upload form',
          },
          requestId
        );
      }

      const form = validation.data;
      const bytes = new Uint8Array(await file.arrayBuffer());

      const result = await fileService.uploadFile(actor, {
        encryptedFilename: form.encrypted_filename,
        encryptedMetadata: {
          encryptedSize: form.encrypted_metadata.encrypted_size,
          encryptedType: form.encrypted_metadata.encrypted_type,
          encryptedOriginalName:
            form.encrypted_metadata.encrypted_original_name,
        },
        declaredSize: form.file_size,
        bytes,
        contentType: 'application/octet-stream',
      });

      if (!result.success) {
        return errorResponse(c, result.error, requestId);
      }

      return successResponse(
        c,
        {
          fileId: result.data.id,
          uploadedAt: result.data.uploadedAt.toISOString(),
          storagePath: result.data.storagePath,
          fileSize: result.data.fileSize,
        },
        requestId,
        201
      );
    }
  );

  // ─────────────────────────────────────────────────────────────
  // LIST FILES
  // ─────────────────────────────────────────────────────────────

  /**
   * GET /files
   * List the caller's live files
   */
  app.get('/files', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const validation = listQuerySchema.safeParse(c.req.query());
    if (!validation.success) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message: 'page and limit must be integers',
        },
        requestId
      );
    }

    const query = validation.data;
    const result = await fileService.listFiles(actor, {
      page: query.page,
      limit: query.limit,
      sortBy: query.sort_by,
      order: query.order,
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(
      c,
      {
        files: result.data.items.map(formatFile),
        pagination: {
          total: result.data.total,
          page: result.data.page,
          limit: result.data.limit,
          totalPages: result.data.totalPages,
        },
      },
      requestId
    );
  });

  // ─────────────────────────────────────────────────────────────
  // GET FILE
  // ─────────────────────────────────────────────────────────────

  /**
   * GET /files/:id
   * Get file metadata
   */
  app.get('/files/:id', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const result = await fileService.getFileMetadata(actor, c.req.param('id'));

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, formatFile(result.data), requestId);
  });

  // ─────────────────────────────────────────────────────────────
  // DOWNLOAD
  // ─────────────────────────────────────────────────────────────

  /**
   * GET /files/:id/download
   * Signed download URL for the ciphertext
   */
  app.get('/files/:id/download', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const validation = downloadQuerySchema.safeParse(c.req.query());
    if (!validation.success) {
      return errorResponse(
        c,
        { code: 'VALIDATION_ERROR', message: 'expires_in must be an integer' },
        requestId
      );
    }

    const result = await fileService.getDownloadUrl(
      actor,
      c.req.param('id'),
      validation.data.expires_in
    );

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(
      c,
      { downloadUrl: result.data.url, expiresIn: result.data.expiresIn },
      requestId
    );
  });

  /**
   * GET /files/:id/content
   * Ciphertext streamed through the API
   */
  app.get('/files/:id/content', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const result = await fileService.downloadFileContent(
      actor,
      c.req.param('id')
    );

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    const { bytes } = result.data;
    const buffer = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(buffer).set(bytes);

    return c.body(buffer, 200, {
      'Content-Type': 'application/octet-stream',
      'Content-Length': bytes.byteLength.toString(),
      'X-Request-Id': requestId,
    });
  });

  // ─────────────────────────────────────────────────────────────
  // DELETE
  // ─────────────────────────────────────────────────────────────

  /**
   * DELETE /files/:id
   * Soft delete (hard delete when already soft-deleted)
   */
  app.delete('/files/:id', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const result = await fileService.deleteFile(actor, c.req.param('id'), {
      permanent: false,
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(
      c,
      {
        fileId: result.data.fileId,
        deletedAt: result.data.deletedAt.toISOString(),
        permanent: result.data.permanent,
      },
      requestId
    );
  });

  /**
   * DELETE /files/:id/permanent
   * Hard delete: object, record and quota charge
   */
  app.delete('/files/:id/permanent', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const result = await fileService.deleteFile(actor, c.req.param('id'), {
      permanent: true,
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(
      c,
      {
        fileId: result.data.fileId,
        deletedAt: result.data.deletedAt.toISOString(),
        permanent: result.data.permanent,
      },
      requestId
    );
  });

  return app;
}
