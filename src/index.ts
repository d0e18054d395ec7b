/**
 * Application Entry Point
 *
 * Loads configuration, constructs the backend clients, wires all services
 * and starts the Hono application and the purge worker.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import { createApp } from './api/app.js';
import { createSupabaseTokenVerifier } from './api/middleware/auth.js';
import { createRateLimiters } from './api/middleware/rateLimit.js';
import { loadConfig } from './config/env.js';
import { createLogger } from './lib/logger.js';
import { createRedisClient } from './lib/redis.js';
import { createSupabaseAdmin } from './lib/supabase.js';
import {
  createAuditService,
  createAuditServiceDb,
  createFileCatalog,
  createFileCatalogDb,
  createFileService,
  createQuotaLedger,
  createQuotaLedgerDb,
  createSupabaseHealthChecks,
  createSupabaseObjectStore,
  createUserService,
  createUserServiceDb,
} from './services/index.js';
import { startPurgeWorker } from './workers/index.js';

const config = loadConfig();
const logger = createLogger(config);

// Clients are owned by the entry point and injected below
const supabase = createSupabaseAdmin(config);
const redis = config.upstash !== null ? createRedisClient(config.upstash) : null;

// Wire all services
const auditService = createAuditService({
  db: createAuditServiceDb(supabase),
  logger,
  timeoutMs: config.backendTimeoutMs,
});

const ledger = createQuotaLedger({
  db: createQuotaLedgerDb(supabase),
  logger,
  timeoutMs: config.backendTimeoutMs,
});

const catalog = createFileCatalog({
  db: createFileCatalogDb(supabase),
  logger,
  timeoutMs: config.backendTimeoutMs,
});

const fileService = createFileService({
  catalog,
  ledger,
  objectStore: createSupabaseObjectStore(supabase, config.storageBucket),
  auditService,
  logger,
  config,
});

const userService = createUserService({
  db: createUserServiceDb(supabase),
  catalog,
  auditService,
  logger,
  config,
});

// Create the API application
const app = createApp({
  services: { fileService, userService },
  tokenVerifier: createSupabaseTokenVerifier(
    supabase,
    config.backendTimeoutMs
  ),
  rateLimiters: createRateLimiters(redis),
  healthChecks: createSupabaseHealthChecks(supabase, config.storageBucket),
  logger,
  maxFileSizeBytes: config.maxFileSizeBytes,
  backendTimeoutMs: config.backendTimeoutMs,
  allowedOrigins: config.allowedOrigins,
});

const purgeWorker = startPurgeWorker({
  fileService,
  logger,
  intervalMs: config.purgeIntervalMs,
});

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info(
    { port: info.port, bucket: config.storageBucket, env: config.nodeEnv },
    'Server started'
  );
});

function shutdown(signal: string): void {
  logger.info({ signal }, 'Shutting down');
  purgeWorker.stop();
  server.close();
}

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);

export { app };
