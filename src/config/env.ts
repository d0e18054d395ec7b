/**
 * Environment Configuration
 *
 * Validates process.env with zod and derives byte/second values used by
 * the services. Nothing here is cached at module level: the entry point
 * calls loadConfig() once and injects the result.
 */

import { z } from 'zod';

const BYTES_PER_MB = 1024 * 1024;
const BYTES_PER_GB = 1024 * 1024 * 1024;

const booleanish = z.union([
  z.boolean(),
  z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .transform((value) => ['1', 'true', 'yes', 'on'].includes(value)),
]);

const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'test', 'staging', 'production'])
    .default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  LOG_PRETTY: booleanish.default(false),
  SUPABASE_URL: z.string().url('SUPABASE_URL must be a URL'),
  SUPABASE_SERVICE_KEY: z.string().min(1, 'SUPABASE_SERVICE_KEY is required'),
  STORAGE_BUCKET_NAME: z.string().min(1).default('Files'),
  MAX_FILE_SIZE_MB: z.coerce.number().int().positive().default(50),
  DEFAULT_STORAGE_LIMIT_GB: z.coerce.number().positive().default(5),
  SIGNED_URL_TTL_SECONDS: z.coerce.number().int().min(1).max(3600).default(300),
  BACKEND_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  SOFT_DELETE_RETENTION_DAYS: z.coerce.number().int().positive().default(30),
  PURGE_INTERVAL_MINUTES: z.coerce.number().int().min(0).default(60),
  ALLOWED_ORIGINS: z.string().default('http://localhost:3000'),
  UPSTASH_REDIS_URL: z.string().url().optional(),
  UPSTASH_REDIS_TOKEN: z.string().min(1).optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Application configuration consumed by the services
 */
export interface AppConfig {
  nodeEnv: EnvConfig['NODE_ENV'];
  port: number;
  logLevel: EnvConfig['LOG_LEVEL'];
  logPretty: boolean;
  supabaseUrl: string;
  supabaseServiceKey: string;
  storageBucket: string;
  maxFileSizeBytes: number;
  defaultStorageLimitBytes: number;
  signedUrlTtlSeconds: number;
  backendTimeoutMs: number;
  softDeleteRetentionDays: number;
  purgeIntervalMs: number;
  allowedOrigins: string[];
  upstash: { url: string; token: string } | null;
}

/**
 * Parse and validate the environment
 * Throws with the offending field names when the environment is invalid
 */
export function loadConfig(
  source: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(', ');
    throw new Error(`Invalid environment configuration: ${fields}`);
  }

  const env = parsed.data;

  return {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    logPretty: env.LOG_PRETTY,
    supabaseUrl: env.SUPABASE_URL,
    supabaseServiceKey: env.SUPABASE_SERVICE_KEY,
    storageBucket: env.STORAGE_BUCKET_NAME,
    maxFileSizeBytes: env.MAX_FILE_SIZE_MB * BYTES_PER_MB,
    defaultStorageLimitBytes: Math.floor(
      env.DEFAULT_STORAGE_LIMIT_GB * BYTES_PER_GB
    ),
    signedUrlTtlSeconds: env.SIGNED_URL_TTL_SECONDS,
    backendTimeoutMs: env.BACKEND_TIMEOUT_MS,
    softDeleteRetentionDays: env.SOFT_DELETE_RETENTION_DAYS,
    purgeIntervalMs: env.PURGE_INTERVAL_MINUTES * 60 * 1000,
    allowedOrigins: env.ALLOWED_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin !== ''),
    upstash:
      env.UPSTASH_REDIS_URL !== undefined &&
      env.UPSTASH_REDIS_TOKEN !== undefined
        ? { url: env.UPSTASH_REDIS_URL, token: env.UPSTASH_REDIS_TOKEN }
        : null,
  };
}
