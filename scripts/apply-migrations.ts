/**
 * Apply database migrations to Supabase
 * Usage: npm run migrate
 *
 * Each file is sent whole to the exec_sql RPC (create it once from the
 * Supabase SQL editor); plpgsql bodies make statement splitting unsafe.
 */

import 'dotenv/config';
import { readFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';

import { loadConfig } from '../src/config/env.js';
import { createLogger } from '../src/lib/logger.js';
import { createSupabaseAdmin } from '../src/lib/supabase.js';

const MIGRATIONS_DIR = join(process.cwd(), 'supabase/migrations');

const config = loadConfig();
const logger = createLogger(config);
const supabase = createSupabaseAdmin(config);

async function applyMigration(filename: string): Promise<void> {
  const sql = readFileSync(join(MIGRATIONS_DIR, filename), 'utf-8');

  logger.info({ filename }, 'Applying migration');

  const { error } = await supabase.rpc('exec_sql', { sql });
  if (error !== null) {
    throw new Error(`${filename}: ${error.message}`);
  }

  logger.info({ filename }, 'Migration applied');
}

async function main(): Promise<void> {
  const files = readdirSync(MIGRATIONS_DIR)
    .filter((name) => name.endsWith('.sql'))
    .sort();

  for (const file of files) {
    await applyMigration(file);
  }
  logger.info({ count: files.length }, 'All migrations applied');
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Migration failed');
  process.exitCode = 1;
});
