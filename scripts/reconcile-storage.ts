/**
 * Recompute storage_used for every user (or the ids given as arguments)
 * Usage: npm run reconcile -- [userId ...]
 */

import 'dotenv/config';
import { z } from 'zod';

import { loadConfig } from '../src/config/env.js';
import { createLogger } from '../src/lib/logger.js';
import { createSupabaseAdmin } from '../src/lib/supabase.js';
import {
  createAuditService,
  createAuditServiceDb,
  createQuotaLedger,
  createQuotaLedgerDb,
} from '../src/services/index.js';
import { SYSTEM_ACTOR } from '../src/types/index.js';
import { reconcileUsers } from '../src/workers/reconcile.job.js';

const PAGE_SIZE = 500;

const config = loadConfig();
const logger = createLogger(config);
const supabase = createSupabaseAdmin(config);

/**
 * Page through all user ids
 */
async function* allUserIds(): AsyncGenerator<string> {
  for (let offset = 0; ; offset += PAGE_SIZE) {
    const { data, error } = await supabase
      .from('users')
      .select('id')
      .order('id', { ascending: true })
      .range(offset, offset + PAGE_SIZE - 1);

    if (error !== null) {
      throw new Error(`Failed to list users: ${error.message}`);
    }

    const rows = z.array(z.object({ id: z.string() })).parse(data);
    for (const row of rows) {
      yield row.id;
    }
    if (rows.length < PAGE_SIZE) {
      return;
    }
  }
}

async function main(): Promise<void> {
  const requested = process.argv.slice(2);

  const summary = await reconcileUsers(
    {
      ledger: createQuotaLedger({
        db: createQuotaLedgerDb(supabase),
        logger,
        timeoutMs: config.backendTimeoutMs,
      }),
      auditService: createAuditService({
        db: createAuditServiceDb(supabase),
        logger,
        timeoutMs: config.backendTimeoutMs,
      }),
      logger,
      actor: { ...SYSTEM_ACTOR, requestId: 'reconcile-storage' },
    },
    requested.length > 0 ? requested : allUserIds()
  );

  if (summary.failed > 0) {
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  logger.error({ err }, 'Reconciliation aborted');
  process.exitCode = 1;
});
