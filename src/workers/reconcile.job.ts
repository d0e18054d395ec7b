/**
 * Storage Reconciliation Job
 *
 * Recomputes storage_used from file records and in-flight upload
 * reservations for a set of users and audits every correction. Run on demand (scripts/reconcile-storage.ts); release()
 * clamps at zero, so drift is only ever repaired here.
 */

import type { Logger } from '../lib/logger.js';
import type { AuditService, QuotaLedger } from '../services/index.js';
import type { ActorContext } from '../types/index.js';

export interface ReconcileSummary {
  checked: number;
  corrected: number;
  failed: number;
}

/**
 * Reconcile each user in `userIds`, page by page
 */
export async function reconcileUsers(
  deps: {
    ledger: Pick<QuotaLedger, 'reconcile'>;
    auditService: Pick<AuditService, 'log'>;
    logger: Logger;
    actor: ActorContext;
  },
  userIds: AsyncIterable<string> | Iterable<string>
): Promise<ReconcileSummary> {
  const { ledger, auditService, logger, actor } = deps;
  const summary: ReconcileSummary = { checked: 0, corrected: 0, failed: 0 };

  for await (const userId of userIds) {
    summary.checked += 1;
    const result = await ledger.reconcile(userId);

    if (!result.success) {
      summary.failed += 1;
      logger.error(
        { userId, code: result.error.code },
        `Reconcile failed: ${result.error.message}`
      );
      continue;
    }

    if (result.data.previous !== result.data.current) {
      summary.corrected += 1;
      await auditService.log(actor, {
        action: 'storage:reconciled',
        resourceType: 'user',
        resourceId: userId,
        details: { ...result.data },
      });
    }
  }

  logger.info(summary, 'Storage reconciliation finished');
  return summary;
}
