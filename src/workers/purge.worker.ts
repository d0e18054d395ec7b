/**
 * Purge Worker
 *
 * Periodically hard-deletes soft-deleted files older than the retention
 * period. Runs in-process on a timer; a run never overlaps the previous one.
 */

import { describeError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { FileService } from '../services/index.js';
import type { PurgeSummary } from '../types/index.js';
import { SYSTEM_ACTOR } from '../types/index.js';

export interface PurgeWorker {
  /** Run one purge pass now */
  runOnce(): Promise<PurgeSummary | null>;
  stop(): void;
}

/**
 * Start the purge timer; intervalMs = 0 creates a worker that only runs
 * when runOnce() is called
 */
export function startPurgeWorker(deps: {
  fileService: Pick<FileService, 'purgeExpiredFiles'>;
  logger: Logger;
  intervalMs: number;
}): PurgeWorker {
  const { fileService, logger, intervalMs } = deps;
  let running = false;
  let timer: NodeJS.Timeout | null = null;

  async function runOnce(): Promise<PurgeSummary | null> {
    if (running) {
      logger.debug('Purge already in progress; skipping');
      return null;
    }

    running = true;
    try {
      const result = await fileService.purgeExpiredFiles({
        ...SYSTEM_ACTOR,
        requestId: 'purge-worker',
      });

      if (!result.success) {
        logger.error(
          { code: result.error.code },
          `Purge failed: ${result.error.message}`
        );
        return null;
      }

      if (result.data.failed > 0) {
        logger.warn(result.data, 'Purge finished with failures');
      }
      return result.data;
    } catch (err) {
      logger.error({ err }, `Purge crashed: ${describeError(err)}`);
      return null;
    } finally {
      running = false;
    }
  }

  if (intervalMs > 0) {
    timer = setInterval(() => {
      void runOnce();
    }, intervalMs);
    timer.unref();
    logger.info({ intervalMs }, 'Purge worker started');
  }

  return {
    runOnce,
    stop() {
      if (timer !== null) {
        clearInterval(timer);
        timer = null;
      }
    },
  };
}
