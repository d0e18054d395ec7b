/**
 * Health Route
 * Public endpoint for health checks
 */

import { Hono } from 'hono';

import { describeError } from '../../lib/errors.js';
import type { Logger } from '../../lib/logger.js';
import { createTimeoutGuard } from '../../lib/timeout.js';
import type { HealthChecks } from '../../services/index.js';

/**
 * Create health check routes
 */
export function createHealthRoutes(deps: {
  version: string;
  checks: HealthChecks;
  timeoutMs: number;
  logger: Logger;
}): Hono {
  const { version, checks, logger } = deps;
  const guard = createTimeoutGuard(deps.timeoutMs);
  const app = new Hono();

  async function runCheck<T extends string>(
    name: 'database' | 'storage',
    check: () => Promise<T>
  ): Promise<T | 'error'> {
    try {
      return await guard(`health.${name}`, check());
    } catch (err) {
      logger.error(
        { err, check: name },
        `Health check failed: ${describeError(err)}`
      );
      return 'error';
    }
  }

  /**
   * GET /health
   * Always 200; status is degraded when either backend is not usable
   */
  app.get('/health', async (c) => {
    const [database, storage] = await Promise.all([
      runCheck('database', () => checks.database()),
      runCheck('storage', () => checks.storage()),
    ]);

    return c.json({
      status:
        database === 'connected' && storage === 'connected'
          ? 'healthy'
          : 'degraded',
      timestamp: new Date().toISOString(),
      version,
      database,
      storage,
    });
  });

  return app;
}
