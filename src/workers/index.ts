/**
 * Background Workers Exports
 *
 * Workers run in-process and act as the system actor.
 */

export type { PurgeWorker } from './purge.worker.js';
export { startPurgeWorker } from './purge.worker.js';
export type { ReconcileSummary } from './reconcile.job.js';
export { reconcileUsers } from './reconcile.job.js';
