/**
 * Preview Lifecycle
 *
 * Create, extend and tear down short-lived previews.
 */

export * from './types.js';
export * from './errors.js';
export { PreviewOrchestrator, assertPreviewId } from './PreviewOrchestrator.js';
export { CleanupWorker } from './CleanupWorker.js';
export { Reconciler } from './Reconciler.js';
export type { SweepSummary } from './Reconciler.js';
