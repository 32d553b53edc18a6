import { logger as getLogger } from '../../shared/logger.js';
import { errorMessage } from './errors.js';
import type { CleanupWorker } from './CleanupWorker.js';
import type { CleanupOutcome } from './types.js';
import type { MetadataStore } from '../database/MetadataStore.js';

const logger = getLogger();

export interface ReconcilerOptions {
  store: MetadataStore;
  cleanup: CleanupWorker;
  intervalSeconds: number;    // 0 disables the periodic sweep
  graceSeconds: number;       // How long past expiry a trigger gets before the sweep steps in
  now?: () => Date;
}

export type SweepSummary = Record<CleanupOutcome, number>;

/**
 * Periodic safety net for lost triggers: anything expired for longer than
 * the grace period goes through the same cleanup path as a fired trigger,
 * as does every preview left 'failed'.
 */
export class Reconciler {
  private options: ReconcilerOptions;

  private now: () => Date;

  private timer: NodeJS.Timeout | null = null;

  private running: Promise<SweepSummary> | null = null;

  constructor(options: ReconcilerOptions) {
    this.options = options;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * One pass over overdue previews. Concurrent callers share the pass in flight.
   */
  sweep(): Promise<SweepSummary> {
    if (!this.running) {
      this.running = this.doSweep().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  private async doSweep(): Promise<SweepSummary> {
    const summary: SweepSummary = { deleted: 0, absent: 0, skipped: 0, failed: 0 };
    const cutoff = new Date(this.now().getTime() - this.options.graceSeconds * 1000);
    const overdue = await this.options.store.listExpiringBefore(cutoff);
    const overdueIds = new Set(overdue.map((r) => r.previewId));
    // Failed teardowns are retried without waiting for their expiry
    const failed = (await this.options.store.list())
      .filter((r) => r.status === 'failed' && !overdueIds.has(r.previewId));
    const due = [...overdue, ...failed];

    if (due.length > 0) {
      logger.info('Reconciling previews', { overdue: overdue.length, failed: failed.length, cutoff: cutoff.toISOString() });
    }

    // One at a time to keep pressure on the platform APIs low
    for (const record of due) {
      // eslint-disable-next-line no-await-in-loop
      const result = await this.options.cleanup.run(record.previewId, { reason: 'reconcile' });
      summary[result.outcome] += 1;
    }

    return summary;
  }

  start(): void {
    if (this.timer || this.options.intervalSeconds <= 0) return;
    this.timer = setInterval(() => {
      this.sweep().catch((err: unknown) => {
        logger.error('Reconcile sweep failed', { err: errorMessage(err) });
      });
    }, this.options.intervalSeconds * 1000);
    this.timer.unref();
    logger.info('Reconciler started', { intervalSeconds: this.options.intervalSeconds });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
