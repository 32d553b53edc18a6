/**
 * Cleanup Worker
 *
 * Idempotent teardown of a preview, shared by expiry triggers, user deletes
 * and the reconciler. Teardown failures never escape `run`: after the last
 * attempt the preview is left as 'failed' for an operator or a later sweep.
 */

import { setTimeout as sleep } from 'timers/promises';
import { logger as getLogger } from '../../shared/logger.js';
import { cleanupRuns } from '../metrics.js';
import { deterministicRefs } from '../provisioner/ResourceProvisioner.js';
import { scheduleRefFor } from '../scheduler/ScheduleAdapter.js';
import { TeardownFailedError, errorMessage } from './errors.js';
import { assertTransition, canTransition } from './lifecycle.js';
import { backoffDelay, withRetry } from './retry.js';
import type { CleanupOutcome, CleanupReason, CleanupResult, PreviewRecord } from './types.js';
import type { RetryPolicy } from './retry.js';
import type { MetadataStore } from '../database/MetadataStore.js';
import type { ResourceProvisioner } from '../provisioner/ResourceProvisioner.js';
import type { ScheduleAdapter, TriggerPayload } from '../scheduler/ScheduleAdapter.js';

const logger = getLogger();

export interface CleanupWorkerDeps {
  store: MetadataStore;
  provisioner: ResourceProvisioner;
  scheduler: ScheduleAdapter;
  retry: RetryPolicy;
  maxAttempts: number;
  now?: () => Date;
}

export interface CleanupOptions {
  reason: CleanupReason;
  expectedExpiresAt?: string;  // Expiry the firing trigger was armed for
}

// Statuses in which a future expiry means "still alive, leave it"
const LIVE_STATUSES = new Set(['creating', 'active', 'extending']);

export class CleanupWorker {
  private store: MetadataStore;

  private provisioner: ResourceProvisioner;

  private scheduler: ScheduleAdapter;

  private retry: RetryPolicy;

  private maxAttempts: number;

  private now: () => Date;

  constructor(deps: CleanupWorkerDeps) {
    this.store = deps.store;
    this.provisioner = deps.provisioner;
    this.scheduler = deps.scheduler;
    this.retry = deps.retry;
    this.maxAttempts = deps.maxAttempts;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Entry point for fired expiry triggers
   */
  async handleTrigger(payload: TriggerPayload): Promise<void> {
    await this.run(payload.previewId, { reason: 'expired', expectedExpiresAt: payload.expiresAt });
  }

  async run(previewId: string, options: CleanupOptions = { reason: 'user' }): Promise<CleanupResult> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      try {
        // eslint-disable-next-line no-await-in-loop
        const outcome = await this.attempt(previewId, options);
        cleanupRuns.inc({ outcome, reason: options.reason });
        return { previewId, outcome, attempts: attempt };
      } catch (err) {
        lastError = err;
        logger.warn('Cleanup attempt failed', {
          previewId,
          reason: options.reason,
          attempt,
          maxAttempts: this.maxAttempts,
          err: errorMessage(err),
        });
        if (attempt < this.maxAttempts) {
          // eslint-disable-next-line no-await-in-loop
          await sleep(backoffDelay(this.retry, attempt));
        }
      }
    }

    const failure = new TeardownFailedError(previewId, lastError);
    await this.markFailed(previewId, failure.message);
    cleanupRuns.inc({ outcome: 'failed', reason: options.reason });
    logger.error('Cleanup gave up, preview needs attention', { previewId, reason: options.reason, err: failure.message });
    return { previewId, outcome: 'failed', attempts: this.maxAttempts, error: failure.message };
  }

  private async attempt(previewId: string, options: CleanupOptions): Promise<CleanupOutcome> {
    const record = await this.store.getByID(previewId);
    if (!record) {
      logger.info('Nothing to clean up, preview already gone', { previewId, reason: options.reason });
      return 'absent';
    }

    if (options.reason !== 'user' && this.stillAlive(record, options.expectedExpiresAt)) {
      logger.info('Preview was extended, skipping teardown', {
        previewId,
        reason: options.reason,
        expiresAt: record.expiresAt,
        triggerExpiresAt: options.expectedExpiresAt,
      });
      await this.ensureArmed(record);
      return 'skipped';
    }

    assertTransition(record.status, 'deleting');
    const marked = await this.store.conditionalUpdate(previewId, record.version, (r) => ({
      ...r,
      status: 'deleting',
    }));

    await this.teardown(marked);
    logger.info('Preview torn down', { previewId, reason: options.reason });
    return 'deleted';
  }

  /**
   * A trigger armed for the stored expiry (or a later one) is due whatever the
   * local clock reads; only an extension past it keeps the preview alive.
   */
  private stillAlive(record: PreviewRecord, triggerExpiresAt?: string): boolean {
    if (!LIVE_STATUSES.has(record.status)) return false;
    const expiresAt = Date.parse(record.expiresAt);
    if (triggerExpiresAt !== undefined && Date.parse(triggerExpiresAt) >= expiresAt) return false;
    return expiresAt > this.now().getTime();
  }

  /**
   * Route first so traffic stops before the unit goes; the record goes last
   * so an interrupted teardown leaves a 'deleting' record behind.
   */
  private async teardown(record: PreviewRecord): Promise<void> {
    const { previewId } = record;
    const fallback = deterministicRefs(previewId);
    const route = record.resourceRefs.route ?? fallback.route;
    const unit = record.resourceRefs.unit ?? fallback.unit;

    await withRetry('Delete route', this.retry, () => this.provisioner.deleteRoute(route));
    await withRetry('Delete unit', this.retry, () => this.provisioner.deleteUnit(unit));
    await this.scheduler.disarm(previewId);
    await this.store.delete(previewId);
  }

  /**
   * A skipped trigger may have been the only one left, e.g. when re-arming
   * failed during an extend. Make sure one exists for the stored expiry.
   */
  private async ensureArmed(record: PreviewRecord): Promise<void> {
    const expiresAt = new Date(record.expiresAt);
    if (record.scheduleRef === scheduleRefFor(record.previewId, expiresAt)) {
      return;
    }
    try {
      const scheduleRef = await this.scheduler.arm(record.previewId, expiresAt);
      await this.store.conditionalUpdate(record.previewId, record.version, (r) => ({ ...r, scheduleRef }));
    } catch (err) {
      logger.warn('Could not re-arm expiry trigger, leaving it to the reconciler', {
        previewId: record.previewId,
        err: errorMessage(err),
      });
    }
  }

  private async markFailed(previewId: string, message: string): Promise<void> {
    try {
      const record = await this.store.getByID(previewId);
      if (!record) return;
      if (!canTransition(record.status, 'failed')) {
        logger.warn('Preview not marked failed, another writer moved it on', { previewId, status: record.status });
        return;
      }
      await this.store.conditionalUpdate(previewId, record.version, (r) => ({
        ...r,
        status: 'failed',
        lastError: message,
      }));
    } catch (err) {
      logger.error('Failed to record teardown failure', { previewId, err: errorMessage(err) });
    }
  }
}
