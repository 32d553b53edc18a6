/**
 * Preview Orchestrator
 *
 * Owns the create and extend paths of the preview lifecycle and answers
 * status queries. Teardown is delegated to the CleanupWorker. All state
 * shared with other instances lives in the metadata store and is changed
 * only through version-checked writes.
 */

import { randomUUID } from 'crypto';
import { logger as getLogger } from '../../shared/logger.js';
import { previewCreateFailures, previewsCreated } from '../metrics.js';
import { deterministicRefs, pathPrefixFor, resourceName } from '../provisioner/ResourceProvisioner.js';
import {
  ConflictError,
  CreationFailedError,
  InvalidStateError,
  NotFoundError,
  ValidationError,
  errorMessage,
} from './errors.js';
import { assertTransition, canTransition } from './lifecycle.js';
import { fetchProbe } from './probe.js';
import { withRetry } from './retry.js';
import type { CleanupWorker } from './CleanupWorker.js';
import type { HttpProbe } from './probe.js';
import type { RetryPolicy } from './retry.js';
import type {
  CleanupResult,
  CreatedPreview,
  ExtendedPreview,
  PreviewDetail,
  PreviewRecord,
  PreviewTestResult,
  ResourceRefs,
} from './types.js';
import type { PreviewConfig } from '../../shared/interfaces.js';
import type { MetadataStore } from '../database/MetadataStore.js';
import type { ResourceProvisioner, RouteHealth } from '../provisioner/ResourceProvisioner.js';
import type { ScheduleAdapter } from '../scheduler/ScheduleAdapter.js';

const logger = getLogger();

const HOUR_MS = 60 * 60 * 1000;
// Previews probed at once when listing
const DESCRIBE_BATCH = 8;
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

// Scheduler and store calls fail with plain errors; retry all of them
const retryAny = (): boolean => true;

export interface PreviewOrchestratorDeps {
  store: MetadataStore;
  provisioner: ResourceProvisioner;
  scheduler: ScheduleAdapter;
  cleanup: CleanupWorker;
  config: PreviewConfig;
  retry: RetryPolicy;
  now?: () => Date;
  generateId?: () => string;
  httpProbe?: HttpProbe;
}

export function assertPreviewId(previewId: string): void {
  if (!UUID_PATTERN.test(previewId)) {
    throw new ValidationError('Malformed preview id', [`'${previewId}' is not a UUID`]);
  }
}

function assertWholeHours(field: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ValidationError(`${field} must be a whole number between ${min} and ${max}`, [
      `${field}: received ${value}`,
    ]);
  }
}

function isTakeover(err: unknown): boolean {
  return err instanceof ConflictError || err instanceof NotFoundError || err instanceof InvalidStateError;
}

export class PreviewOrchestrator {
  private store: MetadataStore;

  private provisioner: ResourceProvisioner;

  private scheduler: ScheduleAdapter;

  private cleanup: CleanupWorker;

  private config: PreviewConfig;

  private retry: RetryPolicy;

  private now: () => Date;

  private generateId: () => string;

  private httpProbe: HttpProbe;

  constructor(deps: PreviewOrchestratorDeps) {
    this.store = deps.store;
    this.provisioner = deps.provisioner;
    this.scheduler = deps.scheduler;
    this.cleanup = deps.cleanup;
    this.config = deps.config;
    this.retry = deps.retry;
    this.now = deps.now ?? (() => new Date());
    this.generateId = deps.generateId ?? randomUUID;
    this.httpProbe = deps.httpProbe ?? fetchProbe;
  }

  previewUrlFor(previewId: string): string {
    return `${this.config.publicBaseUrl.replace(/\/$/, '')}/${resourceName(previewId)}`;
  }

  /**
   * Create a preview that tears itself down after `ttlHours`
   */
  async create(ttlHours: number): Promise<CreatedPreview> {
    assertWholeHours('ttl_hours', ttlHours, this.config.minTtlHours, this.config.maxTtlHours);

    const previewId = this.generateId();
    const createdAt = this.now();
    const expiresAt = new Date(createdAt.getTime() + ttlHours * HOUR_MS);
    const previewUrl = this.previewUrlFor(previewId);

    // Persisted up front so a concurrent delete can see the preview
    let record: PreviewRecord = {
      previewId,
      status: 'creating',
      createdAt: createdAt.toISOString(),
      expiresAt: expiresAt.toISOString(),
      resourceRefs: {},
      previewUrl,
      version: 1,
      updatedAt: createdAt.toISOString(),
    };
    await this.store.put(record);

    logger.info('Creating preview', { previewId, ttlHours, expiresAt: record.expiresAt });

    const created: ResourceRefs = {};
    let armed = false;

    try {
      const unit = await withRetry('Create unit', this.retry, () => this.provisioner.createUnit({
        previewId,
        image: this.config.image,
        containerPort: this.config.containerPort,
        env: { ...this.config.env, PREVIEW_ID: previewId, PREVIEW_URL: previewUrl },
        cpus: this.config.cpus,
        memory: this.config.memory,
      }));
      created.unit = unit;

      created.route = await withRetry('Create route', this.retry, () => this.provisioner.createRoute(unit, pathPrefixFor(previewId)));

      record = await this.store.conditionalUpdate(previewId, record.version, (r) => {
        assertTransition(r.status, 'active');
        return { ...r, status: 'active', resourceRefs: { ...created } };
      });

      const scheduleRef = await withRetry('Arm expiry trigger', this.retry, () => this.scheduler.arm(previewId, expiresAt), retryAny);
      armed = true;
      await this.recordScheduleRef(record, scheduleRef);
    } catch (err) {
      throw await this.rollback(record, created, armed, err);
    }

    previewsCreated.inc();
    logger.info('Preview created', { previewId, previewUrl, expiresAt: record.expiresAt });
    return { previewId, previewUrl, expiresAt: record.expiresAt };
  }

  /**
   * Store the trigger handle on a freshly activated record. Losing this write
   * to an extend is fine (the extend armed its own trigger); losing it to a
   * delete means the preview is being torn down and create must not succeed.
   */
  private async recordScheduleRef(record: PreviewRecord, scheduleRef: string): Promise<void> {
    try {
      await this.store.conditionalUpdate(record.previewId, record.version, (r) => ({ ...r, scheduleRef }));
    } catch (err) {
      if (!(err instanceof ConflictError)) throw err;
      const current = await this.store.getByID(record.previewId);
      if (current && (current.status === 'active' || current.status === 'extending')) {
        return;
      }
      throw err;
    }
  }

  /**
   * Undo a failed create. Deterministic names cover resources whose create
   * call failed after the platform had already accepted it.
   */
  private async rollback(record: PreviewRecord, created: ResourceRefs, armed: boolean, cause: unknown): Promise<Error> {
    const { previewId } = record;
    const fallback = deterministicRefs(previewId);
    logger.warn('Preview creation failed, rolling back', { previewId, err: errorMessage(cause) });

    let rolledBack = true;
    try {
      await withRetry('Rollback route', this.retry, () => this.provisioner.deleteRoute(created.route ?? fallback.route));
      await withRetry('Rollback unit', this.retry, () => this.provisioner.deleteUnit(created.unit ?? fallback.unit));
      if (armed) {
        await withRetry('Rollback trigger', this.retry, () => this.scheduler.disarm(previewId), retryAny);
      }
    } catch (err) {
      rolledBack = false;
      logger.error('Rollback failed', { previewId, err: errorMessage(err) });
    }

    const current = await this.store.getByID(previewId).catch((err: unknown) => {
      logger.error('Could not read preview during rollback', { previewId, err: errorMessage(err) });
      return null;
    });
    // Someone else (a user delete) owns the record now
    const takenOver = isTakeover(cause) && (!current || current.version !== record.version);

    if (rolledBack && !takenOver) {
      await this.store.delete(previewId).catch((err: unknown) => {
        logger.error('Could not remove record of rolled back preview', { previewId, err: errorMessage(err) });
      });
    } else if (!rolledBack) {
      await this.persistFailed(record, current, created, errorMessage(cause));
    }

    previewCreateFailures.inc({ rolled_back: String(rolledBack) });

    if (takenOver && rolledBack) {
      return new ConflictError(`Preview ${previewId} was deleted while it was being created`);
    }
    return new CreationFailedError(previewId, rolledBack, cause);
  }

  private async persistFailed(
    record: PreviewRecord,
    current: PreviewRecord | null,
    created: ResourceRefs,
    lastError: string,
  ): Promise<void> {
    try {
      if (!current) {
        await this.store.put({
          ...record,
          status: 'failed',
          resourceRefs: { ...created },
          lastError,
          version: 1,
          updatedAt: this.now().toISOString(),
        });
        return;
      }
      if (!canTransition(current.status, 'failed')) {
        logger.warn('Leaving preview status as is after failed rollback', { previewId: record.previewId, status: current.status });
        return;
      }
      await this.store.conditionalUpdate(current.previewId, current.version, (r) => ({
        ...r,
        status: 'failed',
        resourceRefs: { ...r.resourceRefs, ...created },
        lastError,
      }));
    } catch (err) {
      logger.error('Could not mark preview as failed', { previewId: record.previewId, err: errorMessage(err) });
    }
  }

  /**
   * Push the expiry of an active preview forward and re-arm its trigger
   */
  async extend(previewId: string, additionalHours: number): Promise<ExtendedPreview> {
    assertPreviewId(previewId);
    assertWholeHours('additional_hours', additionalHours, 1, this.config.maxExtendHours);

    const record = await this.store.getByID(previewId);
    if (!record) {
      throw new NotFoundError(previewId);
    }
    if (record.status !== 'active') {
      throw new InvalidStateError(`Cannot extend preview ${previewId} while it is '${record.status}'`);
    }

    const expiresAt = new Date(Date.parse(record.expiresAt) + additionalHours * HOUR_MS);

    const extending = await this.store.conditionalUpdate(previewId, record.version, (r) => {
      assertTransition(r.status, 'extending');
      return { ...r, status: 'extending', expiresAt: expiresAt.toISOString() };
    });

    let scheduleRef: string;
    try {
      scheduleRef = await withRetry('Re-arm expiry trigger', this.retry, () => this.scheduler.arm(previewId, expiresAt), retryAny);
    } catch (err) {
      logger.error('Could not re-arm expiry trigger', { previewId, err: errorMessage(err) });
      // Keep the new expiry; the reconciler sweep still covers the preview
      try {
        await this.store.conditionalUpdate(previewId, extending.version, (r) => {
          assertTransition(r.status, 'active');
          return { ...r, status: 'active', scheduleRef: undefined };
        });
      } catch (restoreErr) {
        logger.warn('Preview not returned to active after failed re-arm', { previewId, err: errorMessage(restoreErr) });
      }
      throw err;
    }

    await this.store.conditionalUpdate(previewId, extending.version, (r) => {
      assertTransition(r.status, 'active');
      return { ...r, status: 'active', scheduleRef };
    });

    logger.info('Preview extended', { previewId, additionalHours, expiresAt: expiresAt.toISOString() });
    return { previewId, expiresAt: expiresAt.toISOString() };
  }

  /**
   * Tear a preview down now. Unknown ids succeed as 'absent'.
   */
  async delete(previewId: string): Promise<CleanupResult> {
    assertPreviewId(previewId);
    return this.cleanup.run(previewId, { reason: 'user' });
  }

  async getStatus(previewId: string): Promise<PreviewDetail> {
    assertPreviewId(previewId);
    const record = await this.store.getByID(previewId);
    if (!record) {
      throw new NotFoundError(previewId);
    }
    return this.describe(record);
  }

  async list(): Promise<PreviewDetail[]> {
    const records = await this.store.list();
    const details: PreviewDetail[] = [];
    for (let i = 0; i < records.length; i += DESCRIBE_BATCH) {
      const batch = records.slice(i, i + DESCRIBE_BATCH);
      // eslint-disable-next-line no-await-in-loop
      details.push(...await Promise.all(batch.map((record) => this.describe(record))));
    }
    return details;
  }

  async testPreview(previewId: string): Promise<PreviewTestResult> {
    assertPreviewId(previewId);
    const record = await this.store.getByID(previewId);
    if (!record) {
      throw new NotFoundError(previewId);
    }
    return this.httpProbe(record.previewUrl, this.config.probeTimeoutMs);
  }

  /**
   * Attach live unit and route state; probe failures read as 'unknown'
   */
  private async describe(record: PreviewRecord): Promise<PreviewDetail> {
    const fallback = deterministicRefs(record.previewId);
    const unitRef = record.resourceRefs.unit ?? fallback.unit;
    const routeRef = record.resourceRefs.route;

    const [unit, route] = await Promise.all([
      this.provisioner.describeUnit(unitRef).catch((err: unknown) => {
        logger.debug('Unit probe failed', { previewId: record.previewId, err: errorMessage(err) });
        return { state: 'unknown' as const };
      }),
      routeRef
        ? this.provisioner.describeRoute(routeRef).catch((err: unknown): RouteHealth => {
          logger.debug('Route probe failed', { previewId: record.previewId, err: errorMessage(err) });
          return { health: 'unknown', targets: [] };
        })
        : Promise.resolve<RouteHealth>({ health: 'unknown', targets: [] }),
    ]);

    return { record, unit, route };
  }
}
