import { Queue, Worker, type Job } from 'bullmq';
import { logger as getLogger } from '../../shared/logger.js';
import { scheduleRefFor } from './ScheduleAdapter.js';
import type { ScheduleAdapter, TriggerHandler, TriggerPayload } from './ScheduleAdapter.js';
import type { Redis } from 'ioredis';

const log = getLogger();

/** The part of a BullMQ queue the adapter drives */
export interface TriggerQueue {
  add(name: string, data: TriggerPayload, opts: { jobId: string; delay: number }): Promise<unknown>;
  remove(jobId: string): Promise<number>;
  close(): Promise<void>;
}

/** Current job id per preview */
export interface TriggerRefs {
  get(previewId: string): Promise<string | null>;
  set(previewId: string, jobId: string): Promise<void>;
  delete(previewId: string): Promise<void>;
}

export function redisTriggerRefs(connection: Redis, key: string): TriggerRefs {
  return {
    get: (previewId) => connection.hget(key, previewId),
    async set(previewId, jobId) {
      await connection.hset(key, previewId, jobId);
    },
    async delete(previewId) {
      await connection.hdel(key, previewId);
    },
  };
}

export interface BullScheduleAdapterOptions {
  queueName: string;
  connection: Redis;
  workerConnection: Redis;     // Workers need a dedicated connection
  keyPrefix: string;
  concurrency?: number;
  now?: () => Date;
  queue?: TriggerQueue;
  refs?: TriggerRefs;
}

/**
 * Expiry triggers as BullMQ delayed jobs.
 *
 * Every arm gets its own job id (`cleanup-{id}-{fireAtMs}`); the job id that
 * is current for a preview is kept in a Redis hash so a re-arm or disarm can
 * remove the previous delayed job.
 */
export class BullScheduleAdapter implements ScheduleAdapter {
  private queue: TriggerQueue;

  private refs: TriggerRefs;

  private worker: Worker<TriggerPayload> | null = null;

  private opts: BullScheduleAdapterOptions;

  private now: () => Date;

  constructor(opts: BullScheduleAdapterOptions) {
    this.opts = opts;
    this.now = opts.now ?? (() => new Date());
    this.queue = opts.queue ?? new Queue<TriggerPayload>(opts.queueName, {
      connection: opts.connection,
      defaultJobOptions: {
        attempts: 3,
        backoff: { type: 'exponential', delay: 5000 },
        removeOnComplete: true,
        removeOnFail: { count: 500 },
      },
    });
    this.refs = opts.refs ?? redisTriggerRefs(opts.connection, `${opts.keyPrefix}schedule:refs`);
  }

  private async removeJob(previewId: string, jobId: string): Promise<void> {
    const removed = await this.queue.remove(jobId);
    if (removed === 0) {
      // Already ran, or is running right now; the handler revalidates either way
      log.debug('Previous trigger not removed', { previewId, jobId });
    }
  }

  async arm(previewId: string, fireAt: Date): Promise<string> {
    const jobId = scheduleRefFor(previewId, fireAt);
    const prior = await this.refs.get(previewId);

    // New job first, old one last: a failure part way leaves a trigger behind
    const delay = Math.max(0, fireAt.getTime() - this.now().getTime());
    await this.queue.add(
      'cleanup',
      { previewId, expiresAt: fireAt.toISOString() },
      { jobId, delay },
    );
    await this.refs.set(previewId, jobId);

    if (prior && prior !== jobId) {
      // A superseded job left behind is skipped when it fires
      await this.removeJob(previewId, prior).catch((err: unknown) => {
        log.warn('Could not remove superseded trigger', {
          previewId,
          jobId: prior,
          err: err instanceof Error ? err.message : String(err),
        });
      });
    }

    log.info('Armed expiry trigger', { previewId, jobId, delayMs: delay });
    return jobId;
  }

  async disarm(previewId: string): Promise<void> {
    const prior = await this.refs.get(previewId);
    if (!prior) return;
    await this.removeJob(previewId, prior);
    await this.refs.delete(previewId);
    log.info('Disarmed expiry trigger', { previewId, jobId: prior });
  }

  async start(handler: TriggerHandler): Promise<void> {
    this.worker = new Worker<TriggerPayload>(
      this.opts.queueName,
      async (job: Job<TriggerPayload>) => {
        log.info('Expiry trigger fired', { previewId: job.data.previewId, jobId: job.id, attempt: job.attemptsMade + 1 });
        await handler(job.data);
      },
      {
        connection: this.opts.workerConnection,
        concurrency: this.opts.concurrency ?? 5,
      },
    );

    this.worker.on('failed', (job, err) => {
      log.error('Expiry trigger failed', { previewId: job?.data.previewId, jobId: job?.id, err: err.message });
    });
    this.worker.on('error', (err) => {
      log.error('Expiry worker error', { err: err.message });
    });
  }

  async close(): Promise<void> {
    if (this.worker) {
      await this.worker.close();
      this.worker = null;
    }
    await this.queue.close();
  }
}
