import { logger as getLogger } from '../../shared/logger.js';
import { scheduleRefFor } from './ScheduleAdapter.js';
import type { ScheduleAdapter, TriggerHandler, TriggerPayload } from './ScheduleAdapter.js';

const logger = getLogger();

// setTimeout overflows above 2^31 - 1 ms; longer waits are chained
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

interface ArmedTimer {
  ref: string;
  fireAt: Date;
  timer: NodeJS.Timeout;
}

/**
 * In-process scheduler backed by timers. Triggers do not survive a restart;
 * the reconciler sweep picks up previews whose trigger was lost.
 */
export class TimerScheduleAdapter implements ScheduleAdapter {
  private timers = new Map<string, ArmedTimer>();

  private handler: TriggerHandler | null = null;

  private pending: TriggerPayload[] = [];

  private now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  async arm(previewId: string, fireAt: Date): Promise<string> {
    this.clear(previewId);
    const ref = scheduleRefFor(previewId, fireAt);
    this.schedule(previewId, ref, fireAt);
    logger.debug('Armed expiry timer', { previewId, fireAt: fireAt.toISOString() });
    return ref;
  }

  async disarm(previewId: string): Promise<void> {
    if (this.clear(previewId)) {
      logger.debug('Disarmed expiry timer', { previewId });
    }
  }

  async start(handler: TriggerHandler): Promise<void> {
    this.handler = handler;
    const queued = this.pending.splice(0);
    queued.forEach((payload) => this.deliver(payload));
  }

  async close(): Promise<void> {
    this.timers.forEach(({ timer }) => clearTimeout(timer));
    this.timers.clear();
    this.handler = null;
  }

  /** Handles of the currently armed timers, by preview id */
  armed(): Map<string, string> {
    return new Map(Array.from(this.timers.entries(), ([id, t]) => [id, t.ref]));
  }

  private clear(previewId: string): boolean {
    const existing = this.timers.get(previewId);
    if (!existing) return false;
    clearTimeout(existing.timer);
    this.timers.delete(previewId);
    return true;
  }

  private schedule(previewId: string, ref: string, fireAt: Date): void {
    const remaining = fireAt.getTime() - this.now().getTime();
    const delay = Math.min(Math.max(remaining, 0), MAX_TIMER_DELAY_MS);
    const timer = setTimeout(() => {
      if (this.timers.get(previewId)?.ref !== ref) return;
      if (remaining > MAX_TIMER_DELAY_MS) {
        this.schedule(previewId, ref, fireAt);
        return;
      }
      this.timers.delete(previewId);
      this.deliver({ previewId, expiresAt: fireAt.toISOString() });
    }, delay);
    timer.unref();
    this.timers.set(previewId, { ref, fireAt, timer });
  }

  private deliver(payload: TriggerPayload): void {
    if (!this.handler) {
      this.pending.push(payload);
      return;
    }
    this.handler(payload).catch((err: unknown) => {
      logger.error('Expiry trigger handler failed', { previewId: payload.previewId, err });
    });
  }
}
