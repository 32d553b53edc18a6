/**
 * One-shot expiry triggers.
 *
 * Delivery is at-or-after `fireAt` and at-least-once: handlers must tolerate
 * late, repeated and superseded triggers.
 */

export interface TriggerPayload {
  previewId: string;
  expiresAt: string;          // Expiry the trigger was armed for
}

export type TriggerHandler = (payload: TriggerPayload) => Promise<void>;

export interface ScheduleAdapter {
  /** Register the trigger for a preview, replacing any prior one; returns its handle */
  arm(previewId: string, fireAt: Date): Promise<string>;

  /** Cancel the pending trigger; no-op when none is registered */
  disarm(previewId: string): Promise<void>;

  /** Begin delivering fired triggers to the handler */
  start(handler: TriggerHandler): Promise<void>;

  close(): Promise<void>;
}

export function scheduleRefFor(previewId: string, fireAt: Date): string {
  return `cleanup-${previewId}-${fireAt.getTime()}`;
}
