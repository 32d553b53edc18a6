import type { PreviewRecord } from '../preview/types.js';

export type RecordMutator = (current: PreviewRecord) => PreviewRecord;

/**
 * Durable record of every preview.
 * Allows swapping between Redis and in-memory storage.
 *
 * Writes are atomic per record. `conditionalUpdate` only applies when the
 * stored version equals `expectedVersion`; the store then assigns the next
 * version and `updatedAt`, whatever the mutator returned for them.
 */
export interface MetadataStore {
  /** Insert a fresh record; ConflictError if the id exists */
  put(record: PreviewRecord): Promise<void>;

  getByID(previewId: string): Promise<PreviewRecord | null>;

  /** NotFoundError if absent, ConflictError on version mismatch */
  conditionalUpdate(previewId: string, expectedVersion: number, mutator: RecordMutator): Promise<PreviewRecord>;

  /** Succeeds when the record is already gone */
  delete(previewId: string): Promise<void>;

  /** Records whose expiresAt is strictly before the timestamp, soonest first */
  listExpiringBefore(timestamp: Date): Promise<PreviewRecord[]>;

  /** Every record, soonest expiry first */
  list(): Promise<PreviewRecord[]>;

  close(): Promise<void>;
}
