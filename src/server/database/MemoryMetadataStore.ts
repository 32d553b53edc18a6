import { ConflictError, NotFoundError } from '../preview/errors.js';
import type { MetadataStore, RecordMutator } from './MetadataStore.js';
import type { PreviewRecord } from '../preview/types.js';

function byExpiry(a: PreviewRecord, b: PreviewRecord): number {
  return Date.parse(a.expiresAt) - Date.parse(b.expiresAt);
}

/**
 * In-memory metadata store (development and tests)
 * Note: Data is lost when the process restarts
 */
export class MemoryMetadataStore implements MetadataStore {
  private records: Map<string, PreviewRecord> = new Map();

  private now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  async put(record: PreviewRecord): Promise<void> {
    if (this.records.has(record.previewId)) {
      throw new ConflictError(`Preview ${record.previewId} already exists`);
    }
    this.records.set(record.previewId, structuredClone(record));
  }

  async getByID(previewId: string): Promise<PreviewRecord | null> {
    const record = this.records.get(previewId);
    return record ? structuredClone(record) : null;
  }

  async conditionalUpdate(previewId: string, expectedVersion: number, mutator: RecordMutator): Promise<PreviewRecord> {
    const current = this.records.get(previewId);
    if (!current) {
      throw new NotFoundError(previewId);
    }
    if (current.version !== expectedVersion) {
      throw new ConflictError(`Preview ${previewId} was modified concurrently (expected version ${expectedVersion}, found ${current.version})`);
    }
    const next: PreviewRecord = {
      ...mutator(structuredClone(current)),
      previewId,
      version: expectedVersion + 1,
      updatedAt: this.now().toISOString(),
    };
    this.records.set(previewId, structuredClone(next));
    return next;
  }

  async delete(previewId: string): Promise<void> {
    this.records.delete(previewId);
  }

  async listExpiringBefore(timestamp: Date): Promise<PreviewRecord[]> {
    const cutoff = timestamp.getTime();
    return Array.from(this.records.values())
      .filter((r) => Date.parse(r.expiresAt) < cutoff)
      .sort(byExpiry)
      .map((r) => structuredClone(r));
  }

  async list(): Promise<PreviewRecord[]> {
    return Array.from(this.records.values())
      .sort(byExpiry)
      .map((r) => structuredClone(r));
  }

  // eslint-disable-next-line class-methods-use-this
  async close(): Promise<void> {
    // Nothing to close for in-memory storage
  }
}
