import { z } from 'zod';
import { logger as getLogger } from '../../shared/logger.js';
import { ConflictError, NotFoundError } from '../preview/errors.js';
import { PREVIEW_STATUSES } from '../preview/types.js';
import type { MetadataStore, RecordMutator } from './MetadataStore.js';
import type { PreviewRecord } from '../preview/types.js';
import type { Redis } from 'ioredis';

// Insert only when the key is free, indexing by expiry in the same step
const PUT_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 1 then return 0 end
redis.call('SET', KEYS[1], ARGV[1])
redis.call('ZADD', KEYS[2], ARGV[2], ARGV[3])
return 1
`;

// Compare-and-set on the stored version: -1 missing, 0 mismatch, 1 written
const CAS_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if not current then return -1 end
local doc = cjson.decode(current)
if tonumber(doc['version']) ~= tonumber(ARGV[1]) then return 0 end
redis.call('SET', KEYS[1], ARGV[2])
redis.call('ZADD', KEYS[2], ARGV[3], ARGV[4])
return 1
`;

const recordSchema = z.object({
  previewId: z.string(),
  status: z.enum(PREVIEW_STATUSES),
  createdAt: z.string(),
  expiresAt: z.string(),
  resourceRefs: z.object({
    unit: z.object({ name: z.string(), hostPort: z.number().optional() }).optional(),
    route: z.object({ id: z.string(), pathPrefix: z.string(), upstream: z.string().optional() }).optional(),
  }),
  scheduleRef: z.string().optional(),
  previewUrl: z.string(),
  version: z.number().int(),
  updatedAt: z.string(),
  lastError: z.string().optional(),
});

/**
 * Redis metadata store
 *
 * Each preview is a JSON document under `{prefix}preview:{id}`; a sorted set
 * `{prefix}previews:by-expiry` scored by expiry time serves the expiry index.
 */
export class RedisMetadataStore implements MetadataStore {
  private redis: Redis;

  private keyPrefix: string;

  private now: () => Date;

  private logger = getLogger();

  constructor(redis: Redis, keyPrefix = 'lapse:', now: () => Date = () => new Date()) {
    this.redis = redis;
    this.keyPrefix = keyPrefix;
    this.now = now;
  }

  private recordKey(previewId: string): string {
    return `${this.keyPrefix}preview:${previewId}`;
  }

  private get indexKey(): string {
    return `${this.keyPrefix}previews:by-expiry`;
  }

  private parse(previewId: string, data: string | null): PreviewRecord | null {
    if (!data) return null;
    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch {
      this.logger.error('Failed to parse preview record', { previewId });
      return null;
    }
    const parsed = recordSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.error('Stored preview record does not match schema', {
        previewId,
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
      return null;
    }
    return parsed.data;
  }

  async put(record: PreviewRecord): Promise<void> {
    const result = await this.redis.eval(
      PUT_SCRIPT,
      2,
      this.recordKey(record.previewId),
      this.indexKey,
      JSON.stringify(record),
      Date.parse(record.expiresAt),
      record.previewId,
    );
    if (result !== 1) {
      throw new ConflictError(`Preview ${record.previewId} already exists`);
    }
  }

  async getByID(previewId: string): Promise<PreviewRecord | null> {
    const data = await this.redis.get(this.recordKey(previewId));
    return this.parse(previewId, data);
  }

  async conditionalUpdate(previewId: string, expectedVersion: number, mutator: RecordMutator): Promise<PreviewRecord> {
    const current = await this.getByID(previewId);
    if (!current) {
      throw new NotFoundError(previewId);
    }
    if (current.version !== expectedVersion) {
      throw new ConflictError(`Preview ${previewId} was modified concurrently (expected version ${expectedVersion}, found ${current.version})`);
    }

    const next: PreviewRecord = {
      ...mutator(current),
      previewId,
      version: expectedVersion + 1,
      updatedAt: this.now().toISOString(),
    };

    const result = await this.redis.eval(
      CAS_SCRIPT,
      2,
      this.recordKey(previewId),
      this.indexKey,
      expectedVersion,
      JSON.stringify(next),
      Date.parse(next.expiresAt),
      previewId,
    );
    if (result === -1) {
      throw new NotFoundError(previewId);
    }
    if (result !== 1) {
      throw new ConflictError(`Preview ${previewId} was modified concurrently (expected version ${expectedVersion})`);
    }
    return next;
  }

  async delete(previewId: string): Promise<void> {
    await this.redis
      .multi()
      .del(this.recordKey(previewId))
      .zrem(this.indexKey, previewId)
      .exec();
  }

  private async loadMany(previewIds: string[]): Promise<PreviewRecord[]> {
    if (previewIds.length === 0) return [];
    const values = await this.redis.mget(...previewIds.map((id) => this.recordKey(id)));
    const records: PreviewRecord[] = [];
    values.forEach((value, i) => {
      const record = this.parse(previewIds[i] ?? '', value);
      if (record) records.push(record);
    });
    return records;
  }

  async listExpiringBefore(timestamp: Date): Promise<PreviewRecord[]> {
    const ids = await this.redis.zrangebyscore(this.indexKey, '-inf', `(${timestamp.getTime()}`);
    return this.loadMany(ids);
  }

  async list(): Promise<PreviewRecord[]> {
    const ids = await this.redis.zrange(this.indexKey, 0, -1);
    return this.loadMany(ids);
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
