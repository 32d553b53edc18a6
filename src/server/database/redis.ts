import { Redis } from 'ioredis';
import { logger as getLogger } from '../../shared/logger.js';
import { MemoryMetadataStore } from './MemoryMetadataStore.js';
import { RedisMetadataStore } from './RedisMetadataStore.js';
import type { MetadataStore } from './MetadataStore.js';
import type { Config } from '../../shared/interfaces.js';

const logger = getLogger();

/**
 * Open a Redis connection with bounded reconnects and lifecycle logging.
 * BullMQ needs `maxRetriesPerRequest: null` on the connections it uses.
 */
export function createRedisConnection(redisUrl: string, opts: { forQueue?: boolean } = {}): Redis {
  const redis = new Redis(redisUrl, {
    retryStrategy(times) {
      const delay = Math.min(times * 50, 2000);
      return delay;
    },
    maxRetriesPerRequest: opts.forQueue ? null : 3,
    lazyConnect: true,
  });

  redis.on('connect', () => {
    logger.info('Redis connected', { url: redisUrl });
  });

  redis.on('error', (err) => {
    logger.error('Redis error', { err });
  });

  redis.on('close', () => {
    logger.warn('Redis connection closed');
  });

  return redis;
}

/**
 * Build the metadata store the config asks for
 */
export async function createMetadataStore(config: Config): Promise<MetadataStore> {
  if (config.storage === 'memory') {
    logger.warn('Using in-memory metadata store - preview records will be lost on restart!');
    return new MemoryMetadataStore();
  }

  const redis = createRedisConnection(config.redis.url);
  await redis.connect();
  await redis.ping();
  logger.info('Using Redis metadata store', { keyPrefix: config.redis.keyPrefix });
  return new RedisMetadataStore(redis, config.redis.keyPrefix);
}
