import type { Config } from './interfaces.js';

function envInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export const defaultLogLevel = process.env.LOG_LEVEL || 'info';

/**
 * Configuration used when no config file is given. Every value can be
 * overridden from the environment so the service runs from a bare container.
 */
export const configDefault: Config = {
  server: {
    host: process.env.HOST || '0.0.0.0',
    port: envInt('PORT', 8000),
  },
  preview: {
    image: process.env.PREVIEW_IMAGE || 'nginx:alpine',
    containerPort: envInt('PREVIEW_CONTAINER_PORT', 80),
    minTtlHours: envInt('PREVIEW_MIN_TTL_HOURS', 1),
    maxTtlHours: envInt('PREVIEW_MAX_TTL_HOURS', 24),
    maxExtendHours: envInt('PREVIEW_MAX_EXTEND_HOURS', 24),
    publicBaseUrl: process.env.PREVIEW_PUBLIC_BASE_URL || 'http://localhost',
    env: {},
    cpus: process.env.PREVIEW_CPUS || '0.5',
    memory: process.env.PREVIEW_MEMORY || '512m',
    probeTimeoutMs: envInt('PREVIEW_PROBE_TIMEOUT_MS', 5000),
  },
  docker: {
    bindHost: process.env.DOCKER_BIND_HOST || '127.0.0.1',
    network: process.env.DOCKER_NETWORK || undefined,
    minPort: envInt('DOCKER_MIN_PORT', 20000),
    maxPort: envInt('DOCKER_MAX_PORT', 60000),
  },
  caddy: {
    adminUrl: process.env.CADDY_ADMIN_URL || 'http://localhost:2019',
    server: process.env.CADDY_SERVER || 'srv0',
    upstreamHost: process.env.CADDY_UPSTREAM_HOST || 'localhost',
  },
  storage: process.env.LAPSE_STORAGE === 'redis' ? 'redis' : 'memory',
  redis: {
    url: process.env.REDIS_URL || 'redis://localhost:6379',
    keyPrefix: process.env.REDIS_KEY_PREFIX || 'lapse:',
  },
  scheduler: {
    driver: process.env.LAPSE_SCHEDULER === 'bullmq' ? 'bullmq' : 'timer',
    queueName: process.env.LAPSE_QUEUE || 'lapse-cleanup',
  },
  retry: {
    attempts: envInt('LAPSE_RETRY_ATTEMPTS', 4),
    baseDelayMs: envInt('LAPSE_RETRY_BASE_DELAY_MS', 200),
    maxDelayMs: envInt('LAPSE_RETRY_MAX_DELAY_MS', 5000),
  },
  cleanup: {
    maxAttempts: envInt('LAPSE_CLEANUP_ATTEMPTS', 3),
  },
  reconcile: {
    intervalSeconds: envInt('LAPSE_RECONCILE_INTERVAL', 300),
    graceSeconds: envInt('LAPSE_RECONCILE_GRACE', 60),
  },
  logLevel: defaultLogLevel,
};
