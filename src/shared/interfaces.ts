import { z } from 'zod';

const positiveInt = z.number().int().positive();

export const configSchema = z
  .object({
    server: z.object({
      host: z.string().min(1),
      port: z.number().int().min(0).max(65535),
    }),
    preview: z.object({
      image: z.string().min(1),
      containerPort: z.number().int().min(1).max(65535),
      minTtlHours: positiveInt,
      maxTtlHours: positiveInt,
      maxExtendHours: positiveInt,
      publicBaseUrl: z.string().url(),
      env: z.record(z.string()),
      cpus: z.string().min(1),
      memory: z.string().min(1),
      probeTimeoutMs: positiveInt,
    }),
    docker: z.object({
      bindHost: z.string().min(1),
      network: z.string().optional(),
      minPort: z.number().int().min(1024).max(65535),
      maxPort: z.number().int().min(1024).max(65535),
    }),
    caddy: z.object({
      adminUrl: z.string().url(),
      server: z.string().min(1),
      upstreamHost: z.string().min(1),
    }),
    storage: z.enum(['memory', 'redis']),
    redis: z.object({
      url: z.string().min(1),
      keyPrefix: z.string(),
    }),
    scheduler: z.object({
      driver: z.enum(['timer', 'bullmq']),
      queueName: z.string().min(1),
    }),
    retry: z.object({
      attempts: positiveInt,
      baseDelayMs: z.number().int().min(0),
      maxDelayMs: z.number().int().min(0),
    }),
    cleanup: z.object({
      maxAttempts: positiveInt,
    }),
    reconcile: z.object({
      intervalSeconds: z.number().int().min(0),
      graceSeconds: z.number().int().min(0),
    }),
    logLevel: z.string().min(1),
  })
  .refine((c) => c.preview.minTtlHours <= c.preview.maxTtlHours, {
    message: 'preview.minTtlHours must not exceed preview.maxTtlHours',
    path: ['preview', 'minTtlHours'],
  })
  .refine((c) => c.docker.minPort <= c.docker.maxPort, {
    message: 'docker.minPort must not exceed docker.maxPort',
    path: ['docker', 'minPort'],
  });

export type Config = z.infer<typeof configSchema>;
export type PreviewConfig = Config['preview'];
export type RetryConfig = Config['retry'];

/** Flags accepted on the command line that override the loaded config */
export interface CliOverrides {
  host?: string;
  port?: number;
  logLevel?: string;
  storage?: string;
  scheduler?: string;
  redisUrl?: string;
  image?: string;
}
