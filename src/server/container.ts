/**
 * Wires the lifecycle components for the configured backends.
 */

import { logger as getLogger } from '../shared/logger.js';
import { createMetadataStore, createRedisConnection } from './database/redis.js';
import { CleanupWorker } from './preview/CleanupWorker.js';
import { PreviewOrchestrator } from './preview/PreviewOrchestrator.js';
import { Reconciler } from './preview/Reconciler.js';
import { CaddyService } from './provisioner/CaddyService.js';
import { DockerService } from './provisioner/DockerService.js';
import { PlatformProvisioner } from './provisioner/PlatformProvisioner.js';
import { PortAllocator } from './provisioner/PortAllocator.js';
import { BullScheduleAdapter } from './scheduler/BullScheduleAdapter.js';
import { TimerScheduleAdapter } from './scheduler/TimerScheduleAdapter.js';
import type { MetadataStore } from './database/MetadataStore.js';
import type { ResourceProvisioner } from './provisioner/ResourceProvisioner.js';
import type { ScheduleAdapter } from './scheduler/ScheduleAdapter.js';
import type { Config } from '../shared/interfaces.js';

const logger = getLogger();

export interface Container {
  config: Config;
  store: MetadataStore;
  provisioner: ResourceProvisioner;
  scheduler: ScheduleAdapter;
  cleanup: CleanupWorker;
  orchestrator: PreviewOrchestrator;
  reconciler: Reconciler;
  close(): Promise<void>;
}

/** Collaborators a caller may supply instead of the configured ones */
export interface ContainerOverrides {
  store?: MetadataStore;
  provisioner?: ResourceProvisioner;
  scheduler?: ScheduleAdapter;
}

export function createProvisioner(config: Config): ResourceProvisioner {
  return new PlatformProvisioner({
    docker: new DockerService(),
    caddy: new CaddyService(config.caddy.adminUrl, config.caddy.server),
    ports: new PortAllocator(config.docker, config.docker.bindHost),
    dockerConfig: config.docker,
    upstreamHost: config.caddy.upstreamHost,
    containerPort: config.preview.containerPort,
  });
}

export async function createContainer(config: Config, overrides: ContainerOverrides = {}): Promise<Container> {
  const store = overrides.store ?? await createMetadataStore(config);
  const provisioner = overrides.provisioner ?? createProvisioner(config);

  const closers: Array<() => Promise<unknown>> = [];
  let scheduler: ScheduleAdapter;

  if (overrides.scheduler) {
    scheduler = overrides.scheduler;
  } else if (config.scheduler.driver === 'bullmq') {
    const connection = createRedisConnection(config.redis.url, { forQueue: true });
    const workerConnection = createRedisConnection(config.redis.url, { forQueue: true });
    scheduler = new BullScheduleAdapter({
      queueName: config.scheduler.queueName,
      connection,
      workerConnection,
      keyPrefix: config.redis.keyPrefix,
    });
    closers.push(() => connection.quit(), () => workerConnection.quit());
    logger.info('Using BullMQ expiry triggers', { queue: config.scheduler.queueName });
  } else {
    logger.warn('Using in-process expiry triggers - pending triggers are lost on restart, the reconciler picks them up');
    scheduler = new TimerScheduleAdapter();
  }

  const cleanup = new CleanupWorker({
    store,
    provisioner,
    scheduler,
    retry: config.retry,
    maxAttempts: config.cleanup.maxAttempts,
  });

  const orchestrator = new PreviewOrchestrator({
    store,
    provisioner,
    scheduler,
    cleanup,
    config: config.preview,
    retry: config.retry,
  });

  const reconciler = new Reconciler({
    store,
    cleanup,
    intervalSeconds: config.reconcile.intervalSeconds,
    graceSeconds: config.reconcile.graceSeconds,
  });

  return {
    config,
    store,
    provisioner,
    scheduler,
    cleanup,
    orchestrator,
    reconciler,
    async close() {
      reconciler.stop();
      await scheduler.close();
      await Promise.all(closers.map((fn) => fn()));
      await store.close();
    },
  };
}
