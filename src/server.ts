/**
 * Lapse server
 * @module Lapse
 */
import { createApp } from './server/app.js';
import { createContainer } from './server/container.js';
import { close, listen } from './server/http/listen.js';
import { startDefaultMetrics } from './server/metrics.js';
import { logger as getLogger } from './shared/logger.js';
import type { ContainerOverrides } from './server/container.js';
import type { Config } from './shared/interfaces.js';
import type http from 'http';

export * from './shared/interfaces.js';
export * from './server/preview/index.js';
export type { ResourceProvisioner } from './server/provisioner/ResourceProvisioner.js';
export type { MetadataStore } from './server/database/MetadataStore.js';
export type { ScheduleAdapter } from './server/scheduler/ScheduleAdapter.js';
export { logger as getLogger } from './shared/logger.js';

export interface RunningServer {
  server: http.Server;
  close(): Promise<void>;
}

/**
 * Starts the Lapse API together with trigger delivery and the reconciler
 * @name startServer
 */
export async function start(config: Config, overrides: ContainerOverrides = {}): Promise<RunningServer> {
  const logger = getLogger();
  logger.info('Starting server', {
    host: config.server.host,
    port: config.server.port,
    storage: config.storage,
    scheduler: config.scheduler.driver,
  });

  startDefaultMetrics();

  const container = await createContainer(config, overrides);
  await container.scheduler.start((payload) => container.cleanup.handleTrigger(payload));
  container.reconciler.start();

  // Catch previews whose triggers were lost while nothing was running
  container.reconciler.sweep().then((summary) => {
    logger.info('Startup reconcile finished', summary);
  }).catch((err: unknown) => {
    logger.error('Startup reconcile failed', { err: err instanceof Error ? err.message : String(err) });
  });

  const server = await listen(createApp({ orchestrator: container.orchestrator }), config.server.host, config.server.port);

  return {
    server,
    async close() {
      logger.info('Shutting down');
      await close(server);
      await container.close();
    },
  };
}
