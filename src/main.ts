#!/usr/bin/env node

/**
 * Lapse server
 * @module Lapse
 *
 * CLI interface for Lapse.
 */
import { createRequire } from 'module';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { createContainer } from './server/container.js';
import { assertPreviewId } from './server/preview/PreviewOrchestrator.js';
import { start } from './server.js';
import { loadConfigFile, mergeCliConf } from './shared/config.js';
import { setLevel, logger } from './shared/logger.js';
import type { RunningServer } from './server.js';
import type { Container } from './server/container.js';
import type { Config, CliOverrides } from './shared/interfaces.js';

const require = createRequire(import.meta.url);
const packageJson: unknown = require('../package.json');

function packageField(field: 'name' | 'version', fallback: string): string {
  if (typeof packageJson === 'object' && packageJson !== null && field in packageJson) {
    const value: unknown = Reflect.get(packageJson, field);
    if (typeof value === 'string') return value;
  }
  return fallback;
}

interface GlobalArgs extends CliOverrides {
  conf?: string;
}

async function resolveConfig(args: GlobalArgs): Promise<Config> {
  const config = mergeCliConf(args, await loadConfigFile(args.conf));
  setLevel(config.logLevel);
  return config;
}

function serve(args: GlobalArgs): void {
  let running: RunningServer | null = null;

  resolveConfig(args)
    .then((config) => start(config))
    .then((server) => {
      running = server;
    })
    .catch((err: unknown) => {
      logger().error('error in server', { err: err instanceof Error ? err.message : String(err) });
      process.exitCode = 1;
    });

  // Graceful shutdown on SIGTERM/SIGINT/SIGHUP
  const gracefulShutdown = (signal: string) => {
    logger().info(`Received ${signal}, shutting down gracefully`);
    const closing = running ? running.close() : Promise.resolve();
    closing
      .catch((err: unknown) => {
        logger().error('Error during shutdown', { err: err instanceof Error ? err.message : String(err) });
        process.exitCode = 1;
      })
      .finally(() => process.exit());
  };

  process.once('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.once('SIGINT', () => gracefulShutdown('SIGINT'));
  process.once('SIGHUP', () => gracefulShutdown('SIGHUP')); // Nodemon uses this
}

/**
 * Run the out-of-band commands against the configured store and platform
 */
async function withContainer(args: GlobalArgs, fn: (container: Container) => Promise<boolean>): Promise<void> {
  const container = await createContainer(await resolveConfig(args));
  try {
    const ok = await fn(container);
    process.exitCode = ok ? 0 : 1;
  } finally {
    await container.close();
  }
}

function report(err: unknown): void {
  logger().error('Command failed', { err: err instanceof Error ? err.message : String(err) });
  process.exitCode = 1;
}

yargs(hideBin(process.argv))
  .scriptName(packageField('name', 'lapse'))
  .version(packageField('version', '0.0.0'))
  .option('conf', {
    type: 'string',
    description: 'config file to load config from',
  })
  .option('port', {
    alias: 'p',
    description: 'lapse listen port',
    type: 'number',
  })
  .option('host', {
    description: 'lapse listen host',
    type: 'string',
  })
  .option('log-level', {
    description: 'set log level of lapse server',
    type: 'string',
  })
  .option('storage', {
    description: 'metadata store backend',
    choices: ['memory', 'redis'],
    type: 'string',
  })
  .option('scheduler', {
    description: 'expiry trigger backend',
    choices: ['timer', 'bullmq'],
    type: 'string',
  })
  .option('redis-url', {
    description: 'redis connection url',
    type: 'string',
  })
  .option('image', {
    description: 'container image for new previews',
    type: 'string',
  })
  .command(['serve', '$0'], 'run the preview API', (y) => y, (args) => {
    serve(args);
  })
  .command(
    'cleanup <id>',
    'tear down one preview now',
    (y) => y.positional('id', { type: 'string', demandOption: true, description: 'preview id' }),
    (args) => {
      const { id } = args;
      Promise.resolve()
        .then(() => assertPreviewId(id))
        .then(() => withContainer(args, async ({ cleanup }) => {
          const result = await cleanup.run(id, { reason: 'user' });
          logger().info('Cleanup finished', { previewId: result.previewId, outcome: result.outcome, attempts: result.attempts });
          return result.outcome !== 'failed';
        }))
        .catch(report);
    },
  )
  .command('reconcile', 'clean up every overdue and failed preview once', (y) => y, (args) => {
    withContainer(args, async ({ reconciler }) => {
      const summary = await reconciler.sweep();
      logger().info('Reconcile finished', summary);
      return summary.failed === 0;
    }).catch(report);
  })
  .strict()
  .help()
  .alias('help', 'h')
  .parseSync();
