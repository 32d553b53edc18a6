/**
 * Docker Service
 *
 * Runs, inspects and removes preview containers through the docker CLI.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { z } from 'zod';
import { logger as getLogger } from '../../shared/logger.js';
import { ProvisionerPermanentError, ProvisionerTransientError } from '../preview/errors.js';

const execFileAsync = promisify(execFile);
const logger = getLogger();

const PREVIEW_LABEL = 'lapse.preview';

// Failures no retry can fix
const PERMANENT_PATTERNS = [
  /no such image/i,
  /pull access denied/i,
  /manifest unknown/i,
  /invalid reference format/i,
  /repository does not exist/i,
  /invalid argument/i,
  /unknown flag/i,
];

const NOT_FOUND_PATTERN = /no such (container|object)/i;
const NAME_IN_USE_PATTERN = /is already in use by container/i;

const portBindingSchema = z.object({ HostIp: z.string(), HostPort: z.string() });

const containerSchema = z.object({
  Name: z.string(),
  State: z.object({
    Status: z.string(),
    Running: z.boolean(),
    Restarting: z.boolean().optional(),
  }),
  NetworkSettings: z
    .object({
      Ports: z.record(z.array(portBindingSchema).nullable()).nullable().optional(),
    })
    .optional(),
});

export interface ContainerInfo {
  name: string;
  status: string;             // created | running | restarting | exited | ...
  running: boolean;
  hostPort?: number;
}

export interface RunOptions {
  name: string;
  previewId: string;
  image: string;
  hostPort: number;
  containerPort: number;
  bindHost: string;
  network?: string;
  env: Record<string, string>;
  cpus: string;
  memory: string;
}

export type DockerRunner = (args: string[]) => Promise<{ stdout: string; stderr: string }>;

const defaultRunner: DockerRunner = (args) => execFileAsync('docker', args);

function outputOf(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'stderr' in err) {
    const { stderr } = err;
    if (typeof stderr === 'string' && stderr.trim()) return stderr.trim();
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Map a failed docker invocation onto the provisioner error taxonomy
 */
export function classifyDockerError(action: string, err: unknown): ProvisionerTransientError | ProvisionerPermanentError {
  const output = outputOf(err);
  const message = `docker ${action} failed: ${output}`;
  if (PERMANENT_PATTERNS.some((pattern) => pattern.test(output))) {
    return new ProvisionerPermanentError(message, { cause: err });
  }
  return new ProvisionerTransientError(message, { cause: err });
}

export class DockerService {
  private run: DockerRunner;

  constructor(runner: DockerRunner = defaultRunner) {
    this.run = runner;
  }

  /**
   * Inspect a container by name; null when it does not exist
   */
  async inspect(name: string, containerPort?: number): Promise<ContainerInfo | null> {
    let stdout: string;
    try {
      ({ stdout } = await this.run(['container', 'inspect', name]));
    } catch (err) {
      if (NOT_FOUND_PATTERN.test(outputOf(err))) {
        return null;
      }
      throw classifyDockerError('inspect', err);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(stdout);
    } catch (err) {
      throw new ProvisionerTransientError(`docker inspect returned invalid JSON for ${name}`, { cause: err });
    }

    const parsed = z.array(containerSchema).safeParse(raw);
    if (!parsed.success || parsed.data.length === 0) {
      throw new ProvisionerTransientError(`docker inspect returned unexpected output for ${name}`);
    }
    const [container] = parsed.data;

    let hostPort: number | undefined;
    const ports = container.NetworkSettings?.Ports;
    if (ports && containerPort) {
      const binding = ports[`${containerPort}/tcp`]?.[0];
      if (binding) hostPort = parseInt(binding.HostPort, 10);
    }

    return {
      name: container.Name.replace(/^\//, ''),
      status: container.State.Status,
      running: container.State.Running,
      hostPort,
    };
  }

  /**
   * Start a detached container. An existing container with the same name is
   * returned as-is, which makes a retried run safe.
   */
  async runContainer(opts: RunOptions): Promise<ContainerInfo> {
    const existing = await this.inspect(opts.name, opts.containerPort);
    if (existing) {
      logger.info('Container already exists, reusing', { name: opts.name, status: existing.status });
      return existing;
    }

    const args = [
      'run', '-d',
      '--name', opts.name,
      '--label', `${PREVIEW_LABEL}=${opts.previewId}`,
      '--restart', 'unless-stopped',
      '--cpus', opts.cpus,
      '--memory', opts.memory,
      '-p', `${opts.bindHost}:${opts.hostPort}:${opts.containerPort}`,
    ];
    if (opts.network) {
      args.push('--network', opts.network);
    }
    for (const [key, value] of Object.entries(opts.env)) {
      args.push('-e', `${key}=${value}`);
    }
    args.push(opts.image);

    logger.info('Starting preview container', { name: opts.name, image: opts.image, hostPort: opts.hostPort });

    try {
      await this.run(args);
    } catch (err) {
      if (NAME_IN_USE_PATTERN.test(outputOf(err))) {
        // Lost a race against a retry of the same create
        const raced = await this.inspect(opts.name, opts.containerPort);
        if (raced) return raced;
      }
      throw classifyDockerError('run', err);
    }

    return {
      name: opts.name,
      status: 'created',
      running: false,
      hostPort: opts.hostPort,
    };
  }

  /**
   * Force-remove a container; a missing container counts as removed
   */
  async remove(name: string): Promise<void> {
    try {
      await this.run(['rm', '-f', name]);
      logger.info('Container removed', { name });
    } catch (err) {
      if (NOT_FOUND_PATTERN.test(outputOf(err))) {
        logger.debug('Container already gone', { name });
        return;
      }
      throw classifyDockerError('rm', err);
    }
  }
}
