/**
 * Platform Provisioner
 *
 * Compute units are Docker containers published on a host port; routing
 * rules are Caddy routes forwarding a path prefix to that port.
 */

import { logger as getLogger } from '../../shared/logger.js';
import { ProvisionerPermanentError } from '../preview/errors.js';
import { resourceName } from './ResourceProvisioner.js';
import type { CaddyService, CaddyUpstream } from './CaddyService.js';
import type { DockerService } from './DockerService.js';
import type { PortAllocator } from './PortAllocator.js';
import type {
  ResourceProvisioner,
  RouteHealth,
  RouteRef,
  UnitDescription,
  UnitRef,
  UnitSpec,
} from './ResourceProvisioner.js';
import type { Config } from '../../shared/interfaces.js';

const logger = getLogger();

export interface PlatformProvisionerOptions {
  docker: DockerService;
  caddy: CaddyService;
  ports: PortAllocator;
  dockerConfig: Config['docker'];
  upstreamHost: string;
  containerPort: number;
}

export class PlatformProvisioner implements ResourceProvisioner {
  private docker: DockerService;

  private caddy: CaddyService;

  private ports: PortAllocator;

  private dockerConfig: Config['docker'];

  private upstreamHost: string;

  private containerPort: number;

  // Concurrent route probes share one upstream lookup
  private upstreamsInFlight: Promise<CaddyUpstream[]> | null = null;

  constructor(opts: PlatformProvisionerOptions) {
    this.docker = opts.docker;
    this.caddy = opts.caddy;
    this.ports = opts.ports;
    this.dockerConfig = opts.dockerConfig;
    this.upstreamHost = opts.upstreamHost;
    this.containerPort = opts.containerPort;
  }

  async createUnit(spec: UnitSpec): Promise<UnitRef> {
    const name = resourceName(spec.previewId);
    const existing = await this.docker.inspect(name, spec.containerPort);
    const hostPort = existing?.hostPort ?? await this.ports.allocate();

    const container = await this.docker.runContainer({
      name,
      previewId: spec.previewId,
      image: spec.image,
      hostPort,
      containerPort: spec.containerPort,
      bindHost: this.dockerConfig.bindHost,
      network: this.dockerConfig.network,
      env: spec.env,
      cpus: spec.cpus,
      memory: spec.memory,
    });

    return { name: container.name, hostPort: container.hostPort ?? hostPort };
  }

  async deleteUnit(ref: UnitRef): Promise<void> {
    await this.docker.remove(ref.name);
  }

  async createRoute(unit: UnitRef, pathPrefix: string): Promise<RouteRef> {
    if (unit.hostPort === undefined) {
      throw new ProvisionerPermanentError(`Unit ${unit.name} has no published port to route to`);
    }
    const upstream = `${this.upstreamHost}:${unit.hostPort}`;
    const routeId = unit.name;
    await this.caddy.addRoute(routeId, pathPrefix, upstream);
    return { id: routeId, pathPrefix, upstream };
  }

  async deleteRoute(ref: RouteRef): Promise<void> {
    await this.caddy.removeRoute(ref.id);
  }

  async describeUnit(ref: UnitRef): Promise<UnitDescription> {
    const info = await this.docker.inspect(ref.name, this.containerPort);
    if (!info) {
      return { state: 'missing', desired: 1, running: 0, pending: 0 };
    }
    if (info.running) {
      return { state: 'running', desired: 1, running: 1, pending: 0 };
    }
    if (info.status === 'created' || info.status === 'restarting') {
      return { state: 'pending', desired: 1, running: 0, pending: 1 };
    }
    return { state: 'stopped', desired: 1, running: 0, pending: 0 };
  }

  async describeRoute(ref: RouteRef): Promise<RouteHealth> {
    if (!ref.upstream) {
      return { health: 'unknown', targets: [] };
    }
    const upstreams = await this.currentUpstreams();
    const targets = upstreams
      .filter((u) => u.address === ref.upstream)
      .map((u) => ({
        address: u.address,
        health: u.fails === 0 ? 'healthy' as const : 'unhealthy' as const,
        fails: u.fails,
      }));

    if (targets.length === 0) {
      logger.debug('No upstream registered for route', { routeId: ref.id, upstream: ref.upstream });
      return { health: 'unknown', targets };
    }
    return {
      health: targets.every((t) => t.health === 'healthy') ? 'healthy' : 'unhealthy',
      targets,
    };
  }

  private currentUpstreams(): Promise<CaddyUpstream[]> {
    if (!this.upstreamsInFlight) {
      this.upstreamsInFlight = this.caddy.upstreams().finally(() => {
        this.upstreamsInFlight = null;
      });
    }
    return this.upstreamsInFlight;
  }
}
