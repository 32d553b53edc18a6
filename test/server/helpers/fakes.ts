import { setLevel } from '../../../src/shared/logger.js';
import { resourceName } from '../../../src/server/provisioner/ResourceProvisioner.js';
import { scheduleRefFor } from '../../../src/server/scheduler/ScheduleAdapter.js';
import type { PreviewConfig, RetryConfig } from '../../../src/shared/interfaces.js';
import type {
  ResourceProvisioner,
  RouteHealth,
  RouteRef,
  UnitDescription,
  UnitRef,
  UnitSpec,
} from '../../../src/server/provisioner/ResourceProvisioner.js';
import type { ScheduleAdapter, TriggerHandler } from '../../../src/server/scheduler/ScheduleAdapter.js';

setLevel('error');

export const NO_WAIT: RetryConfig = { attempts: 3, baseDelayMs: 0, maxDelayMs: 0 };

export const previewConfig: PreviewConfig = {
  image: 'nginx:alpine',
  containerPort: 80,
  minTtlHours: 1,
  maxTtlHours: 24,
  maxExtendHours: 24,
  publicBaseUrl: 'https://previews.test',
  env: {},
  cpus: '0.5',
  memory: '512m',
  probeTimeoutMs: 5000,
};

export const ids = [
  '11111111-1111-4111-8111-111111111111',
  '22222222-2222-4222-8222-222222222222',
  '33333333-3333-4333-8333-333333333333',
];

export function idSequence(list: string[] = ids): () => string {
  let next = 0;
  return () => {
    const id = list[next % list.length];
    next += 1;
    return id;
  };
}

export class Clock {
  private current: number;

  constructor(iso = '2026-01-01T00:00:00.000Z') {
    this.current = Date.parse(iso);
  }

  now = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }

  set(iso: string): void {
    this.current = Date.parse(iso);
  }
}

export const HOUR = 60 * 60 * 1000;

type ProvisionerMethod = keyof ResourceProvisioner;

interface Failure {
  error: Error;
  remaining: number;
}

/**
 * Provisioner over two maps, with per-method failure injection and hooks
 * that run before a call takes effect.
 */
export class FakeProvisioner implements ResourceProvisioner {
  units = new Map<string, UnitSpec>();

  routes = new Map<string, RouteRef>();

  calls: Array<{ method: ProvisionerMethod; target: string }> = [];

  hooks: Partial<Record<ProvisionerMethod, () => Promise<void>>> = {};

  routeHealth: RouteHealth = { health: 'healthy', targets: [{ address: 'localhost:20001', health: 'healthy', fails: 0 }] };

  private failures = new Map<ProvisionerMethod, Failure>();

  fail(method: ProvisionerMethod, error: Error, times = Infinity): void {
    this.failures.set(method, { error, remaining: times });
  }

  heal(method: ProvisionerMethod): void {
    this.failures.delete(method);
  }

  private async enter(method: ProvisionerMethod, target: string): Promise<void> {
    this.calls.push({ method, target });
    const hook = this.hooks[method];
    if (hook) {
      delete this.hooks[method];
      await hook();
    }
    const failure = this.failures.get(method);
    if (failure && failure.remaining > 0) {
      failure.remaining -= 1;
      throw failure.error;
    }
  }

  async createUnit(spec: UnitSpec): Promise<UnitRef> {
    const name = resourceName(spec.previewId);
    await this.enter('createUnit', name);
    this.units.set(name, spec);
    return { name, hostPort: 20001 };
  }

  async deleteUnit(ref: UnitRef): Promise<void> {
    await this.enter('deleteUnit', ref.name);
    this.units.delete(ref.name);
  }

  async createRoute(unit: UnitRef, pathPrefix: string): Promise<RouteRef> {
    await this.enter('createRoute', unit.name);
    const route: RouteRef = { id: unit.name, pathPrefix, upstream: `localhost:${unit.hostPort ?? 0}` };
    this.routes.set(route.id, route);
    return route;
  }

  async deleteRoute(ref: RouteRef): Promise<void> {
    await this.enter('deleteRoute', ref.id);
    this.routes.delete(ref.id);
  }

  async describeUnit(ref: UnitRef): Promise<UnitDescription> {
    await this.enter('describeUnit', ref.name);
    return this.units.has(ref.name)
      ? { state: 'running', desired: 1, running: 1, pending: 0 }
      : { state: 'missing', desired: 0, running: 0, pending: 0 };
  }

  async describeRoute(ref: RouteRef): Promise<RouteHealth> {
    await this.enter('describeRoute', ref.id);
    return this.routeHealth;
  }
}

/**
 * Scheduler that never fires on its own; tests fire triggers explicitly.
 */
export class ManualScheduler implements ScheduleAdapter {
  armed = new Map<string, { ref: string; fireAt: Date }>();

  armCalls = 0;

  /** Runs once, before the next arm takes effect */
  armHook: (() => Promise<void>) | null = null;

  private armFailures = 0;

  private handler: TriggerHandler | null = null;

  failArm(times: number): void {
    this.armFailures = times;
  }

  async arm(previewId: string, fireAt: Date): Promise<string> {
    this.armCalls += 1;
    const hook = this.armHook;
    if (hook) {
      this.armHook = null;
      await hook();
    }
    if (this.armFailures > 0) {
      this.armFailures -= 1;
      throw new Error('scheduler unavailable');
    }
    const ref = scheduleRefFor(previewId, fireAt);
    this.armed.set(previewId, { ref, fireAt });
    return ref;
  }

  async disarm(previewId: string): Promise<void> {
    this.armed.delete(previewId);
  }

  async start(handler: TriggerHandler): Promise<void> {
    this.handler = handler;
  }

  async close(): Promise<void> {
    this.handler = null;
  }

  /** Deliver the trigger armed for a preview, or one for the given expiry */
  async fire(previewId: string, expiresAt?: Date): Promise<void> {
    const fireAt = expiresAt ?? this.armed.get(previewId)?.fireAt;
    if (!this.handler || !fireAt) {
      throw new Error(`No trigger to fire for ${previewId}`);
    }
    await this.handler({ previewId, expiresAt: fireAt.toISOString() });
  }
}

/** Resolve to the error a promise rejects with; fail when it resolves */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('Expected the promise to reject');
}
