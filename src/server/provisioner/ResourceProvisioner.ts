/**
 * Capability set over the platform's compute units and routing rules.
 *
 * Deletes treat "not found" as success. Creates are keyed by a logical name
 * derived from the preview id, so a retried create returns the existing
 * resource instead of producing a duplicate.
 */

export interface UnitSpec {
  previewId: string;
  image: string;
  containerPort: number;
  env: Record<string, string>;
  cpus: string;
  memory: string;
}

export interface UnitRef {
  name: string;               // Container name (preview-{previewId})
  hostPort?: number;          // Port published on the host
}

export interface RouteRef {
  id: string;                 // Route id in the routing layer (preview-{previewId})
  pathPrefix: string;
  upstream?: string;          // host:port the route forwards to
}

export interface UnitDescription {
  state: 'running' | 'pending' | 'stopped' | 'missing';
  desired: number;
  running: number;
  pending: number;
}

export interface RouteTarget {
  address: string;
  health: 'healthy' | 'unhealthy';
  fails: number;
}

export interface RouteHealth {
  health: 'healthy' | 'unhealthy' | 'unknown';
  targets: RouteTarget[];
}

export interface ResourceProvisioner {
  createUnit(spec: UnitSpec): Promise<UnitRef>;
  deleteUnit(ref: UnitRef): Promise<void>;
  createRoute(unit: UnitRef, pathPrefix: string): Promise<RouteRef>;
  deleteRoute(ref: RouteRef): Promise<void>;
  describeUnit(ref: UnitRef): Promise<UnitDescription>;
  describeRoute(ref: RouteRef): Promise<RouteHealth>;
}

export function resourceName(previewId: string): string {
  return `preview-${previewId}`;
}

export function pathPrefixFor(previewId: string): string {
  return `/${resourceName(previewId)}`;
}

/**
 * Handles for a preview derived from its id alone; teardown falls back to
 * these when the record never got to store the real ones.
 */
export function deterministicRefs(previewId: string): { unit: UnitRef; route: RouteRef } {
  return {
    unit: { name: resourceName(previewId) },
    route: { id: resourceName(previewId), pathPrefix: pathPrefixFor(previewId) },
  };
}
