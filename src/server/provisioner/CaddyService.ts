/**
 * Caddy Service
 *
 * Manages path-based preview routes through Caddy's admin API.
 */

import { z } from 'zod';
import { logger as getLogger } from '../../shared/logger.js';
import { ProvisionerPermanentError, ProvisionerTransientError } from '../preview/errors.js';

const logger = getLogger();

interface CaddyHandler {
  handler: string;
  routes?: Array<{ handle: CaddyHandler[] }>;
  upstreams?: Array<{ dial: string }>;
  strip_path_prefix?: string;
}

export interface CaddyRouteConfig {
  '@id': string;
  match: Array<{ path: string[] }>;
  handle: CaddyHandler[];
  terminal: boolean;
}

const existingRouteSchema = z.object({
  '@id': z.string().optional(),
  match: z.array(z.record(z.unknown())).optional(),
}).passthrough();

const upstreamSchema = z.object({
  address: z.string(),
  num_requests: z.number().optional(),
  fails: z.number(),
});

export type CaddyUpstream = z.infer<typeof upstreamSchema>;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Route config for a preview: match the prefix, strip it, proxy to the unit
 */
export function buildRouteConfig(routeId: string, pathPrefix: string, upstream: string): CaddyRouteConfig {
  return {
    '@id': routeId,
    match: [{ path: [pathPrefix, `${pathPrefix}/*`] }],
    handle: [{
      handler: 'subroute',
      routes: [
        {
          handle: [{ handler: 'rewrite', strip_path_prefix: pathPrefix }],
        },
        {
          handle: [{
            handler: 'reverse_proxy',
            upstreams: [{ dial: upstream }],
          }],
        },
      ],
    }],
    terminal: true,
  };
}

export class CaddyService {
  private adminUrl: string;

  private serverName: string;

  private fetchImpl: FetchLike;

  constructor(adminUrl = 'http://localhost:2019', serverName = 'srv0', fetchImpl: FetchLike = fetch) {
    this.adminUrl = adminUrl.replace(/\/$/, '');
    this.serverName = serverName;
    this.fetchImpl = fetchImpl;
  }

  private get routesUrl(): string {
    return `${this.adminUrl}/config/apps/http/servers/${this.serverName}/routes`;
  }

  private async request(action: string, url: string, init?: RequestInit): Promise<Response> {
    try {
      return await this.fetchImpl(url, init);
    } catch (err) {
      throw new ProvisionerTransientError(`Caddy ${action} failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }
  }

  private static async fail(action: string, response: Response): Promise<never> {
    const text = await response.text();
    const message = `Caddy ${action} failed: ${response.status} ${text}`;
    if (response.status >= 500) {
      throw new ProvisionerTransientError(message);
    }
    throw new ProvisionerPermanentError(message);
  }

  /**
   * Fetch a route by its @id; null when Caddy does not know it
   */
  async getRoute(routeId: string): Promise<unknown | null> {
    const response = await this.request('get route', `${this.adminUrl}/id/${routeId}`);
    if (response.status === 404) {
      return null;
    }
    if (!response.ok) {
      return CaddyService.fail('get route', response);
    }
    return response.json();
  }

  /**
   * Add a route unless one with the same @id exists. The route goes before
   * the first catch-all route so it is matched first.
   */
  async addRoute(routeId: string, pathPrefix: string, upstream: string): Promise<void> {
    if (await this.getRoute(routeId)) {
      logger.info('Caddy route already present, reusing', { routeId });
      return;
    }

    logger.info('Adding Caddy route', { routeId, pathPrefix, upstream });
    const route = buildRouteConfig(routeId, pathPrefix, upstream);

    const getResponse = await this.request('list routes', this.routesUrl);
    if (!getResponse.ok) {
      await CaddyService.fail('list routes', getResponse);
    }
    const parsed = z.array(existingRouteSchema).nullable().safeParse(await getResponse.json());
    if (!parsed.success) {
      throw new ProvisionerTransientError('Caddy returned an unexpected route list');
    }
    const routes: unknown[] = parsed.data ?? [];

    const insertIndex = (parsed.data ?? []).findIndex((r) => !r.match || r.match.length === 0);

    let response: Response;
    if (insertIndex >= 0) {
      routes.splice(insertIndex, 0, route);
      // PATCH replaces the whole list (PUT answers 409 when the key exists)
      response = await this.request('insert route', this.routesUrl, {
        method: 'PATCH',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(routes),
      });
    } else {
      response = await this.request('append route', this.routesUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(route),
      });
    }
    if (!response.ok) {
      await CaddyService.fail('add route', response);
    }

    logger.info('Caddy route added', { routeId, insertIndex });
  }

  /**
   * Remove a route by its @id; an unknown id counts as removed
   */
  async removeRoute(routeId: string): Promise<void> {
    const response = await this.request('remove route', `${this.adminUrl}/id/${routeId}`, {
      method: 'DELETE',
    });
    if (response.status === 404) {
      logger.debug('Caddy route already gone', { routeId });
      return;
    }
    if (!response.ok) {
      await CaddyService.fail('remove route', response);
    }
    logger.info('Caddy route removed', { routeId });
  }

  /**
   * Health counters of every reverse-proxy upstream Caddy knows about
   */
  async upstreams(): Promise<CaddyUpstream[]> {
    const response = await this.request('list upstreams', `${this.adminUrl}/reverse_proxy/upstreams`);
    if (!response.ok) {
      return CaddyService.fail('list upstreams', response);
    }
    const parsed = z.array(upstreamSchema).nullable().safeParse(await response.json());
    if (!parsed.success) {
      throw new ProvisionerTransientError('Caddy returned an unexpected upstream list');
    }
    return parsed.data ?? [];
  }
}
