import { expect } from 'chai';
import { ProvisionerPermanentError, ProvisionerTransientError } from '../../../src/server/preview/errors.js';
import { CaddyService, buildRouteConfig } from '../../../src/server/provisioner/CaddyService.js';
import { rejectionOf } from '../helpers/fakes.js';
import { fakeFetch } from './fakeFetch.js';

const ROUTES = '/config/apps/http/servers/srv0/routes';
const ROUTE_ID = '/id/preview-x';

describe('CaddyService', () => {
  describe('buildRouteConfig', () => {
    it('should match the prefix, strip it and proxy to the upstream', () => {
      expect(buildRouteConfig('preview-x', '/preview-x', 'localhost:20005')).to.deep.equal({
        '@id': 'preview-x',
        match: [{ path: ['/preview-x', '/preview-x/*'] }],
        handle: [{
          handler: 'subroute',
          routes: [
            { handle: [{ handler: 'rewrite', strip_path_prefix: '/preview-x' }] },
            { handle: [{ handler: 'reverse_proxy', upstreams: [{ dial: 'localhost:20005' }] }] },
          ],
        }],
        terminal: true,
      });
    });
  });

  describe('addRoute', () => {
    it('should do nothing when the route exists', async () => {
      const { fetch, requests } = fakeFetch({ [`GET ${ROUTE_ID}`]: [{ status: 200, body: { '@id': 'preview-x' } }] });

      await new CaddyService('http://caddy:2019', 'srv0', fetch).addRoute('preview-x', '/preview-x', 'localhost:20005');

      expect(requests).to.have.lengthOf(1);
    });

    it('should insert the route ahead of the catch-all route', async () => {
      const { fetch, requests } = fakeFetch({
        [`GET ${ROUTE_ID}`]: [{ status: 404 }],
        [`GET ${ROUTES}`]: [{ status: 200, body: [{ '@id': 'app', match: [{ host: ['app.test'] }] }, { handle: [] }] }],
        [`PATCH ${ROUTES}`]: [{ status: 200 }],
      });

      await new CaddyService('http://caddy:2019/', 'srv0', fetch).addRoute('preview-x', '/preview-x', 'localhost:20005');

      const patch = requests[2];
      expect(patch.method).to.equal('PATCH');
      expect(patch.body).to.deep.equal([
        { '@id': 'app', match: [{ host: ['app.test'] }] },
        buildRouteConfig('preview-x', '/preview-x', 'localhost:20005'),
        { handle: [] },
      ]);
    });

    it('should append when there is no catch-all route', async () => {
      const { fetch, requests } = fakeFetch({
        [`GET ${ROUTE_ID}`]: [{ status: 404 }],
        [`GET ${ROUTES}`]: [{ status: 200, body: null }],
        [`POST ${ROUTES}`]: [{ status: 200 }],
      });

      await new CaddyService('http://caddy:2019', 'srv0', fetch).addRoute('preview-x', '/preview-x', 'localhost:20005');

      expect(requests[2]).to.deep.equal({
        method: 'POST',
        url: ROUTES,
        body: buildRouteConfig('preview-x', '/preview-x', 'localhost:20005'),
      });
    });

    it('should treat a rejected config as permanent', async () => {
      const { fetch } = fakeFetch({
        [`GET ${ROUTE_ID}`]: [{ status: 404 }],
        [`GET ${ROUTES}`]: [{ status: 200, body: [] }],
        [`POST ${ROUTES}`]: [{ status: 400, body: { error: 'bad handler' } }],
      });

      const err = await rejectionOf(new CaddyService('http://caddy:2019', 'srv0', fetch).addRoute('preview-x', '/preview-x', 'localhost:20005'));

      expect(err).to.be.instanceOf(ProvisionerPermanentError);
    });
  });

  describe('removeRoute', () => {
    it('should treat an unknown route as removed', async () => {
      const { fetch } = fakeFetch({ [`DELETE ${ROUTE_ID}`]: [{ status: 404 }] });

      await new CaddyService('http://caddy:2019', 'srv0', fetch).removeRoute('preview-x');
    });

    it('should treat server errors and unreachable admin APIs as transient', async () => {
      const { fetch } = fakeFetch({
        [`DELETE ${ROUTE_ID}`]: [{ status: 500, body: 'boom' }, new TypeError('fetch failed')],
      });
      const caddy = new CaddyService('http://caddy:2019', 'srv0', fetch);

      expect(await rejectionOf(caddy.removeRoute('preview-x'))).to.be.instanceOf(ProvisionerTransientError);
      expect(await rejectionOf(caddy.removeRoute('preview-x'))).to.be.instanceOf(ProvisionerTransientError);
    });
  });

  describe('upstreams', () => {
    it('should read upstream health counters', async () => {
      const { fetch } = fakeFetch({
        'GET /reverse_proxy/upstreams': [{ status: 200, body: [{ address: 'localhost:20005', num_requests: 0, fails: 1 }] }],
      });

      expect(await new CaddyService('http://caddy:2019', 'srv0', fetch).upstreams()).to.deep.equal([
        { address: 'localhost:20005', num_requests: 0, fails: 1 },
      ]);
    });
  });
});
