import { expect } from 'chai';
import request from 'supertest';
import { createApp } from '../../../src/server/app.js';
import { ProvisionerPermanentError } from '../../../src/server/preview/errors.js';
import { ids } from '../helpers/fakes.js';
import { createHarness, type Harness } from '../helpers/harness.js';
import type express from 'express';

const [ID] = ids;
const PREVIEW_URL = `https://previews.test/preview-${ID}`;

describe('Preview API', () => {
  let h: Harness;
  let app: express.Express;

  beforeEach(async () => {
    h = await createHarness();
    app = createApp({ orchestrator: h.orchestrator, accessLog: false });
  });

  describe('GET /health', () => {
    it('should report the service as up', async () => {
      const res = await request(app).get('/health').expect(200);

      expect(res.body).to.deep.equal({ status: 'ok', service: 'lapse' });
    });
  });

  describe('POST /preview/create', () => {
    it('should create a preview', async () => {
      const res = await request(app)
        .post('/preview/create')
        .send({ ttl_hours: 2 })
        .expect(201);

      expect(res.body).to.deep.equal({
        preview_id: ID,
        preview_url: PREVIEW_URL,
        expires_at: '2026-01-01T02:00:00.000Z',
      });
    });

    it('should reject a body without a numeric ttl', async () => {
      const res = await request(app)
        .post('/preview/create')
        .send({ ttl_hours: '2' })
        .expect(400);

      expect(res.body).to.deep.equal({
        error: 'Invalid request body',
        details: ['ttl_hours: Expected number, received string'],
      });
    });

    it('should reject a ttl outside the allowed range', async () => {
      const res = await request(app)
        .post('/preview/create')
        .send({ ttl_hours: 48 })
        .expect(400);

      expect(res.body).to.deep.equal({
        error: 'ttl_hours must be a whole number between 1 and 24',
        details: ['ttl_hours: received 48'],
      });
    });

    it('should reject malformed JSON', async () => {
      await request(app)
        .post('/preview/create')
        .set('Content-Type', 'application/json')
        .send('{"ttl_hours":')
        .expect(400);
    });

    it('should report a failed creation with its rollback outcome', async () => {
      h.provisioner.fail('createRoute', new ProvisionerPermanentError('route rejected'));

      const res = await request(app)
        .post('/preview/create')
        .send({ ttl_hours: 1 })
        .expect(500);

      expect(res.body).to.deep.equal({
        error: `Failed to create preview ${ID}: route rejected (all resources were rolled back)`,
        preview_id: ID,
        rolled_back: true,
      });
    });
  });

  describe('GET /preview', () => {
    it('should list previews with live status', async () => {
      await h.orchestrator.create(2);

      const res = await request(app).get('/preview').expect(200);

      expect(res.body).to.deep.equal({
        items: [{
          preview_id: ID,
          status: 'active',
          preview_url: PREVIEW_URL,
          created_at: '2026-01-01T00:00:00.000Z',
          expires_at: '2026-01-01T02:00:00.000Z',
          unit_status: 'running',
          desired_count: 1,
          running_count: 1,
          pending_count: 0,
          route_health: 'healthy',
          route_targets: [{ address: 'localhost:20001', health: 'healthy', fails: 0 }],
        }],
        total: 1,
      });
    });
  });

  describe('GET /preview/:id', () => {
    it('should return 404 for an unknown preview', async () => {
      const res = await request(app).get(`/preview/${ID}`).expect(404);

      expect(res.body).to.deep.equal({ error: `Preview ${ID} not found` });
    });

    it('should return 400 for a malformed id', async () => {
      await request(app).get('/preview/not-a-uuid').expect(400);
    });

    it('should include the last error of a failed preview', async () => {
      h.provisioner.fail('createRoute', new ProvisionerPermanentError('route rejected'));
      h.provisioner.fail('deleteUnit', new ProvisionerPermanentError('unit stuck'));
      await request(app).post('/preview/create').send({ ttl_hours: 1 }).expect(500);

      const res = await request(app).get(`/preview/${ID}`).expect(200);

      expect(res.body.status).to.equal('failed');
      expect(res.body.last_error).to.equal('route rejected');
    });
  });

  describe('DELETE /preview/:id', () => {
    it('should delete a preview', async () => {
      await h.orchestrator.create(2);

      await request(app).delete(`/preview/${ID}`).expect(204);

      expect(await h.store.getByID(ID)).to.equal(null);
    });

    it('should succeed for a preview that does not exist', async () => {
      await request(app).delete(`/preview/${ID}`).expect(204);
    });

    it('should answer 202 when teardown has to be retried later', async () => {
      await h.orchestrator.create(2);
      h.provisioner.fail('deleteUnit', new ProvisionerPermanentError('unit stuck'));

      const res = await request(app).delete(`/preview/${ID}`).expect(202);

      expect(res.body).to.deep.equal({
        preview_id: ID,
        status: 'failed',
        error: `Teardown of preview ${ID} failed: unit stuck`,
      });
    });
  });

  describe('POST /preview/:id/extend', () => {
    it('should extend a preview', async () => {
      await h.orchestrator.create(2);

      const res = await request(app)
        .post(`/preview/${ID}/extend`)
        .send({ additional_hours: 3 })
        .expect(200);

      expect(res.body).to.deep.equal({ preview_id: ID, expires_at: '2026-01-01T05:00:00.000Z' });
    });

    it('should return 404 for an unknown preview', async () => {
      await request(app).post(`/preview/${ID}/extend`).send({ additional_hours: 1 }).expect(404);
    });

    it('should return 409 for a preview that is not active', async () => {
      await h.orchestrator.create(2);
      h.provisioner.fail('deleteUnit', new ProvisionerPermanentError('unit stuck'));
      await request(app).delete(`/preview/${ID}`).expect(202);

      await request(app).post(`/preview/${ID}/extend`).send({ additional_hours: 1 }).expect(409);
    });
  });

  describe('GET /preview/:id/test', () => {
    it('should return the probe result', async () => {
      await h.orchestrator.create(2);

      const res = await request(app).get(`/preview/${ID}/test`).expect(200);

      expect(res.body).to.deep.equal({ result: { status_code: 200 } });
    });
  });

  describe('GET /metrics', () => {
    it('should expose the lifecycle counters', async () => {
      const res = await request(app).get('/metrics').expect(200);

      expect(res.text).to.include('lapse_previews_created_total');
    });
  });
});
