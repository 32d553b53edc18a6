import { Router, type Router as ExpressRouter, Request, Response } from 'express';
import { z } from 'zod';
import { ValidationError } from '../preview/errors.js';
import { sendError } from './errors.js';
import type { PreviewOrchestrator } from '../preview/PreviewOrchestrator.js';
import type { PreviewDetail } from '../preview/types.js';

const createBody = z.object({
  ttl_hours: z.number().int(),
});

const extendBody = z.object({
  additional_hours: z.number().int(),
});

function parseBody<T>(schema: z.ZodType<T>, body: unknown): T {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    throw new ValidationError(
      'Invalid request body',
      result.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`),
    );
  }
  return result.data;
}

export function toDetailResponse({ record, unit, route }: PreviewDetail) {
  return {
    preview_id: record.previewId,
    status: record.status,
    preview_url: record.previewUrl,
    created_at: record.createdAt,
    expires_at: record.expiresAt,
    unit_status: unit.state,
    desired_count: unit.desired ?? 0,
    running_count: unit.running ?? 0,
    pending_count: unit.pending ?? 0,
    route_health: route.health,
    route_targets: route.targets,
    ...(record.lastError ? { last_error: record.lastError } : {}),
  };
}

/**
 * Routes under /preview. `/create` is registered before `/:id` so it is
 * never read as an id.
 */
export function createPreviewRouter(orchestrator: PreviewOrchestrator): ExpressRouter {
  const router: ExpressRouter = Router();

  /**
   * POST /preview/create - Provision a preview with a time to live
   * Body: { ttl_hours }
   */
  router.post('/create', async (req: Request, res: Response) => {
    try {
      const { ttl_hours: ttlHours } = parseBody(createBody, req.body);
      const created = await orchestrator.create(ttlHours);
      res.status(201).json({
        preview_id: created.previewId,
        preview_url: created.previewUrl,
        expires_at: created.expiresAt,
      });
    } catch (err) {
      sendError(res, err, 'create preview');
    }
  });

  /**
   * GET /preview - All known previews with live status
   */
  router.get('/', async (_req: Request, res: Response) => {
    try {
      const details = await orchestrator.list();
      res.json({ items: details.map(toDetailResponse), total: details.length });
    } catch (err) {
      sendError(res, err, 'list previews');
    }
  });

  router.get('/:id', async (req: Request, res: Response) => {
    try {
      const detail = await orchestrator.getStatus(req.params.id);
      res.json(toDetailResponse(detail));
    } catch (err) {
      sendError(res, err, 'get preview');
    }
  });

  /**
   * DELETE /preview/:id - Tear down now
   * 204 when gone (or never existed), 202 when teardown is left for a retry
   */
  router.delete('/:id', async (req: Request, res: Response) => {
    try {
      const result = await orchestrator.delete(req.params.id);
      if (result.outcome === 'failed') {
        res.status(202).json({ preview_id: result.previewId, status: 'failed', error: result.error });
        return;
      }
      res.status(204).end();
    } catch (err) {
      sendError(res, err, 'delete preview');
    }
  });

  /**
   * POST /preview/:id/extend - Push expiry forward
   * Body: { additional_hours }
   */
  router.post('/:id/extend', async (req: Request, res: Response) => {
    try {
      const { additional_hours: hours } = parseBody(extendBody, req.body);
      const extended = await orchestrator.extend(req.params.id, hours);
      res.json({ preview_id: extended.previewId, expires_at: extended.expiresAt });
    } catch (err) {
      sendError(res, err, 'extend preview');
    }
  });

  /**
   * GET /preview/:id/test - Fetch the preview URL once
   */
  router.get('/:id/test', async (req: Request, res: Response) => {
    try {
      const result = await orchestrator.testPreview(req.params.id);
      res.json({
        result: {
          ...(result.statusCode !== undefined ? { status_code: result.statusCode } : {}),
          ...(result.error !== undefined ? { error: result.error } : {}),
        },
      });
    } catch (err) {
      sendError(res, err, 'test preview');
    }
  });

  return router;
}
