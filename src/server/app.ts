import compression from 'compression';
import express from 'express';
import winston from 'express-winston';
import { logger } from '../shared/logger.js';
import { createPreviewRouter } from './api/previews.js';
import { metricMiddleware, metricRoute } from './http/metrics.js';
import { policies } from './http/security.js';
import type { PreviewOrchestrator } from './preview/PreviewOrchestrator.js';
import type { Express, NextFunction, Request, Response } from 'express';

export const SERVICE_NAME = 'lapse';

export interface AppDeps {
  orchestrator: PreviewOrchestrator;
  accessLog?: boolean;
}

export function createApp({ orchestrator, accessLog = true }: AppDeps): Express {
  const app = express();

  app
    .disable('x-powered-by')
    .use(express.json()) // Parse JSON bodies for API routes
    .use(metricMiddleware)
    .get('/metrics', metricRoute);

  if (accessLog) {
    app.use(
      winston.logger({
        winstonInstance: logger(),
        level: 'http',
        meta: false, // Don't include verbose request/response metadata
        msg: 'HTTP {{req.method}} {{req.url}} {{res.statusCode}} {{res.responseTime}}ms',
        colorize: false,
      }),
    );
  }

  app
    .use(compression())
    .use(policies())
    .get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'ok', service: SERVICE_NAME });
    })
    .use('/preview', createPreviewRouter(orchestrator))
    .use((_req: Request, res: Response) => {
      res.status(404).json({ error: 'Not found' });
    })
    // Malformed JSON bodies land here from express.json()
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    .use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      const status = typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number'
        ? err.status
        : 500;
      if (status >= 500) {
        logger().error('Unhandled request error', { err: err instanceof Error ? err.message : String(err) });
        res.status(500).json({ error: 'Internal server error' });
        return;
      }
      res.status(status).json({ error: err instanceof Error ? err.message : 'Bad request' });
    });

  return app;
}
