import { httpRequestDuration, metricsRegistry } from '../metrics.js';
import type { NextFunction, Request, Response } from 'express';

/**
 * Time every request. Labels use the matched route pattern so preview ids
 * do not explode the label space.
 */
export const metricMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const end = httpRequestDuration.startTimer();
  res.on('finish', () => {
    const pattern: unknown = req.route?.path;
    const route = typeof pattern === 'string' ? `${req.baseUrl}${pattern}` : 'unmatched';
    end({ method: req.method, route, status: String(res.statusCode) });
  });
  next();
};

export const metricRoute = (_req: Request, res: Response, next: NextFunction): void => {
  metricsRegistry
    .metrics()
    .then((body) => {
      res.set('Content-Type', metricsRegistry.contentType);
      res.end(body);
    })
    .catch(next);
};
