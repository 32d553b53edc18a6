import { Counter, Histogram, collectDefaultMetrics, register } from 'prom-client';

export const previewsCreated = new Counter({
  name: 'lapse_previews_created_total',
  help: 'previews that reached the active state',
});

export const previewCreateFailures = new Counter({
  name: 'lapse_preview_create_failures_total',
  help: 'preview creations that failed, labelled by whether rollback completed',
  labelNames: ['rolled_back'] as const,
});

export const cleanupRuns = new Counter({
  name: 'lapse_cleanup_runs_total',
  help: 'cleanup runs by outcome and trigger',
  labelNames: ['outcome', 'reason'] as const,
});

export const httpRequestDuration = new Histogram({
  name: 'lapse_http_request_duration_seconds',
  help: 'duration of API requests',
  labelNames: ['method', 'route', 'status'] as const,
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 5, 15, 60],
});

let defaultsStarted = false;

export function startDefaultMetrics(): void {
  if (defaultsStarted) return;
  collectDefaultMetrics();
  defaultsStarted = true;
}

export const metricsRegistry = register;
