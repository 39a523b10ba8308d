/**
 * shared/metrics.ts — Prometheus metrics via prom-client
 *
 * Exposes: /api/metrics
 *
 * Metrics:
 *   dvf_http_requests_total           — Counter by method/route/status
 *   dvf_http_request_duration_seconds — Histogram by method/route/status
 *   dvf_clean_rows_total              — Counter by outcome (accepted / rejected reason)
 *   dvf_view_duration_seconds         — Histogram for view computation
 *   dvf_cache_operations_total        — Counter by operation (hit/miss/set)
 *   dvf_table_rows                    — Gauge for the published canonical table
 */
import {
  Registry, Counter, Histogram, Gauge,
  collectDefaultMetrics,
} from 'prom-client';
import type { Request, Response, NextFunction } from 'express';

export const registry = new Registry();

// Collect Node.js runtime metrics (event loop lag, GC, memory, etc.)
collectDefaultMetrics({ register: registry, prefix: 'dvf_' });

// ── HTTP Metrics ──

export const httpRequestsTotal = new Counter({
  name: 'dvf_http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'route', 'status_code'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'dvf_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

// ── Pipeline Metrics ──

export const cleanRows = new Counter({
  name: 'dvf_clean_rows_total',
  help: 'Rows processed by the cleaner, by outcome',
  labelNames: ['outcome'] as const, // accepted, or a reject reason
  registers: [registry],
});

export const viewDuration = new Histogram({
  name: 'dvf_view_duration_seconds',
  help: 'Time spent computing dashboard views',
  labelNames: ['view'] as const, // all, geo, types, time, distribution
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
  registers: [registry],
});

export const ingestionDuration = new Histogram({
  name: 'dvf_ingestion_duration_seconds',
  help: 'Load + clean + publish duration in seconds',
  labelNames: ['status'] as const,
  buckets: [1, 5, 10, 30, 60, 120, 300, 600],
  registers: [registry],
});

// ── Cache Metrics ──

export const cacheOperations = new Counter({
  name: 'dvf_cache_operations_total',
  help: 'Cache operations by type',
  labelNames: ['operation'] as const, // hit, miss, set, invalidate
  registers: [registry],
});

// ── Data Metrics ──

export const tableRows = new Gauge({
  name: 'dvf_table_rows',
  help: 'Rows in the published canonical table',
  registers: [registry],
});

// ── Express Middleware ──

/**
 * Normalize route for metric labels.
 * Collapses path params: /api/views/geo/department → /api/views/geo/:level
 */
function normalizeRoute(req: Request): string {
  const url = req.originalUrl || req.url;
  return url
    .replace(/\/api\/views\/geo\/[^/?]+/, '/api/views/geo/:level')
    .split('?')[0] ?? url;
}

/**
 * Metrics collection middleware. Place early in the middleware chain.
 */
export function metricsMiddleware() {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (req.url === '/api/metrics') return next();

    const end = httpRequestDuration.startTimer();
    res.on('finish', () => {
      const labels = { method: req.method, route: normalizeRoute(req), status_code: String(res.statusCode) };
      end(labels);
      httpRequestsTotal.inc(labels);
    });

    next();
  };
}

/**
 * Metrics endpoint handler. Returns Prometheus text format.
 */
export async function metricsEndpoint(_req: Request, res: Response): Promise<void> {
  try {
    res.set('Content-Type', registry.contentType);
    res.end(await registry.metrics());
  } catch {
    res.status(500).end('Error collecting metrics');
  }
}
