/**
 * app.ts — Express application factory
 *
 * Everything stateful (table store, cache, services) is passed in, so the
 * server and the tests build the same app around their own instances.
 */
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import compression from 'compression';
import { randomUUID } from 'crypto';
import { createDvfRouter, type DvfRouterDeps } from './routes/dvf.ts';
import { createHealthRouter, type HealthRouterDeps } from './routes/health.ts';
import { isAppError } from './services/errors.ts';
import { captureException, sentryErrorHandler } from './config/sentry.ts';
import { logger, requestLogger } from './shared/logger.ts';
import { metricsEndpoint, metricsMiddleware } from './shared/metrics.ts';

export interface AppOptions extends DvfRouterDeps, HealthRouterDeps {
  allowedOrigins?: string;
  rateLimit?: { max: number; windowMs: number };
  production?: boolean;
}

/**
 * Fixed-window per-IP limiter for GET /api requests (in-memory).
 * The window resets lazily, so no timer outlives the app.
 */
export function rateLimiter({ max, windowMs }: { max: number; windowMs: number }) {
  const hits = new Map<string, number>();
  let windowStart = Date.now();

  return (req: Request, res: Response, next: NextFunction): void => {
    if (req.method !== 'GET') return next();
    const now = Date.now();
    if (now - windowStart >= windowMs) {
      hits.clear();
      windowStart = now;
    }
    const ip = req.ip ?? req.socket.remoteAddress ?? 'unknown';
    const count = (hits.get(ip) ?? 0) + 1;
    hits.set(ip, count);
    res.setHeader('X-RateLimit-Limit', String(max));
    res.setHeader('X-RateLimit-Remaining', String(Math.max(0, max - count)));
    if (count > max) {
      const retryAfter = Math.ceil((windowStart + windowMs - now) / 1000);
      res.status(429).json({ success: false, error: 'Rate limited', code: 'RATE_LIMITED', retryAfter });
      return;
    }
    next();
  };
}

export function createApp(options: AppOptions): Express {
  const app = express();
  app.set('trust proxy', 1);

  // ─── Security & Performance ───

  const origins = (options.allowedOrigins ?? '*').split(',').map(s => s.trim()).filter(Boolean);
  app.use(cors({ origin: origins.includes('*') ? true : origins, credentials: true }));
  app.use(compression({ threshold: 1024 }));
  app.use(express.json({ limit: '100kb' }));

  // ─── Metrics (early, measures everything) + request logging ───

  app.use(metricsMiddleware());
  app.use(requestLogger());

  app.use((_req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
    if (options.production) {
      res.setHeader('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
    next();
  });

  if (options.rateLimit) app.use('/api', rateLimiter(options.rateLimit));

  // ─── API Routes ───

  app.get('/api/metrics', metricsEndpoint);
  app.use('/api/health', createHealthRouter(options));
  app.use('/api', createDvfRouter(options));

  app.use('/api', (req: Request, res: Response) => {
    res.status(404).json({ success: false, error: `Not found: ${req.method} ${req.path}`, code: 'NOT_FOUND' });
  });

  // ─── Error handling: Sentry first, then structured response ───

  app.use(sentryErrorHandler());

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const errId = req.id ?? randomUUID().slice(0, 8);

    if (isAppError(err)) {
      (req.log ?? logger).warn({ code: err.code, status: err.status, reqId: errId }, err.message);
      res.status(err.status).json({ success: false, error: err.message, code: err.code, requestId: errId });
      return;
    }

    logger.error({ err, reqId: errId, method: req.method, url: req.originalUrl }, `Unhandled error [${errId}]`);
    captureException(err, { requestId: errId, url: req.originalUrl });
    res.status(500).json({
      success: false,
      error: options.production ? 'Internal server error' : err instanceof Error ? err.message : String(err),
      code: 'INTERNAL',
      requestId: errId,
    });
  });

  return app;
}
