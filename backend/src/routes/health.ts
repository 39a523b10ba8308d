/**
 * routes/health.ts — Health check endpoints
 *
 * GET /api/health         — Quick liveness check
 * GET /api/health/ready   — Readiness: table published, plus DB / Redis when enabled
 */
import { Router, type Request, type Response } from 'express';
import type { CacheService } from '../services/cache-service.ts';
import type { TableStore } from '../services/table-store.ts';

type Check = { status: 'ok' | 'error' | 'disabled' | 'loading'; latencyMs?: number; error?: string; details?: unknown };

export interface HealthRouterDeps {
  store: TableStore;
  cache: CacheService;
  /** Latency probes; absent means the backend is disabled */
  pingDb?: () => Promise<number>;
  pingRedis?: () => Promise<number>;
}

async function probe(ping: (() => Promise<number>) | undefined): Promise<Check> {
  if (!ping) return { status: 'disabled' };
  try {
    return { status: 'ok', latencyMs: await ping() };
  } catch (err) {
    return { status: 'error', error: err instanceof Error ? err.message : String(err) };
  }
}

export function createHealthRouter({ store, cache, pingDb, pingRedis }: HealthRouterDeps): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: Math.round(process.uptime()),
      version: process.env.npm_package_version ?? '1.0.0',
    });
  });

  router.get('/ready', async (_req: Request, res: Response) => {
    const info = store.info();
    const checks: Record<string, Check> = {
      table: info.loadedAt === null
        ? { status: 'loading' }
        : { status: 'ok', details: { version: info.version, rows: info.rows, loadedAt: info.loadedAt } },
      database: await probe(pingDb),
      redis: await probe(pingRedis),
      cache: { status: 'ok', details: await cache.getStats() },
    };

    const mem = process.memoryUsage();
    checks.memory = {
      status: 'ok',
      details: {
        heapUsedMB: Math.round(mem.heapUsed / 1024 / 1024),
        rssMB: Math.round(mem.rss / 1024 / 1024),
      },
    };

    const notReady = Object.values(checks).some(c => c.status === 'error' || c.status === 'loading');
    res.status(notReady ? 503 : 200).json({
      status: notReady ? (info.loadedAt === null ? 'loading' : 'degraded') : 'ok',
      timestamp: new Date().toISOString(),
      uptime: Math.round(process.uptime()),
      checks,
    });
  });

  return router;
}
