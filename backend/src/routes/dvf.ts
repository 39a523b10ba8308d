import { Router, type Request, type Response } from 'express';
import { timingSafeEqual } from 'crypto';
import { z } from 'zod';
import type { DashboardService } from '../services/dashboard.ts';
import type { IngestionService } from '../services/ingestion.ts';
import { RefreshInProgressError } from '../services/errors.ts';
import { captureException } from '../config/sentry.ts';
import { logger } from '../shared/logger.ts';
import {
  GeoViewQuerySchema, RefreshQuerySchema, SelectionQuerySchema, ViewsQuerySchema,
} from '../schemas.ts';
import { fromQuery, fromQueryAndParams, handle } from './validate.ts';

export interface DvfRouterDeps {
  dashboard: DashboardService;
  ingestion: IngestionService;
  adminKey?: string;
}

const NoInput = z.unknown();

function keyMatches(provided: string | undefined, expected: string): boolean {
  if (!provided) return false;
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function createDvfRouter({ dashboard, ingestion, adminKey }: DvfRouterDeps): Router {
  const router = Router();

  /**
   * GET /api/views — all four views for a selection in one call
   */
  router.get('/views', handle(ViewsQuerySchema, fromQuery, q => dashboard.views(q)));

  /**
   * GET /api/views/geo/:level — mean price per m² by region / department / commune
   */
  router.get('/views/geo/:level', handle(GeoViewQuerySchema, fromQueryAndParams, q => {
    const { level, ...selection } = q;
    return dashboard.geo(level, selection);
  }));

  router.get('/views/types', handle(SelectionQuerySchema, fromQuery, q => dashboard.types(q)));
  router.get('/views/time', handle(ViewsQuerySchema, fromQuery, q => dashboard.time(q)));
  router.get('/views/distribution', handle(ViewsQuerySchema, fromQuery, q => dashboard.distribution(q)));

  /**
   * GET /api/locations — region → department → commune tree for the selectors
   */
  router.get('/locations', handle(NoInput, fromQuery, () => dashboard.locations()));

  /**
   * GET /api/stats — table version, load time, accepted / rejected counts
   */
  router.get('/stats', handle(NoInput, fromQuery, () => ({
    ...dashboard.info(),
    refreshing: ingestion.inProgress,
  })));

  /**
   * POST /api/refresh — reload the DVF file (protected)
   * Key via ?key= or Authorization: Bearer. Answers 202 and loads in the
   * background, unless ?wait=true.
   */
  router.post('/refresh', handle(RefreshQuerySchema, fromQuery, async (q, req: Request, res: Response) => {
    if (!adminKey) {
      res.status(403).json({ success: false, error: 'ADMIN_KEY not configured', code: 'NO_ADMIN_KEY' });
      return;
    }
    const provided = q.key ?? req.get('authorization')?.replace(/^Bearer\s+/i, '');
    if (!keyMatches(provided, adminKey)) {
      res.status(403).json({ success: false, error: 'Invalid admin key', code: 'AUTH_FAILED' });
      return;
    }
    if (ingestion.inProgress) throw new RefreshInProgressError();

    if (q.wait) return ingestion.refresh('manual');

    ingestion.refresh('manual').catch((err: unknown) => {
      logger.error({ err }, 'Manual refresh failed');
      captureException(err, { context: 'manual-refresh' });
    });
    res.status(202).json({ success: true, data: { accepted: true } });
  }));

  return router;
}
