/**
 * server.ts — Process entry point
 *
 * Feature-flagged infrastructure:
 *   ENABLE_DB=true          → persist published tables to PostgreSQL (Drizzle)
 *   ENABLE_REDIS_CACHE=true → Redis-backed views cache
 *   ENABLE_QUEUE=true       → BullMQ cron refresh (INGESTION_CRON)
 *
 * All features work with flags disabled (in-memory table, in-memory cache,
 * AUTO_REFRESH_HOURS interval timer).
 */
import 'dotenv/config';
import { access } from 'fs/promises';
import { join, resolve } from 'path';
import type { Server } from 'http';
import type { Worker } from 'bullmq';
import { env } from './config/env.ts';
import { createApp } from './app.ts';
import { initSentry, flushSentry, captureException } from './config/sentry.ts';
import { logger } from './shared/logger.ts';
import { TableStore } from './services/table-store.ts';
import { CacheService } from './services/cache-service.ts';
import { DashboardService } from './services/dashboard.ts';
import { IngestionService } from './services/ingestion.ts';
import { closeDb, getDb, pingDb, type Database } from './config/database.ts';
import { closeRedis, getRedis, pingRedis } from './config/redis.ts';
import { closeIngestionQueue, scheduleIngestion, startIngestionWorker } from './services/ingestion.worker.ts';
import type { DistributionOptions } from './types.ts';

const BOOT_TIME = Date.now();

let server: Server | null = null;
let worker: Worker | null = null;
let autoRefreshTimer: ReturnType<typeof setInterval> | null = null;

// ─── Infrastructure init ───

async function connectDb(): Promise<Database | null> {
  if (!env.ENABLE_DB) {
    logger.info('Database disabled (ENABLE_DB=false)');
    return null;
  }
  try {
    const latencyMs = await pingDb();
    logger.info({ latencyMs }, 'PostgreSQL connected');
    return getDb();
  } catch (err) {
    logger.error({ err }, 'PostgreSQL failed, tables will not be persisted');
    return null;
  }
}

async function connectCache(): Promise<CacheService> {
  if (!env.ENABLE_REDIS_CACHE) {
    logger.info('Redis disabled (ENABLE_REDIS_CACHE=false)');
    return new CacheService();
  }
  try {
    const redis = getRedis();
    await redis.connect();
    return new CacheService({ redis, keyPrefix: env.REDIS_KEY_PREFIX });
  } catch (err) {
    logger.warn({ err }, 'Redis failed, using in-memory cache');
    return new CacheService();
  }
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

// ─── Auto-refresh (without the queue) ───

function scheduleAutoRefresh(ingestion: IngestionService): void {
  if (env.AUTO_REFRESH_HOURS <= 0) return;
  const ms = env.AUTO_REFRESH_HOURS * 3_600_000;
  logger.info({ intervalHours: env.AUTO_REFRESH_HOURS }, 'Auto-refresh scheduled');
  autoRefreshTimer = setInterval(() => {
    if (ingestion.inProgress) return;
    ingestion.refresh('schedule').catch((err: unknown) => {
      logger.error({ err }, 'Auto-refresh failed');
      captureException(err, { context: 'auto-refresh' });
    });
  }, ms);
  autoRefreshTimer.unref();
}

// ─── Start ───

async function main(): Promise<void> {
  await initSentry();

  const db = await connectDb();
  const cache = await connectCache();
  const store = new TableStore();
  const source = resolve(join(env.DATA_DIR, env.DVF_FILE));

  const distribution: DistributionOptions = env.HISTOGRAM_BIN_WIDTH !== undefined
    ? { binWidth: env.HISTOGRAM_BIN_WIDTH }
    : { bins: env.HISTOGRAM_BINS };

  const dashboard = new DashboardService(store, cache, {
    viewsTtlSec: env.CACHE_VIEWS_TTL,
    time: { window: env.MOVING_AVERAGE_WINDOW, mode: env.MOVING_AVERAGE_MODE },
    distribution,
  });
  const ingestion = new IngestionService({
    store, cache, db, source,
    loadOptions: {
      dedupe: env.DEDUPE_PARCELS,
      requiredLevels: env.REQUIRED_GEO_LEVELS,
      onProgress: (n) => logger.debug({ records: n }, 'Loading DVF export'),
    },
  });

  const app = createApp({
    dashboard, ingestion, store, cache,
    adminKey: env.ADMIN_KEY,
    allowedOrigins: env.ALLOWED_ORIGINS,
    rateLimit: { max: env.RATE_LIMIT_MAX, windowMs: env.RATE_LIMIT_WINDOW_MS },
    production: env.NODE_ENV === 'production',
    pingDb: db ? pingDb : undefined,
    pingRedis: env.ENABLE_REDIS_CACHE ? pingRedis : undefined,
  });

  server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT, env: env.NODE_ENV, bootMs: Date.now() - BOOT_TIME }, 'Server started');
  });

  // Views answer 503 until the first table is published
  try {
    if (await fileExists(source)) {
      await ingestion.refresh('startup');
    } else if (await ingestion.restore()) {
      logger.warn({ source }, 'DVF export not found, serving the last stored table');
    } else {
      logger.warn({ source }, 'DVF export not found; run `npm run fetch-data`, then POST /api/refresh');
    }
    logger.info({ totalMs: Date.now() - BOOT_TIME, rows: store.info().rows }, 'Startup load finished');
  } catch (err) {
    logger.error({ err }, 'Initial load failed');
    captureException(err, { context: 'startup-load' });
  }

  if (env.ENABLE_QUEUE) {
    worker = startIngestionWorker(ingestion);
    await scheduleIngestion();
  } else {
    scheduleAutoRefresh(ingestion);
  }
}

// ─── Graceful shutdown ───

async function gracefulShutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Shutting down...');
  setTimeout(() => { logger.warn('Forced exit (10s timeout)'); process.exit(1); }, 10_000).unref();
  if (autoRefreshTimer) clearInterval(autoRefreshTimer);

  if (server) server.close(() => logger.info('HTTP server closed'));

  try {
    if (worker) await worker.close();
    await closeIngestionQueue();
    await flushSentry(2000);
    await closeDb();
    await closeRedis();
  } catch (err) {
    logger.warn({ err }, 'Cleanup error');
  }
  process.exit(0);
}

process.on('SIGTERM', () => { void gracefulShutdown('SIGTERM'); });
process.on('SIGINT', () => { void gracefulShutdown('SIGINT'); });
process.on('unhandledRejection', (reason) => {
  logger.error({ err: reason }, 'Unhandled rejection');
  captureException(reason);
});
process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception');
  captureException(err);
  setTimeout(() => process.exit(1), 1000).unref();
});

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Startup failed');
  captureException(err);
  process.exit(1);
});
