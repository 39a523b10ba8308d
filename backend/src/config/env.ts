/**
 * config/env.ts — Zod-validated environment configuration
 * Fails fast at startup if a variable is malformed.
 * Provides typed access to all config values.
 */
import { z } from 'zod';
import { GEO_LEVELS } from '../types.ts';

// z.coerce.boolean() turns "false" into true; flags are parsed literally instead
const flag = (fallback: boolean) =>
  z.enum(['true', 'false', '1', '0']).default(fallback ? 'true' : 'false').transform(v => v === 'true' || v === '1');

const envSchema = z.object({
  // ── Server ──
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  ALLOWED_ORIGINS: z.string().default('*'),
  ADMIN_KEY: z.string().min(1).optional(),

  // ── Data ──
  DATA_DIR: z.string().default('data'),
  DVF_FILE: z.string().default('full.csv.gz'),
  DVF_YEAR: z.coerce.number().int().min(2014).max(2100).default(2023),
  DVF_BASE_URL: z.string().url().default('https://files.data.gouv.fr/geo-dvf/latest/csv'),
  GEOJSON_BASE_URL: z.string().url().default('https://raw.githubusercontent.com/gregoiredavid/france-geojson/master'),
  DEDUPE_PARCELS: flag(true),
  // Comma-separated levels every accepted row must carry
  REQUIRED_GEO_LEVELS: z.string().default(GEO_LEVELS.join(','))
    .transform(v => v.split(',').map(s => s.trim()).filter(s => s !== ''))
    .pipe(z.array(z.enum(GEO_LEVELS))),

  // ── Views ──
  MOVING_AVERAGE_WINDOW: z.coerce.number().int().min(1).max(365).default(14),
  MOVING_AVERAGE_MODE: z.enum(['observed', 'calendar']).default('observed'),
  HISTOGRAM_BINS: z.coerce.number().int().min(1).max(500).default(20),
  HISTOGRAM_BIN_WIDTH: z.coerce.number().positive().optional(),

  // ── PostgreSQL ──
  ENABLE_DB: flag(false),
  DATABASE_URL: z.string().startsWith('postgres').default('postgres://localhost:5432/dvf'),
  DB_POOL_MIN: z.coerce.number().int().min(0).default(1),
  DB_POOL_MAX: z.coerce.number().int().min(1).default(10),
  DB_SSL: flag(false),

  // ── Redis ──
  ENABLE_REDIS_CACHE: flag(false),
  REDIS_URL: z.string().default('redis://localhost:6379'),
  REDIS_KEY_PREFIX: z.string().default('dvf:'),
  CACHE_VIEWS_TTL: z.coerce.number().int().min(10).default(600),       // 10 min

  // ── BullMQ ──
  ENABLE_QUEUE: flag(false),
  INGESTION_CRON: z.string().default('0 4 * * *'),                      // 4am daily
  AUTO_REFRESH_HOURS: z.coerce.number().min(0).default(0),

  // ── Rate Limiting ──
  RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(120),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1000).default(60_000),

  // ── Logging ──
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // ── Error Tracking ──
  SENTRY_DSN: z.string().url().optional(),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  // Empty strings from .env files mean "unset"
  const raw = Object.fromEntries(
    Object.entries(process.env).filter(([, v]) => v !== undefined && v !== ''),
  );

  const result = envSchema.safeParse(raw);
  if (!result.success) {
    console.error('❌ Environment validation failed:');
    for (const issue of result.error.issues) {
      console.error(`   ${issue.path.join('.')}: ${issue.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

export const env = loadEnv();
