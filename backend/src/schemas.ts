// ═══════════════════════════════════════════════════════
// Zod Schemas — Input validation for every API endpoint,
// plus the shapes of cached view payloads.
// ═══════════════════════════════════════════════════════
import { z } from 'zod';
import { GEO_LEVELS, PROPERTY_TYPES } from './types.ts';
import { parseDay } from './services/helpers.ts';
import { MAX_BINS } from './services/aggregator.ts';

// ── Shared fields ──

export const GeoLevelEnum = z.enum(GEO_LEVELS);
export const PropertyTypeEnum = z.enum(PROPERTY_TYPES);
export const MovingAverageModeEnum = z.enum(['observed', 'calendar']);

const LocationCode = z.string().trim().min(1).max(64);

const Day = z.string().trim().refine(v => /^\d{4}-\d{2}-\d{2}$/.test(v) && parseDay(v) === v, {
  message: 'Expected a calendar date (YYYY-MM-DD)',
});

const SelectionFields = z.object({
  region: LocationCode.optional(),
  department: LocationCode.optional(),
  commune: LocationCode.optional(),
  dateFrom: Day.optional(),
  dateTo: Day.optional(),
  propertyType: PropertyTypeEnum.optional(),
});

const ViewFields = SelectionFields.extend({
  level: GeoLevelEnum.optional(),
  bins: z.coerce.number().int().min(1).max(MAX_BINS).optional(),
  binWidth: z.coerce.number().positive().optional(),
  window: z.coerce.number().int().min(1).max(365).optional(),
  maMode: MovingAverageModeEnum.optional(),
});

function checkDateRange(v: { dateFrom?: string; dateTo?: string }, ctx: z.RefinementCtx): void {
  if (v.dateFrom !== undefined && v.dateTo !== undefined && v.dateFrom > v.dateTo) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['dateFrom'], message: 'dateFrom must not be after dateTo' });
  }
}

// ── GET /api/locations, /api/views/types ──

export const SelectionQuerySchema = SelectionFields.superRefine(checkDateRange);

export type SelectionQuery = z.infer<typeof SelectionQuerySchema>;

// ── GET /api/views, /api/views/time, /api/views/distribution ──

export const ViewsQuerySchema = ViewFields.superRefine((v, ctx) => {
  checkDateRange(v, ctx);
  if (v.bins !== undefined && v.binWidth !== undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['binWidth'], message: 'Use either bins or binWidth, not both' });
  }
});

export type ViewsQuery = z.infer<typeof ViewsQuerySchema>;

// ── GET /api/views/geo/:level ──

export const GeoViewQuerySchema = SelectionFields.extend({
  level: GeoLevelEnum,
}).superRefine(checkDateRange);

export type GeoViewQuery = z.infer<typeof GeoViewQuerySchema>;

// ── POST /api/refresh ──

export const RefreshQuerySchema = z.object({
  key: z.string().min(1).optional(),
  // Wait for the load to finish and return its stats instead of 202
  wait: z.enum(['true', 'false']).default('false').transform(v => v === 'true'),
});

// ── Cached payloads ──

const GeoStatSchema = z.object({
  count: z.number().int().nonnegative(),
  mean: z.number(),
  name: z.string().optional(),
});

const TypeStatSchema = z.object({
  count: z.number().int().nonnegative(),
  share: z.number(),
  mean: z.number(),
});

export const DashboardViewsSchema = z.object({
  total: z.number().int().nonnegative(),
  level: GeoLevelEnum,
  geo: z.record(z.string(), GeoStatSchema),
  types: z.record(PropertyTypeEnum, TypeStatSchema),
  time: z.array(z.object({
    bucket: z.string(),
    count: z.number().int().nonnegative(),
    mean: z.number(),
    movingAverage: z.number(),
  })),
  distribution: z.array(z.object({
    binStart: z.number(),
    binEnd: z.number(),
    count: z.number().int().nonnegative(),
  })),
});

export const LocationTreeSchema = z.array(z.object({
  code: z.string(),
  name: z.string(),
  departments: z.array(z.object({
    code: z.string(),
    communes: z.array(z.object({ code: z.string(), name: z.string() })),
  })),
}));
