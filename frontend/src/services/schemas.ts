/**
 * services/schemas.ts — Runtime checks for API payloads
 *
 * The client never trusts a response shape: every envelope and payload is
 * parsed here before it reaches the store.
 */
import { z } from 'zod';
import { GEO_LEVELS, PROPERTY_TYPES } from '../types';

export const EnvelopeSchema = z.object({
  success: z.boolean(),
  data: z.unknown().optional(),
  error: z.string().optional(),
  code: z.string().optional(),
  details: z.array(z.string()).optional(),
});

const Count = z.number().int().nonnegative();

export const DashboardViewsSchema = z.object({
  total: Count,
  level: z.enum(GEO_LEVELS),
  geo: z.record(z.string(), z.object({ count: Count, mean: z.number(), name: z.string().optional() })),
  types: z.record(z.enum(PROPERTY_TYPES), z.object({ count: Count, share: z.number(), mean: z.number() })),
  time: z.array(z.object({ bucket: z.string(), count: Count, mean: z.number(), movingAverage: z.number() })),
  distribution: z.array(z.object({ binStart: z.number(), binEnd: z.number(), count: Count })),
});

export const LocationsSchema = z.array(z.object({
  code: z.string(),
  name: z.string(),
  departments: z.array(z.object({
    code: z.string(),
    communes: z.array(z.object({ code: z.string(), name: z.string() })),
  })),
}));

const CleanStatsSchema = z.object({
  received: Count,
  accepted: Count,
  rejected: Count,
  byReason: z.record(z.string(), Count),
});

export const TableStatsSchema = z.object({
  version: Count,
  loadedAt: z.string().nullable(),
  rows: Count,
  refreshing: z.boolean(),
  stats: CleanStatsSchema.nullable(),
});

export const RefreshResultSchema = z.object({
  trigger: z.string(),
  version: Count,
  durationMs: z.number(),
  persisted: z.boolean(),
  stats: CleanStatsSchema,
});
