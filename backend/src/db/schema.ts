/**
 * db/schema.ts — Drizzle ORM schema definitions
 *
 * Tables:
 *   dvf_transactions   — the last published canonical table
 *   ingestion_batches  — one row per load / refresh attempt
 */
import {
  pgTable, uuid, text, numeric, integer, bigint, doublePrecision,
  date, timestamp, jsonb, index, pgEnum,
} from 'drizzle-orm/pg-core';
import { PROPERTY_TYPES } from '../types.ts';
import type { RejectReason } from '../types.ts';

// ── Enums ──

export const propertyTypeEnum = pgEnum('property_type', PROPERTY_TYPES);
export const ingestionStatusEnum = pgEnum('ingestion_status', ['running', 'completed', 'failed']);

// ══════════════════════════════════════════════════════
// TRANSACTIONS
// ══════════════════════════════════════════════════════

export const dvfTransactions = pgTable('dvf_transactions', {
  id: bigint('id', { mode: 'number' }).primaryKey().generatedAlwaysAsIdentity(),
  batchId: uuid('batch_id').notNull(),                              // Links to ingestion_batches
  saleDate: date('sale_date', { mode: 'string' }).notNull(),       // "2023-01-31"
  price: numeric('price', { precision: 14, scale: 2 }).notNull(),
  area: numeric('area', { precision: 10, scale: 2 }).notNull(),
  pricePerArea: doublePrecision('price_per_area').notNull(),
  propertyType: propertyTypeEnum('property_type').notNull(),
  regionCode: text('region_code'),
  regionName: text('region_name'),
  departmentCode: text('department_code'),
  communeCode: text('commune_code'),
  communeName: text('commune_name'),
  latitude: doublePrecision('latitude'),
  longitude: doublePrecision('longitude'),
  mutationId: text('mutation_id'),
  parcelId: text('parcel_id'),
  // Position in the source file; the cleaner preserves input order
  position: integer('position').notNull(),
}, (table) => ({
  batchIdx: index('idx_dvf_batch').on(table.batchId, table.position),
  dateIdx: index('idx_dvf_date').on(table.saleDate),
  geoIdx: index('idx_dvf_geo').on(table.regionCode, table.departmentCode, table.communeCode),
  typeIdx: index('idx_dvf_type').on(table.propertyType),
}));

// ══════════════════════════════════════════════════════
// INGESTION AUDIT
// ══════════════════════════════════════════════════════

export const ingestionBatches = pgTable('ingestion_batches', {
  id: uuid('id').primaryKey().defaultRandom(),
  source: text('source').notNull(),                                 // file path the table was read from
  startedAt: timestamp('started_at', { withTimezone: true }).notNull(),
  completedAt: timestamp('completed_at', { withTimezone: true }),
  status: ingestionStatusEnum('status').notNull().default('running'),
  received: integer('received').default(0),
  accepted: integer('accepted').default(0),
  rejected: integer('rejected').default(0),
  rejectedByReason: jsonb('rejected_by_reason').$type<Record<RejectReason, number>>(),
  error: text('error'),
  durationMs: integer('duration_ms'),
});

// ── Inferred types ──

export type DvfTransactionRow = typeof dvfTransactions.$inferSelect;
export type NewDvfTransactionRow = typeof dvfTransactions.$inferInsert;
export type IngestionBatch = typeof ingestionBatches.$inferSelect;
export type NewIngestionBatch = typeof ingestionBatches.$inferInsert;
