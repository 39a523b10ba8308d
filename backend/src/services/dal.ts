/**
 * services/dal.ts — Data Access Layer (Postgres, optional)
 *
 * Persists each published canonical table and the ingestion audit trail, and
 * reads the last completed table back so a restart without the source file
 * still serves data. Only used when ENABLE_DB=true; the in-memory TableStore
 * remains the source of truth for every request.
 */
import { asc, desc, eq } from 'drizzle-orm';
import { dvfTransactions, ingestionBatches } from '../db/schema.ts';
import type { DvfTransactionRow, NewDvfTransactionRow } from '../db/schema.ts';
import type { Database } from '../config/database.ts';
import { emptyStats, freezeTable } from './cleaner.ts';
import { childLogger } from '../shared/logger.ts';
import type { CanonicalTable, CleanStats, Transaction } from '../types.ts';

const log = childLogger({ module: 'dal' });
const BATCH_SIZE = 1000;

// ══════════════════════════════════════════════════════
// ROW MAPPING
// ══════════════════════════════════════════════════════

export function toRow(t: Transaction, batchId: string, position: number): NewDvfTransactionRow {
  return {
    batchId,
    position,
    saleDate: t.date,
    price: String(t.price),
    area: String(t.area),
    pricePerArea: t.pricePerArea,
    propertyType: t.propertyType,
    regionCode: t.regionCode,
    regionName: t.regionName,
    departmentCode: t.departmentCode,
    communeCode: t.communeCode,
    communeName: t.communeName,
    latitude: t.latitude,
    longitude: t.longitude,
    mutationId: t.mutationId,
    parcelId: t.parcelId,
  };
}

export function fromRow(r: DvfTransactionRow): Transaction {
  return {
    date: r.saleDate,
    price: Number(r.price),
    area: Number(r.area),
    pricePerArea: r.pricePerArea,
    propertyType: r.propertyType,
    regionCode: r.regionCode,
    regionName: r.regionName,
    departmentCode: r.departmentCode,
    communeCode: r.communeCode,
    communeName: r.communeName,
    latitude: r.latitude,
    longitude: r.longitude,
    mutationId: r.mutationId,
    parcelId: r.parcelId,
  };
}

// ══════════════════════════════════════════════════════
// INGESTION BATCHES
// ══════════════════════════════════════════════════════

export async function startBatch(db: Database, source: string): Promise<string> {
  const [batch] = await db.insert(ingestionBatches)
    .values({ source, startedAt: new Date(), status: 'running' })
    .returning({ id: ingestionBatches.id });
  if (!batch) throw new Error('Failed to create ingestion batch');
  return batch.id;
}

export async function completeBatch(db: Database, batchId: string, stats: CleanStats, durationMs: number): Promise<void> {
  await db.update(ingestionBatches)
    .set({
      status: 'completed',
      completedAt: new Date(),
      received: stats.received,
      accepted: stats.accepted,
      rejected: stats.rejected,
      rejectedByReason: stats.byReason,
      durationMs,
    })
    .where(eq(ingestionBatches.id, batchId));
}

export async function failBatch(db: Database, batchId: string, error: string, durationMs: number): Promise<void> {
  await db.update(ingestionBatches)
    .set({ status: 'failed', completedAt: new Date(), error, durationMs })
    .where(eq(ingestionBatches.id, batchId));
}

// ══════════════════════════════════════════════════════
// TABLE PERSISTENCE
// ══════════════════════════════════════════════════════

/**
 * Replace the stored transactions with the given table, in one transaction.
 * Rows of older batches are removed so the table never holds two loads.
 */
export async function saveTable(db: Database, table: CanonicalTable, batchId: string): Promise<number> {
  const rows = table.rows.map((t, i) => toRow(t, batchId, i));

  await db.transaction(async (tx) => {
    await tx.delete(dvfTransactions);
    for (let i = 0; i < rows.length; i += BATCH_SIZE) {
      await tx.insert(dvfTransactions).values(rows.slice(i, i + BATCH_SIZE));
    }
  });

  log.info({ batchId, rows: rows.length }, 'Canonical table persisted');
  return rows.length;
}

/**
 * The table of the most recent completed batch, or null if none is stored.
 */
export async function loadLatestTable(db: Database): Promise<CanonicalTable | null> {
  const [batch] = await db.select()
    .from(ingestionBatches)
    .where(eq(ingestionBatches.status, 'completed'))
    .orderBy(desc(ingestionBatches.completedAt))
    .limit(1);
  if (!batch) return null;

  const rows = await db.select()
    .from(dvfTransactions)
    .where(eq(dvfTransactions.batchId, batch.id))
    .orderBy(asc(dvfTransactions.position));

  const stats: CleanStats = {
    received: batch.received ?? rows.length,
    accepted: rows.length,
    rejected: batch.rejected ?? 0,
    byReason: { ...emptyStats().byReason, ...batch.rejectedByReason },
  };
  const loadedAt = (batch.completedAt ?? batch.startedAt).toISOString();

  log.info({ batchId: batch.id, rows: rows.length }, 'Canonical table restored from database');
  return freezeTable(rows.map(fromRow), stats, loadedAt);
}
