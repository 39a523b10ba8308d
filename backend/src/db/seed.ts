/**
 * db/seed.ts — Seed PostgreSQL from the DVF export on disk
 *
 * Loads and cleans DATA_DIR/DVF_FILE, then stores the canonical table and an
 * ingestion batch. Each run replaces the stored table.
 *
 * Usage: npm run seed -w backend
 */
import 'dotenv/config';
import { join, resolve } from 'path';
import { env } from '../config/env.ts';
import { closeDb, getDb } from '../config/database.ts';
import { completeBatch, failBatch, saveTable, startBatch } from '../services/dal.ts';
import { loadTable } from '../services/loader.ts';
import { logger } from '../shared/logger.ts';

const log = logger.child({ module: 'seed' });

async function main(): Promise<void> {
  const source = resolve(join(env.DATA_DIR, env.DVF_FILE));
  const db = getDb();
  const start = Date.now();
  log.info({ source }, 'Seeding database');

  const batchId = await startBatch(db, source);
  try {
    const table = await loadTable(source, {
      dedupe: env.DEDUPE_PARCELS,
      requiredLevels: env.REQUIRED_GEO_LEVELS,
      onProgress: (n) => log.info(`  ... ${n.toLocaleString()} records read`),
    });
    const rows = await saveTable(db, table, batchId);
    await completeBatch(db, batchId, table.stats, Date.now() - start);

    const elapsed = ((Date.now() - start) / 1000).toFixed(1);
    log.info({ rows, rejected: table.stats.byReason }, `Seed complete in ${elapsed}s`);
  } catch (err) {
    await failBatch(db, batchId, err instanceof Error ? err.message : String(err), Date.now() - start);
    throw err;
  } finally {
    await closeDb();
  }
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'Seed failed');
  process.exit(1);
});
