/**
 * services/ingestion.ts — Load → clean → publish pipeline
 *
 * One refresh at a time: a second request while a load is in flight gets
 * RefreshInProgressError. The new table is built completely before it is
 * published, so readers never observe a partial load. When a database is
 * configured the published table is persisted afterwards; a persistence
 * failure is reported but does not unpublish the table.
 */
import { loadTable as loadTableFromFile, type LoadOptions } from './loader.ts';
import { RefreshInProgressError } from './errors.ts';
import { completeBatch, failBatch, loadLatestTable, saveTable, startBatch } from './dal.ts';
import type { CacheService } from './cache-service.ts';
import type { TableStore } from './table-store.ts';
import type { Database } from '../config/database.ts';
import { captureException } from '../config/sentry.ts';
import { childLogger } from '../shared/logger.ts';
import { cleanRows, ingestionDuration, tableRows } from '../shared/metrics.ts';
import { REJECT_REASONS } from '../types.ts';
import type { CanonicalTable, CleanStats } from '../types.ts';

const log = childLogger({ module: 'ingestion' });

export type IngestionTrigger = 'startup' | 'manual' | 'schedule';

export interface IngestionResult {
  trigger: IngestionTrigger;
  version: number;
  stats: CleanStats;
  durationMs: number;
  persisted: boolean;
}

export interface IngestionDeps {
  store: TableStore;
  cache: CacheService;
  /** DVF export to read (csv, csv.gz or json) */
  source: string;
  loadOptions?: LoadOptions;
  db?: Database | null;
  load?: (file: string, options: LoadOptions) => Promise<CanonicalTable>;
}

function recordCleanMetrics(stats: CleanStats): void {
  cleanRows.inc({ outcome: 'accepted' }, stats.accepted);
  for (const reason of REJECT_REASONS) {
    const n = stats.byReason[reason];
    if (n > 0) cleanRows.inc({ outcome: reason }, n);
  }
}

export class IngestionService {
  private running: Promise<IngestionResult> | null = null;
  private readonly load: (file: string, options: LoadOptions) => Promise<CanonicalTable>;

  constructor(private readonly deps: IngestionDeps) {
    this.load = deps.load ?? loadTableFromFile;
  }

  get inProgress(): boolean {
    return this.running !== null;
  }

  async refresh(trigger: IngestionTrigger): Promise<IngestionResult> {
    if (this.running) throw new RefreshInProgressError();
    this.running = this.run(trigger);
    try {
      return await this.running;
    } finally {
      this.running = null;
    }
  }

  /**
   * Publish the last table stored in Postgres. Used at startup when the
   * source file is not on disk yet. Returns false when nothing is stored.
   */
  async restore(): Promise<boolean> {
    const { db, store } = this.deps;
    if (!db) return false;
    const table = await loadLatestTable(db);
    if (!table) return false;
    store.publish(table);
    tableRows.set(table.rows.length);
    return true;
  }

  private async run(trigger: IngestionTrigger): Promise<IngestionResult> {
    const { store, cache, db, source } = this.deps;
    const start = Date.now();
    const end = ingestionDuration.startTimer();
    log.info({ trigger, source }, 'Ingestion started');

    let batchId: string | null = null;
    let table: CanonicalTable;
    try {
      if (db) batchId = await startBatch(db, source);
      table = await this.load(source, this.deps.loadOptions ?? {});
    } catch (err) {
      end({ status: 'failed' });
      log.error({ err, trigger, source }, 'Ingestion failed');
      if (db && batchId) await this.markFailed(db, batchId, err, Date.now() - start);
      throw err;
    }

    const version = store.publish(table);
    tableRows.set(table.rows.length);
    recordCleanMetrics(table.stats);
    const invalidated = await cache.invalidateViews();

    let persisted = false;
    if (db && batchId) {
      try {
        await saveTable(db, table, batchId);
        await completeBatch(db, batchId, table.stats, Date.now() - start);
        persisted = true;
      } catch (err) {
        log.error({ err, batchId }, 'Persisting the canonical table failed');
        captureException(err, { batchId, source });
        await this.markFailed(db, batchId, err, Date.now() - start);
      }
    }

    const durationMs = Date.now() - start;
    end({ status: 'success' });
    log.info({
      trigger, version, durationMs, invalidated, persisted,
      accepted: table.stats.accepted,
      rejected: table.stats.rejected,
    }, `Published table v${version} (${table.stats.accepted.toLocaleString()} rows)`);

    return { trigger, version, stats: table.stats, durationMs, persisted };
  }

  private async markFailed(db: Database, batchId: string, err: unknown, durationMs: number): Promise<void> {
    try {
      await failBatch(db, batchId, err instanceof Error ? err.message : String(err), durationMs);
    } catch (markErr) {
      log.error({ err: markErr, batchId }, 'Could not mark ingestion batch as failed');
    }
  }
}
