// ═══════════════════════════════════════════════════════
// table-store.ts — Holder for the currently published canonical table
// Readers take a snapshot reference; a refresh builds a new table off to the
// side and swaps it in with publish(), so a request never sees a mix.
// ═══════════════════════════════════════════════════════
import { TableNotReadyError } from './errors.ts';
import type { CanonicalTable, TableInfo } from '../types.ts';

export class TableStore {
  private table: CanonicalTable | null = null;
  private _version = 0;

  /** Bumped on every publish; part of every views cache key */
  get version(): number {
    return this._version;
  }

  current(): CanonicalTable | null {
    return this.table;
  }

  /** Current table, or TableNotReadyError before the first publish */
  require(): CanonicalTable {
    if (!this.table) throw new TableNotReadyError();
    return this.table;
  }

  publish(table: CanonicalTable): number {
    this.table = table;
    return ++this._version;
  }

  info(): TableInfo {
    return {
      version: this._version,
      loadedAt: this.table?.loadedAt ?? null,
      rows: this.table?.rows.length ?? 0,
      stats: this.table ? { ...this.table.stats, byReason: { ...this.table.stats.byReason } } : null,
    };
  }
}
