/**
 * services/loader.ts — File boundary: DVF export on disk → raw records → table
 *
 * Streams `full.csv` / `full.csv.gz` through csv-parse straight into a
 * TableBuilder, so the raw file is never held in memory. JSON arrays of
 * records (`*.json`) are read whole. No cleaning happens here.
 */
import { createReadStream } from 'fs';
import { readFile } from 'fs/promises';
import { pipeline } from 'stream/promises';
import { createGunzip } from 'zlib';
import { parse } from 'csv-parse';
import { TableBuilder, type CleanOptions } from './cleaner.ts';
import { childLogger } from '../shared/logger.ts';
import type { CanonicalTable, RawRecord, RawValue } from '../types.ts';

const log = childLogger({ module: 'loader' });

export interface LoadOptions extends CleanOptions {
  delimiter?: string;
  /** Invoked every `progressEvery` records (default 100k) */
  onProgress?: (received: number) => void;
  progressEvery?: number;
}

/** Keep scalar cells; anything nested or boolean is treated as absent */
export function toRawRecord(value: unknown): RawRecord | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return null;
  const record: Record<string, RawValue> = {};
  for (const [key, cell] of Object.entries(value)) {
    record[key] = typeof cell === 'string' || typeof cell === 'number' || cell === null ? cell : undefined;
  }
  return record;
}

export type InputFormat = 'csv' | 'csv.gz' | 'json';

export function detectFormat(file: string): InputFormat {
  const lower = file.toLowerCase();
  if (lower.endsWith('.json')) return 'json';
  if (lower.endsWith('.gz')) return 'csv.gz';
  return 'csv';
}

async function loadJson(file: string, builder: TableBuilder): Promise<void> {
  const parsed: unknown = JSON.parse(await readFile(file, 'utf-8'));
  if (!Array.isArray(parsed)) throw new Error(`${file}: expected a JSON array of records`);
  for (const item of parsed) {
    const record = toRawRecord(item);
    if (record) builder.add(record);
  }
}

async function loadCsv(file: string, gzip: boolean, builder: TableBuilder, options: LoadOptions): Promise<void> {
  const parser = parse({
    columns: true,
    skip_empty_lines: true,
    trim: true,
    bom: true,
    delimiter: options.delimiter ?? ',',
  });
  const every = options.progressEvery ?? 100_000;
  let received = 0;

  const sink = async (source: AsyncIterable<unknown>): Promise<void> => {
    for await (const item of source) {
      const record = toRawRecord(item);
      if (!record) continue;
      builder.add(record);
      if (++received % every === 0) options.onProgress?.(received);
    }
  };

  if (gzip) await pipeline(createReadStream(file), createGunzip(), parser, sink);
  else await pipeline(createReadStream(file), parser, sink);
}

/**
 * Load and clean a DVF export from disk.
 * Throws DataFormatError (from the cleaner) when a mandatory column is missing.
 */
export async function loadTable(file: string, options: LoadOptions = {}): Promise<CanonicalTable> {
  const format = detectFormat(file);
  const builder = new TableBuilder(options);
  const start = Date.now();

  if (format === 'json') await loadJson(file, builder);
  else await loadCsv(file, format === 'csv.gz', builder, options);

  const table = builder.build();
  log.info({
    file, format,
    received: table.stats.received,
    accepted: table.stats.accepted,
    rejected: table.stats.rejected,
    duration: Date.now() - start,
  }, `Loaded ${table.stats.accepted.toLocaleString()} transactions`);
  return table;
}
