// ═══════════════════════════════════════════════════════
// dvf-client.ts — Downloads of the yearly DVF export and the GeoJSON outlines
// Retry with exponential backoff; writes to a temp file then renames,
// so a failed download never leaves a truncated export in DATA_DIR.
// ═══════════════════════════════════════════════════════
import { createWriteStream } from 'fs';
import { access, mkdir, rename, rm } from 'fs/promises';
import { join } from 'path';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import axios, { isAxiosError } from 'axios';
import { sleep } from './helpers.ts';
import { childLogger } from '../shared/logger.ts';

const log = childLogger({ module: 'dvf-client' });

export const GEOJSON_FILES = {
  regions: 'regions.geojson',
  departments: 'departements.geojson',
  communes: 'communes.geojson',
} as const;

export type GeoJsonLayer = keyof typeof GEOJSON_FILES;

export interface RetryOptions {
  retries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  label?: string;
}

/** URL of the geo-dvf export for a year, e.g. <base>/2023/full.csv.gz */
export function dvfUrl(baseUrl: string, year: number): string {
  return `${baseUrl.replace(/\/+$/, '')}/${year}/full.csv.gz`;
}

export function geojsonUrl(baseUrl: string, layer: GeoJsonLayer): string {
  return `${baseUrl.replace(/\/+$/, '')}/${GEOJSON_FILES[layer]}`;
}

/** 4xx other than 408/429 will not get better on retry */
function isRetryable(err: unknown): boolean {
  if (!isAxiosError(err)) return true;
  const status = err.response?.status;
  if (status === undefined) return true;
  return status >= 500 || status === 408 || status === 429;
}

export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions = {}): Promise<T> {
  const retries = opts.retries ?? 3;
  const base = opts.baseDelayMs ?? 1000;
  const max = opts.maxDelayMs ?? 8000;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= retries || !isRetryable(err)) throw err;
      const delay = Math.min(base * Math.pow(2, attempt - 1), max);
      const msg = err instanceof Error ? err.message : String(err);
      log.warn({ attempt, retries, delay, label: opts.label }, `Attempt ${attempt}/${retries} failed: ${msg}. Retrying in ${delay}ms`);
      await sleep(delay);
    }
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Stream a URL to `dest`. The body is written to `dest.part` first.
 */
export async function downloadFile(url: string, dest: string, opts: RetryOptions = {}): Promise<string> {
  const tmp = `${dest}.part`;
  await withRetry(async () => {
    const res = await axios.get<Readable>(url, { responseType: 'stream', timeout: 60_000 });
    try {
      await pipeline(res.data, createWriteStream(tmp));
    } catch (err) {
      await rm(tmp, { force: true });
      throw err;
    }
  }, { label: url, ...opts });
  await rename(tmp, dest);
  log.info({ url, dest }, 'Download complete');
  return dest;
}

export interface FetchOptions {
  dataDir: string;
  dvfBaseUrl: string;
  geojsonBaseUrl: string;
  year: number;
  file: string;
  layers?: readonly GeoJsonLayer[];
  /** Re-download files already present */
  force?: boolean;
}

/**
 * Fetch the DVF export and GeoJSON layers into dataDir. Existing files are
 * kept unless `force` is set. Returns the paths written.
 */
export async function fetchDvfData(opts: FetchOptions): Promise<string[]> {
  await mkdir(opts.dataDir, { recursive: true });
  const written: string[] = [];

  const dvfPath = join(opts.dataDir, opts.file);
  if (opts.force || !(await exists(dvfPath))) {
    written.push(await downloadFile(dvfUrl(opts.dvfBaseUrl, opts.year), dvfPath));
  } else {
    log.info({ dvfPath }, 'DVF export already present, skipping');
  }

  for (const layer of opts.layers ?? ['regions', 'departments']) {
    const path = join(opts.dataDir, `${layer}.geojson`);
    if (!opts.force && await exists(path)) continue;
    written.push(await downloadFile(geojsonUrl(opts.geojsonBaseUrl, layer), path));
  }
  return written;
}
