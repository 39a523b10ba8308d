/**
 * scripts/fetch-dvf.ts — Download the DVF export and GeoJSON outlines
 *
 * Usage: npm run fetch-data -w backend [-- --force] [-- --communes]
 */
import 'dotenv/config';
import { resolve } from 'path';
import { env } from '../config/env.ts';
import { fetchDvfData, type GeoJsonLayer } from '../services/dvf-client.ts';
import { logger } from '../shared/logger.ts';

async function main(): Promise<void> {
  const args = new Set(process.argv.slice(2));
  const layers: GeoJsonLayer[] = args.has('--communes')
    ? ['regions', 'departments', 'communes']
    : ['regions', 'departments'];

  const written = await fetchDvfData({
    dataDir: resolve(env.DATA_DIR),
    dvfBaseUrl: env.DVF_BASE_URL,
    geojsonBaseUrl: env.GEOJSON_BASE_URL,
    year: env.DVF_YEAR,
    file: env.DVF_FILE,
    layers,
    force: args.has('--force'),
  });
  logger.info({ written }, `Fetched ${written.length} file(s)`);
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Fetch failed');
  process.exit(1);
});
