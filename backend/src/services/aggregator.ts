/**
 * aggregator.ts — Derived views over the canonical table
 *
 * Four independent pure derivations (geo, property type, daily time series,
 * price-per-area distribution). Each filters the table by the selection and
 * returns freshly allocated plain values; nothing here mutates the table.
 * buildViews() filters once and derives all four for a dashboard request.
 */
import { InvalidSelectionError } from './errors.ts';
import { avg, dayNumber, parseDay } from './helpers.ts';
import { normalizeCommuneCode, normalizeDepartmentCode, resolveRegion } from './regions.ts';
import { PROPERTY_TYPES } from '../types.ts';
import type {
  CanonicalTable, DashboardViews, DistributionBin, DistributionOptions, GeoLevel,
  GeoView, PropertyType, Selection, TimeOptions, TimePoint, Transaction, TypeView, ViewOptions,
} from '../types.ts';

// Internal bucket type: running sum + count of price-per-area
interface Bucket { s: number; n: number }
interface GeoBucket extends Bucket { name: string | null }

export const MAX_BINS = 1000;

export const DEFAULT_VIEW_OPTIONS: Readonly<Omit<ViewOptions, 'level'>> = {
  time: { window: 14, mode: 'observed' },
  distribution: { bins: 20 },
};

// ═══ FILTERING ═══

export function filterRows(table: CanonicalTable, selection: Selection = {}): Transaction[] {
  const region = selection.region === undefined ? undefined : resolveRegion(selection.region).code;
  const department = selection.department === undefined ? undefined : normalizeDepartmentCode(selection.department);
  const commune = selection.commune === undefined ? undefined : normalizeCommuneCode(selection.commune);
  const from = selection.dateFrom === undefined ? undefined : parseDay(selection.dateFrom) ?? selection.dateFrom;
  const to = selection.dateTo === undefined ? undefined : parseDay(selection.dateTo) ?? selection.dateTo;
  const { propertyType } = selection;

  return table.rows.filter(r =>
    (region === undefined || r.regionCode === region) &&
    (department === undefined || r.departmentCode === department) &&
    (commune === undefined || r.communeCode === commune) &&
    (from === undefined || r.date >= from) &&
    (to === undefined || r.date <= to) &&
    (propertyType === undefined || r.propertyType === propertyType));
}

/** Geo level a map should show for a selection: one below the deepest selected level */
export function defaultLevel(selection: Selection): GeoLevel {
  if (selection.department !== undefined || selection.commune !== undefined) return 'commune';
  if (selection.region !== undefined) return 'department';
  return 'region';
}

// ═══ GEO ═══

function geoKey(r: Transaction, level: GeoLevel): string | null {
  return level === 'region' ? r.regionCode : level === 'department' ? r.departmentCode : r.communeCode;
}

function geoName(r: Transaction, level: GeoLevel): string | null {
  return level === 'region' ? r.regionName : level === 'commune' ? r.communeName : null;
}

export function summarizeGeo(rows: readonly Transaction[], level: GeoLevel): GeoView {
  const groups = new Map<string, GeoBucket>();
  for (const r of rows) {
    const key = geoKey(r, level);
    if (key === null) continue;
    let g = groups.get(key);
    if (!g) { g = { s: 0, n: 0, name: geoName(r, level) }; groups.set(key, g); }
    g.s += r.pricePerArea; g.n++;
  }

  const view: GeoView = {};
  for (const [key, g] of [...groups].sort(([a], [b]) => a.localeCompare(b))) {
    if (g.n === 0) continue;
    view[key] = g.name === null ? { count: g.n, mean: g.s / g.n } : { count: g.n, mean: g.s / g.n, name: g.name };
  }
  return view;
}

/** Count and mean price-per-area per region / department / commune. Empty groups are never emitted. */
export function aggregateGeo(table: CanonicalTable, level: GeoLevel, selection: Selection = {}): GeoView {
  return summarizeGeo(filterRows(table, selection), level);
}

// ═══ PROPERTY TYPE ═══

export function summarizeTypes(rows: readonly Transaction[]): TypeView {
  const total = rows.length;
  if (total === 0) return {};

  const byType = new Map<PropertyType, Bucket>();
  for (const r of rows) {
    let b = byType.get(r.propertyType);
    if (!b) { b = { s: 0, n: 0 }; byType.set(r.propertyType, b); }
    b.s += r.pricePerArea; b.n++;
  }

  const view: TypeView = {};
  for (const type of PROPERTY_TYPES) {
    const b = byType.get(type);
    if (!b) continue;
    view[type] = { count: b.n, share: (b.n / total) * 100, mean: avg(b.s, b.n) };
  }
  return view;
}

/** Count, percentage share and mean price-per-area per property type. */
export function aggregateTypes(table: CanonicalTable, selection: Selection = {}): TypeView {
  return summarizeTypes(filterRows(table, selection));
}

// ═══ TIME SERIES ═══

export function summarizeTime(rows: readonly Transaction[], options: TimeOptions = DEFAULT_VIEW_OPTIONS.time): TimePoint[] {
  const byDay = new Map<string, Bucket>();
  for (const r of rows) {
    let b = byDay.get(r.date);
    if (!b) { b = { s: 0, n: 0 }; byDay.set(r.date, b); }
    b.s += r.pricePerArea; b.n++;
  }

  const series = [...byDay]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([bucket, b]) => ({ bucket, count: b.n, mean: b.s / b.n }));

  const window = Math.max(1, Math.floor(options.window));
  const days = options.mode === 'calendar' ? series.map(p => dayNumber(p.bucket)) : [];

  let start = 0;
  return series.map((point, i) => {
    if (options.mode === 'calendar') {
      // Trailing `window` calendar days ending at this bucket; unobserved days are skipped
      const today = days[i] ?? 0;
      while ((days[start] ?? today) <= today - window) start++;
    } else {
      start = Math.max(0, i - window + 1);
    }
    let sum = 0;
    for (let j = start; j <= i; j++) sum += series[j]?.mean ?? 0;
    return { ...point, movingAverage: sum / (i - start + 1) };
  });
}

/**
 * Daily mean price-per-area with a trailing moving average.
 * Days without transactions are omitted from the series.
 */
export function aggregateTime(
  table: CanonicalTable,
  selection: Selection = {},
  options: TimeOptions = DEFAULT_VIEW_OPTIONS.time,
): TimePoint[] {
  return summarizeTime(filterRows(table, selection), options);
}

// ═══ DISTRIBUTION ═══

export function summarizeDistribution(
  rows: readonly Transaction[],
  options: DistributionOptions = DEFAULT_VIEW_OPTIONS.distribution,
): DistributionBin[] {
  if (rows.length === 0) return [];

  let min = Infinity, max = -Infinity;
  for (const r of rows) {
    if (r.pricePerArea < min) min = r.pricePerArea;
    if (r.pricePerArea > max) max = r.pricePerArea;
  }
  if (min === max) return [{ binStart: min, binEnd: max, count: rows.length }];

  let n: number;
  let width: number;
  if (options.binWidth !== undefined) {
    if (!(options.binWidth > 0)) throw new InvalidSelectionError('binWidth must be positive');
    width = options.binWidth;
    n = Math.max(1, Math.ceil((max - min) / width));
  } else {
    n = Math.max(1, Math.floor(options.bins));
    width = (max - min) / n;
  }
  if (n > MAX_BINS) throw new InvalidSelectionError(`Distribution would need ${n} bins (max ${MAX_BINS})`);

  const counts = new Array<number>(n).fill(0);
  for (const r of rows) {
    const idx = Math.min(n - 1, Math.floor((r.pricePerArea - min) / width));
    counts[idx] = (counts[idx] ?? 0) + 1;
  }

  const fixedCount = options.binWidth === undefined;
  return counts.map((count, i) => ({
    binStart: min + i * width,
    binEnd: fixedCount && i === n - 1 ? max : min + (i + 1) * width,
    count,
  }));
}

/**
 * Equal-width histogram of price-per-area over [min, max] of the selection.
 * Counts sum to the number of selected rows; a single distinct value gives one bin.
 */
export function aggregateDistribution(
  table: CanonicalTable,
  selection: Selection = {},
  options: DistributionOptions = DEFAULT_VIEW_OPTIONS.distribution,
): DistributionBin[] {
  return summarizeDistribution(filterRows(table, selection), options);
}

// ═══ ALL VIEWS ═══

export function buildViews(
  table: CanonicalTable,
  selection: Selection = {},
  options: Partial<ViewOptions> = {},
): DashboardViews {
  const rows = filterRows(table, selection);
  const level = options.level ?? defaultLevel(selection);
  return {
    total: rows.length,
    level,
    geo: summarizeGeo(rows, level),
    types: summarizeTypes(rows),
    time: summarizeTime(rows, options.time ?? DEFAULT_VIEW_OPTIONS.time),
    distribution: summarizeDistribution(rows, options.distribution ?? DEFAULT_VIEW_OPTIONS.distribution),
  };
}
