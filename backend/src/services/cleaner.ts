/**
 * cleaner.ts — Loader/Cleaner: raw DVF records → canonical table
 *
 * Each record runs through a fixed sequence of named predicates
 * (price → area → price-per-area → date → geography). The first rejection
 * wins and is counted by reason; accepted rows get their price-per-area attached.
 *
 * Every row of the table carries a code at each level it can be grouped by:
 * all three by default, fewer when `requiredLevels` says so.
 *
 * TableBuilder accepts records one at a time so the CSV loader can stream
 * millions of rows without materializing the raw file; clean() is the
 * array form. Neither touches the network or the disk.
 */
import { DataFormatError } from './errors.ts';
import { parseDay, parseNumber, parseText, foldText } from './helpers.ts';
import {
  departmentOfCommune, normalizeCommuneCode, normalizeDepartmentCode,
  regionName, regionOfDepartment, resolveRegion,
} from './regions.ts';
import { GEO_LEVELS } from '../types.ts';
import type {
  CanonicalTable, CleanStats, Field, GeoLevel, PropertyType,
  RawRecord, RawValue, RejectReason, Transaction,
} from '../types.ts';

// ── Column resolution ──

/** Accepted column names per logical field, DVF name first */
export const COLUMN_ALIASES: Readonly<Record<Field, readonly string[]>> = {
  price: ['valeur_fonciere', 'price'],
  area: ['surface_reelle_bati', 'area'],
  date: ['date_mutation', 'date'],
  type: ['type_local', 'type', 'property_type'],
  region: ['code_region', 'region'],
  department: ['code_departement', 'department'],
  commune: ['code_commune', 'commune'],
  communeName: ['nom_commune', 'commune_name'],
  latitude: ['latitude', 'lat'],
  longitude: ['longitude', 'lon', 'lng'],
  mutationId: ['id_mutation', 'id'],
  parcelId: ['id_parcelle', 'parcel_id'],
};

/** Mandatory column groups: a group is present if any of its fields is */
const MANDATORY: ReadonlyArray<{ label: string; fields: readonly Field[] }> = [
  { label: 'price', fields: ['price'] },
  { label: 'area', fields: ['area'] },
  { label: 'date', fields: ['date'] },
  { label: 'geography', fields: ['region', 'department', 'commune'] },
];

function fieldValue(record: RawRecord, field: Field): RawValue {
  for (const alias of COLUMN_ALIASES[field]) {
    if (Object.hasOwn(record, alias)) return record[alias];
  }
  return undefined;
}

/** Mandatory groups with no matching column among the given column names */
export function missingColumns(columns: ReadonlySet<string>): string[] {
  return MANDATORY
    .filter(group => !group.fields.some(f => COLUMN_ALIASES[f].some(alias => columns.has(alias))))
    .map(group => group.label);
}

// ── Validation predicates ──

/** Levels a row must resolve unless told otherwise */
export const DEFAULT_REQUIRED_LEVELS: readonly GeoLevel[] = GEO_LEVELS;

export type Check<T> = { ok: true; value: T } | { ok: false; reason: RejectReason };

const accept = <T>(value: T): Check<T> => ({ ok: true, value });
const reject = (reason: RejectReason): { ok: false; reason: RejectReason } => ({ ok: false, reason });

export function checkPrice(v: RawValue): Check<number> {
  const price = parseNumber(v);
  if (price === null) return reject('invalid_price');
  if (price < 0) return reject('negative_price');
  return accept(price);
}

export function checkArea(v: RawValue): Check<number> {
  const area = parseNumber(v);
  if (area === null) return reject('invalid_area');
  if (area <= 0) return reject('non_positive_area');
  return accept(area);
}

/** Overflow guard: a tiny area can push price / area to Infinity */
export function checkPricePerArea(price: number, area: number): Check<number> {
  const ppa = price / area;
  return Number.isFinite(ppa) ? accept(ppa) : reject('invalid_price_per_area');
}

export function checkDate(v: RawValue): Check<string> {
  const day = parseDay(v);
  return day === null ? reject('invalid_date') : accept(day);
}

export interface Geography {
  regionCode: string | null;
  regionName: string | null;
  departmentCode: string | null;
  communeCode: string | null;
}

/**
 * Resolve all three levels, deriving the department from the commune code and
 * the region from the department when the record does not carry them.
 * A row must resolve at least one level, plus every level in `required`.
 */
export function checkGeography(
  raw: { region: RawValue; department: RawValue; commune: RawValue },
  required: readonly GeoLevel[] = DEFAULT_REQUIRED_LEVELS,
): Check<Geography> {
  const communeText = parseText(raw.commune);
  const communeCode = communeText === null ? null : normalizeCommuneCode(communeText);

  const departmentText = parseText(raw.department);
  const departmentCode = departmentText !== null
    ? normalizeDepartmentCode(departmentText)
    : communeCode !== null ? departmentOfCommune(communeCode) : null;

  const regionText = parseText(raw.region);
  let region: { code: string; name: string | null } | null = null;
  if (regionText !== null) {
    region = resolveRegion(regionText);
  } else if (departmentCode !== null) {
    const code = regionOfDepartment(departmentCode);
    if (code !== null) region = { code, name: regionName(code) };
  }

  const geo: Geography = {
    regionCode: region?.code ?? null,
    regionName: region?.name ?? null,
    departmentCode,
    communeCode,
  };
  const byLevel: Record<GeoLevel, string | null> = {
    region: geo.regionCode,
    department: geo.departmentCode,
    commune: geo.communeCode,
  };
  const resolved = GEO_LEVELS.some(level => byLevel[level] !== null) && required.every(level => byLevel[level] !== null);
  return resolved ? accept(geo) : reject('missing_geography');
}

// ── Property type normalization ──

const TYPE_NAMES: ReadonlyArray<[PropertyType, readonly string[]]> = [
  ['apartment', ['appartement', 'apartment', 'flat']],
  ['house', ['maison', 'house']],
  ['dependency', ['dependance', 'dependency', 'outbuilding']],
  ['commercial', [
    'local industriel. commercial ou assimile',
    'local industriel, commercial ou assimile',
    'commercial', 'industrial', 'commercial/industrial',
  ]],
];

const TYPE_LOOKUP = new Map<string, PropertyType>(
  TYPE_NAMES.flatMap(([type, names]) => names.map(n => [n, type] as const)),
);

/** Case- and accent-insensitive match to the fixed category set; anything else is "other" */
export function normalizePropertyType(v: RawValue): PropertyType {
  const text = parseText(v);
  if (text === null) return 'other';
  return TYPE_LOOKUP.get(foldText(text)) ?? 'other';
}

// ── Row conversion ──

export type RowOutcome = { ok: true; row: Transaction } | { ok: false; reason: RejectReason };

export function toTransaction(record: RawRecord, requiredLevels: readonly GeoLevel[] = DEFAULT_REQUIRED_LEVELS): RowOutcome {
  const price = checkPrice(fieldValue(record, 'price'));
  if (!price.ok) return price;
  const area = checkArea(fieldValue(record, 'area'));
  if (!area.ok) return area;
  const pricePerArea = checkPricePerArea(price.value, area.value);
  if (!pricePerArea.ok) return pricePerArea;
  const date = checkDate(fieldValue(record, 'date'));
  if (!date.ok) return date;
  const geo = checkGeography({
    region: fieldValue(record, 'region'),
    department: fieldValue(record, 'department'),
    commune: fieldValue(record, 'commune'),
  }, requiredLevels);
  if (!geo.ok) return geo;

  return {
    ok: true,
    row: {
      date: date.value,
      price: price.value,
      area: area.value,
      pricePerArea: pricePerArea.value,
      propertyType: normalizePropertyType(fieldValue(record, 'type')),
      ...geo.value,
      communeName: parseText(fieldValue(record, 'communeName')),
      latitude: parseNumber(fieldValue(record, 'latitude')),
      longitude: parseNumber(fieldValue(record, 'longitude')),
      mutationId: parseText(fieldValue(record, 'mutationId')),
      parcelId: parseText(fieldValue(record, 'parcelId')),
    },
  };
}

// ── Table construction ──

export interface CleanOptions {
  /** Levels every row must resolve; rows missing one are rejected. Default: all three. */
  requiredLevels?: readonly GeoLevel[];
  /** Keep only the first record per parcel id (when the column exists). Default: true. */
  dedupe?: boolean;
  loadedAt?: string;
}

function zeroCounts(): Record<RejectReason, number> {
  return {
    invalid_price: 0, negative_price: 0,
    invalid_area: 0, non_positive_area: 0, invalid_price_per_area: 0,
    invalid_date: 0, missing_geography: 0, duplicate: 0,
  };
}

export class TableBuilder {
  private readonly rows: Transaction[] = [];
  private readonly byReason = zeroCounts();
  private readonly columns = new Set<string>();
  private readonly seenParcels = new Set<string>();
  private readonly requiredLevels: readonly GeoLevel[];
  private readonly dedupe: boolean;
  private received = 0;
  private columnsComplete = false;

  constructor(private readonly options: CleanOptions = {}) {
    this.requiredLevels = options.requiredLevels ?? DEFAULT_REQUIRED_LEVELS;
    this.dedupe = options.dedupe ?? true;
  }

  add(record: RawRecord): void {
    this.received++;
    if (!this.columnsComplete) {
      for (const key of Object.keys(record)) this.columns.add(key);
      this.columnsComplete = missingColumns(this.columns).length === 0;
    }

    if (this.dedupe) {
      const parcel = parseText(fieldValue(record, 'parcelId'));
      if (parcel !== null) {
        if (this.seenParcels.has(parcel)) { this.byReason.duplicate++; return; }
        this.seenParcels.add(parcel);
      }
    }

    const outcome = toTransaction(record, this.requiredLevels);
    if (!outcome.ok) { this.byReason[outcome.reason]++; return; }
    this.rows.push(Object.freeze(outcome.row));
  }

  /** Throws DataFormatError if any mandatory column never appeared. */
  build(): CanonicalTable {
    if (this.received > 0 && !this.columnsComplete) {
      throw new DataFormatError(missingColumns(this.columns));
    }
    const rejected = Object.values(this.byReason).reduce((s, n) => s + n, 0);
    const stats: CleanStats = {
      received: this.received,
      accepted: this.rows.length,
      rejected,
      byReason: { ...this.byReason },
    };
    return freezeTable(this.rows, stats, this.options.loadedAt ?? new Date().toISOString());
  }
}

/** Wrap already-canonical rows (e.g. read back from Postgres) into an immutable table */
export function freezeTable(rows: readonly Transaction[], stats: CleanStats, loadedAt: string): CanonicalTable {
  return Object.freeze({
    rows: Object.freeze([...rows]),
    stats: Object.freeze({ ...stats, byReason: Object.freeze({ ...stats.byReason }) }),
    loadedAt,
  });
}

/** Zeroed rejection counters */
export function emptyStats(): CleanStats {
  return { received: 0, accepted: 0, rejected: 0, byReason: zeroCounts() };
}

/**
 * Clean an ordered sequence of raw records into a canonical table.
 * Input order is preserved. An empty input yields an empty table.
 */
export function clean(records: Iterable<RawRecord>, options: CleanOptions = {}): CanonicalTable {
  const builder = new TableBuilder(options);
  for (const record of records) builder.add(record);
  return builder.build();
}
