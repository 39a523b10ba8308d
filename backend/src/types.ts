// ═══════════════════════════════════════════════════════
// DVF Explorer — Core Type Definitions
// Every data shape flowing through the pipeline and the API.
// ═══════════════════════════════════════════════════════

// ── Raw input ──

/** Scalar a CSV cell or JSON field may hold before coercion */
export type RawValue = string | number | null | undefined;

/** One raw record as emitted by the download boundary (CSV row or JSON object) */
export type RawRecord = Readonly<Record<string, RawValue>>;

/** Logical fields the cleaner resolves from raw column names */
export type Field =
  | 'price' | 'area' | 'date' | 'type'
  | 'region' | 'department' | 'commune' | 'communeName'
  | 'latitude' | 'longitude' | 'mutationId' | 'parcelId';

// ── Canonical records ──

export const PROPERTY_TYPES = ['apartment', 'house', 'dependency', 'commercial', 'other'] as const;
export type PropertyType = typeof PROPERTY_TYPES[number];

export const GEO_LEVELS = ['region', 'department', 'commune'] as const;
export type GeoLevel = typeof GEO_LEVELS[number];

export interface Transaction {
  date: string;              // "2023-01-31" (UTC calendar date)
  price: number;             // sale price, EUR, >= 0
  area: number;              // built area, m², > 0
  pricePerArea: number;      // price / area
  propertyType: PropertyType;
  regionCode: string | null;
  regionName: string | null;
  departmentCode: string | null;
  communeCode: string | null;
  communeName: string | null;
  latitude: number | null;
  longitude: number | null;
  mutationId: string | null;
  parcelId: string | null;
}

export const REJECT_REASONS = [
  'invalid_price', 'negative_price',
  'invalid_area', 'non_positive_area', 'invalid_price_per_area',
  'invalid_date', 'missing_geography', 'duplicate',
] as const;
export type RejectReason = typeof REJECT_REASONS[number];

export interface CleanStats {
  received: number;
  accepted: number;
  rejected: number;
  byReason: Record<RejectReason, number>;
}

/** Immutable output of the cleaner. Never mutated after construction. */
export interface CanonicalTable {
  readonly rows: readonly Transaction[];
  readonly stats: Readonly<CleanStats>;
  readonly loadedAt: string;
}

// ── Selection ──

export interface Selection {
  region?: string;
  department?: string;
  commune?: string;
  dateFrom?: string;         // inclusive, "YYYY-MM-DD"
  dateTo?: string;           // inclusive, "YYYY-MM-DD"
  propertyType?: PropertyType;
}

// ── Aggregated views ──

export interface GeoStat {
  count: number;
  mean: number;              // mean price-per-area
  name?: string;
}
export type GeoView = Record<string, GeoStat>;

export interface TypeStat {
  count: number;
  share: number;             // percent of filtered rows
  mean: number;
}
export type TypeView = Partial<Record<PropertyType, TypeStat>>;

export interface TimePoint {
  bucket: string;            // "YYYY-MM-DD"
  count: number;
  mean: number;
  movingAverage: number;
}

export interface DistributionBin {
  binStart: number;
  binEnd: number;
  count: number;
}

export type MovingAverageMode = 'observed' | 'calendar';

export interface TimeOptions {
  window: number;
  mode: MovingAverageMode;
}

export type DistributionOptions =
  | { bins: number; binWidth?: undefined }
  | { binWidth: number; bins?: undefined };

export interface ViewOptions {
  level: GeoLevel;
  time: TimeOptions;
  distribution: DistributionOptions;
}

export interface DashboardViews {
  total: number;
  level: GeoLevel;
  geo: GeoView;
  types: TypeView;
  time: TimePoint[];
  distribution: DistributionBin[];
}

// ── Location hierarchy ──

export interface CommuneNode {
  code: string;
  name: string;
}

export interface DepartmentNode {
  code: string;
  communes: CommuneNode[];
}

export interface RegionNode {
  code: string;
  name: string;
  departments: DepartmentNode[];
}

// ── Table store / stats ──

export interface TableInfo {
  version: number;
  loadedAt: string | null;
  rows: number;
  stats: CleanStats | null;
}
