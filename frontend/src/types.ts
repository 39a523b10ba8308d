/**
 * types.ts — Shared TypeScript interfaces for the dashboard data layer
 *
 * Shapes returned by the API, held by the store, and produced by the chart
 * builders. Mirrors the backend's view types; nothing here is chart-library specific.
 */

// ── Domain ──
export const PROPERTY_TYPES = ['apartment', 'house', 'dependency', 'commercial', 'other'] as const;
export type PropertyType = typeof PROPERTY_TYPES[number];

export const GEO_LEVELS = ['region', 'department', 'commune'] as const;
export type GeoLevel = typeof GEO_LEVELS[number];

export type MovingAverageMode = 'observed' | 'calendar';

export interface Selection {
  region?: string;
  department?: string;
  commune?: string;
  dateFrom?: string;
  dateTo?: string;
  propertyType?: PropertyType;
}

/** Per-request view options on top of the selection */
export interface ViewParams {
  level?: GeoLevel;
  bins?: number;
  binWidth?: number;
  window?: number;
  maMode?: MovingAverageMode;
}

// ── Views ──
export interface GeoStat {
  count: number;
  mean: number;
  name?: string;
}
export type GeoView = Record<string, GeoStat>;

export interface TypeStat {
  count: number;
  share: number;
  mean: number;
}
export type TypeView = Partial<Record<PropertyType, TypeStat>>;

export interface TimePoint {
  bucket: string;
  count: number;
  mean: number;
  movingAverage: number;
}

export interface DistributionBin {
  binStart: number;
  binEnd: number;
  count: number;
}

export interface DashboardViews {
  total: number;
  level: GeoLevel;
  geo: GeoView;
  types: TypeView;
  time: TimePoint[];
  distribution: DistributionBin[];
}

// ── Locations ──
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

// ── Table stats ──
export interface TableStats {
  version: number;
  loadedAt: string | null;
  rows: number;
  refreshing: boolean;
  stats: {
    received: number;
    accepted: number;
    rejected: number;
    byReason: Record<string, number>;
  } | null;
}

export interface RefreshResult {
  trigger: string;
  version: number;
  durationMs: number;
  persisted: boolean;
  stats: NonNullable<TableStats['stats']>;
}

// ── Store ──
export interface DashboardState {
  selection: Selection;
  params: ViewParams;
  views: DashboardViews | null;
  locations: RegionNode[];
  stats: TableStats | null;
  loading: boolean;
  refreshing: boolean;
  error: string | null;
}

// ── Chart specs ──
export interface LegendStep {
  from: number;
  to: number;
  color: string;
}

export interface ChoroplethSpec {
  level: GeoLevel;
  domain: [number, number] | null;
  areas: Array<{ code: string; name: string; value: number; count: number; color: string }>;
  legend: LegendStep[];
}

export interface PieSpec {
  total: number;
  slices: Array<{ key: PropertyType; label: string; value: number; share: number; mean: number; color: string }>;
}

export interface LineSeries {
  id: 'mean' | 'movingAverage';
  label: string;
  color: string;
  points: Array<{ x: string; y: number }>;
}

export interface LineSpec {
  series: LineSeries[];
}

export interface HistogramSpec {
  total: number;
  bars: Array<{ label: string; from: number; to: number; count: number }>;
}
