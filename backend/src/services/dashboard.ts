/**
 * services/dashboard.ts — Selection → views, through the cache
 *
 * Reads the current table from the TableStore on every call, so a refresh
 * takes effect on the next request. Full view sets and the location tree are
 * cached under keys carrying the table version; single views are computed
 * directly.
 */
import {
  aggregateDistribution, aggregateGeo, aggregateTime, aggregateTypes, buildViews, defaultLevel,
} from './aggregator.ts';
import { buildHierarchy } from './hierarchy.ts';
import { locationsKey, viewsKey, type CacheService } from './cache-service.ts';
import type { TableStore } from './table-store.ts';
import { DashboardViewsSchema, LocationTreeSchema, type ViewsQuery } from '../schemas.ts';
import { viewDuration } from '../shared/metrics.ts';
import type {
  DashboardViews, DistributionBin, DistributionOptions, GeoLevel, GeoView,
  RegionNode, Selection, TableInfo, TimeOptions, TimePoint, TypeView, ViewOptions,
} from '../types.ts';

export interface DashboardConfig {
  viewsTtlSec: number;
  time: TimeOptions;
  distribution: DistributionOptions;
}

type ViewName = 'all' | 'geo' | 'types' | 'time' | 'distribution';

function timed<T>(view: ViewName, fn: () => T): T {
  const end = viewDuration.startTimer({ view });
  try {
    return fn();
  } finally {
    end();
  }
}

/** Split validated query params into the selection and the view options */
export function splitQuery(q: ViewsQuery): { selection: Selection; params: Partial<Pick<ViewsQuery, 'level' | 'bins' | 'binWidth' | 'window' | 'maMode'>> } {
  const { level, bins, binWidth, window, maMode, ...selection } = q;
  return { selection, params: { level, bins, binWidth, window, maMode } };
}

export class DashboardService {
  constructor(
    private readonly store: TableStore,
    private readonly cache: CacheService,
    private readonly config: DashboardConfig,
  ) {}

  /** Configured defaults overridden by per-request parameters */
  resolveOptions(q: ViewsQuery): ViewOptions {
    const time: TimeOptions = {
      window: q.window ?? this.config.time.window,
      mode: q.maMode ?? this.config.time.mode,
    };
    const distribution: DistributionOptions =
      q.binWidth !== undefined ? { binWidth: q.binWidth }
        : q.bins !== undefined ? { bins: q.bins }
          : this.config.distribution;
    const { selection } = splitQuery(q);
    return { level: q.level ?? defaultLevel(selection), time, distribution };
  }

  async views(q: ViewsQuery): Promise<DashboardViews> {
    const table = this.store.require();
    const { selection } = splitQuery(q);
    const options = this.resolveOptions(q);
    const key = viewsKey(this.store.version, { ...selection, ...options.time, ...options.distribution, level: options.level });

    const cached = await this.cache.get(key, v => DashboardViewsSchema.parse(v));
    if (cached) return cached;

    const views = timed('all', () => buildViews(table, selection, options));
    await this.cache.set(key, views, this.config.viewsTtlSec);
    return views;
  }

  geo(level: GeoLevel, selection: Selection): GeoView {
    const table = this.store.require();
    return timed('geo', () => aggregateGeo(table, level, selection));
  }

  types(selection: Selection): TypeView {
    const table = this.store.require();
    return timed('types', () => aggregateTypes(table, selection));
  }

  time(q: ViewsQuery): TimePoint[] {
    const table = this.store.require();
    const { selection } = splitQuery(q);
    return timed('time', () => aggregateTime(table, selection, this.resolveOptions(q).time));
  }

  distribution(q: ViewsQuery): DistributionBin[] {
    const table = this.store.require();
    const { selection } = splitQuery(q);
    return timed('distribution', () => aggregateDistribution(table, selection, this.resolveOptions(q).distribution));
  }

  async locations(): Promise<RegionNode[]> {
    const table = this.store.require();
    const key = locationsKey(this.store.version);

    const cached = await this.cache.get(key, v => LocationTreeSchema.parse(v));
    if (cached) return cached;

    const tree = buildHierarchy(table);
    await this.cache.set(key, tree, this.config.viewsTtlSec);
    return tree;
  }

  info(): TableInfo {
    return this.store.info();
  }
}
