/**
 * useDashboardStore.ts — Zustand store for the dashboard
 *
 * Holds the selection, the views computed for it and the location tree that
 * feeds the cascading selectors. Every selection change refetches the views;
 * only the latest request's response is applied.
 */
import { create } from 'zustand';
import type {
  CommuneNode, DashboardState, DepartmentNode, PropertyType, RegionNode, Selection, ViewParams,
} from '../types';
import { fetchLocations, fetchStats, fetchViews, refreshData, withColdStartRetry } from '../services/api';

interface DashboardActions {
  bootstrap: () => Promise<void>;
  loadViews: () => Promise<void>;
  setRegion: (code?: string) => Promise<void>;
  setDepartment: (code?: string) => Promise<void>;
  setCommune: (code?: string) => Promise<void>;
  setDateRange: (from?: string, to?: string) => Promise<void>;
  setPropertyType: (type?: PropertyType) => Promise<void>;
  setParams: (params: ViewParams) => Promise<void>;
  resetSelection: () => Promise<void>;
  refresh: (key: string) => Promise<void>;
  _request: number;
}

type Store = DashboardState & DashboardActions;

export const INITIAL_STATE: DashboardState = {
  selection: {},
  params: {},
  views: null,
  locations: [],
  stats: null,
  loading: false,
  refreshing: false,
  error: null,
};

const message = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/** Merge a patch into the selection, dropping cleared keys */
function patchSelection(current: Selection, patch: Selection): Selection {
  const { region, department, commune, dateFrom, dateTo, propertyType } = { ...current, ...patch };
  return {
    ...(region !== undefined && { region }),
    ...(department !== undefined && { department }),
    ...(commune !== undefined && { commune }),
    ...(dateFrom !== undefined && { dateFrom }),
    ...(dateTo !== undefined && { dateTo }),
    ...(propertyType !== undefined && { propertyType }),
  };
}

/** Merge view params; `bins` and `binWidth` are alternatives, the newer one wins */
export function mergeParams(current: ViewParams, patch: ViewParams): ViewParams {
  const { bins, binWidth, ...rest } = { ...current, ...patch };
  const binning = patch.binWidth !== undefined ? { binWidth: patch.binWidth }
    : patch.bins !== undefined ? { bins: patch.bins }
    : binWidth !== undefined ? { binWidth }
    : bins !== undefined ? { bins }
    : {};
  return { ...rest, ...binning };
}

// ═══ SELECTORS ═══

export function departmentsOf(locations: readonly RegionNode[], region?: string): DepartmentNode[] {
  const regions = region === undefined ? locations : locations.filter(r => r.code === region);
  return regions.flatMap(r => r.departments);
}

export function communesOf(locations: readonly RegionNode[], region?: string, department?: string): CommuneNode[] {
  const departments = departmentsOf(locations, region);
  return (department === undefined ? departments : departments.filter(d => d.code === department))
    .flatMap(d => d.communes);
}

export function regionOfDepartment(locations: readonly RegionNode[], department: string): string | undefined {
  return locations.find(r => r.departments.some(d => d.code === department))?.code;
}

const useDashboardStore = create<Store>((set, get) => ({
  ...INITIAL_STATE,
  _request: 0,

  // ═══ ACTIONS: DATA ═══

  bootstrap: async () => {
    set({ loading: true, error: null });
    const { selection, params } = get();
    try {
      const [locations, views, stats] = await withColdStartRetry(() =>
        Promise.all([fetchLocations(), fetchViews(selection, params), fetchStats()]));
      set({ locations, views, stats, loading: false });
    } catch (err) {
      set({ error: message(err), loading: false });
    }
  },

  loadViews: async () => {
    const id = get()._request + 1;
    set({ _request: id, loading: true, error: null });
    const { selection, params } = get();
    try {
      const views = await fetchViews(selection, params);
      if (get()._request !== id) return;
      set({ views, loading: false });
    } catch (err) {
      if (get()._request !== id) return;
      set({ error: message(err), loading: false });
    }
  },

  refresh: async (key) => {
    set({ refreshing: true, error: null });
    try {
      await refreshData(key);
      const [locations, stats] = await Promise.all([fetchLocations(), fetchStats()]);
      set({ locations, stats, refreshing: false });
      await get().loadViews();
    } catch (err) {
      set({ error: message(err), refreshing: false });
    }
  },

  // ═══ ACTIONS: SELECTION (cascading) ═══

  setRegion: (code) => {
    set(s => ({ selection: patchSelection(s.selection, { region: code, department: undefined, commune: undefined }) }));
    return get().loadViews();
  },

  setDepartment: (code) => {
    set(s => {
      const region = code === undefined ? s.selection.region : regionOfDepartment(s.locations, code) ?? s.selection.region;
      return { selection: patchSelection(s.selection, { region, department: code, commune: undefined }) };
    });
    return get().loadViews();
  },

  setCommune: (code) => {
    set(s => ({ selection: patchSelection(s.selection, { commune: code }) }));
    return get().loadViews();
  },

  setDateRange: (from, to) => {
    set(s => ({ selection: patchSelection(s.selection, { dateFrom: from, dateTo: to }) }));
    return get().loadViews();
  },

  setPropertyType: (type) => {
    set(s => ({ selection: patchSelection(s.selection, { propertyType: type }) }));
    return get().loadViews();
  },

  setParams: (params) => {
    set(s => ({ params: mergeParams(s.params, params) }));
    return get().loadViews();
  },

  resetSelection: () => {
    set({ selection: {} });
    return get().loadViews();
  },
}));

export default useDashboardStore;
