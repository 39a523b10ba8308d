import type { z } from 'zod';
import type { DashboardViews, RefreshResult, RegionNode, Selection, TableStats, ViewParams } from '../types';
import {
  DashboardViewsSchema, EnvelopeSchema, LocationsSchema, RefreshResultSchema, TableStatsSchema,
} from './schemas';

const API = import.meta.env.VITE_API_URL || '';

/** Non-2xx answer or `{ success: false }` envelope */
export class ApiError extends Error {
  constructor(message: string, readonly status: number, readonly code?: string) {
    super(message);
    this.name = 'ApiError';
  }
}

async function request<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, init?: RequestInit): Promise<T> {
  const res = await fetch(`${API}${path}`, init);
  const parsed = EnvelopeSchema.safeParse(await res.json().catch(() => null));
  if (!parsed.success) throw new ApiError(`API ${res.status}`, res.status);
  const body = parsed.data;
  if (!res.ok || !body.success) {
    throw new ApiError(body.error || `API ${res.status}`, res.status, body.code);
  }
  return schema.parse(body.data);
}

/** Query string for a selection plus view params; empty values are left out */
export function toQuery(params: Selection & ViewParams): string {
  const sp = new URLSearchParams();
  Object.entries(params).forEach(([k, v]) => {
    if (v !== undefined && v !== '') sp.set(k, String(v));
  });
  const qs = sp.toString();
  return qs ? `?${qs}` : '';
}

/**
 * Retries while the server answers 503 (table still loading after a cold start).
 */
export async function withColdStartRetry<T>(fn: () => Promise<T>, attempts = 3, delayMs = 5000): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= attempts || !(err instanceof ApiError) || err.status !== 503) throw err;
      console.warn(`Views not ready (attempt ${attempt}/${attempts}), retrying`);
      await new Promise(r => setTimeout(r, delayMs));
    }
  }
}

export function fetchViews(selection: Selection = {}, params: ViewParams = {}): Promise<DashboardViews> {
  return request(`/api/views${toQuery({ ...selection, ...params })}`, DashboardViewsSchema);
}

export function fetchLocations(): Promise<RegionNode[]> {
  return request('/api/locations', LocationsSchema);
}

export function fetchStats(): Promise<TableStats> {
  return request('/api/stats', TableStatsSchema);
}

/** Reload the server's data file and wait for the new table to be published */
export function refreshData(key: string): Promise<RefreshResult> {
  return request('/api/refresh?wait=true', RefreshResultSchema, {
    method: 'POST',
    headers: { Authorization: `Bearer ${key}` },
  });
}
