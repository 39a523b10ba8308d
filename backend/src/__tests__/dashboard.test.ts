import { describe, it, expect, vi } from 'vitest';
import { DashboardService, splitQuery } from '../services/dashboard.ts';
import { CacheService } from '../services/cache-service.ts';
import { TableStore } from '../services/table-store.ts';
import { clean } from '../services/cleaner.ts';
import { InvalidSelectionError, TableNotReadyError } from '../services/errors.ts';
import type { RawRecord } from '../types.ts';

const sales: RawRecord[] = [
  { price: 300000, area: 100, date: '2023-01-05', type: 'Appartement', commune: '75056', commune_name: 'Paris' },
  { price: 150000, area: 50, date: '2023-01-06', type: 'Maison', commune: '75056', commune_name: 'Paris' },
  { price: 200000, area: 100, date: '2023-01-06', type: 'Maison', commune: '13055', commune_name: 'Marseille' },
];

function setup(records: RawRecord[] = sales) {
  const store = new TableStore();
  const cache = new CacheService();
  store.publish(clean(records));
  const dashboard = new DashboardService(store, cache, {
    viewsTtlSec: 60,
    time: { window: 14, mode: 'observed' },
    distribution: { bins: 4 },
  });
  return { store, cache, dashboard };
}

describe('DashboardService', () => {
  it('fails before a table is published', async () => {
    const dashboard = new DashboardService(new TableStore(), new CacheService(), {
      viewsTtlSec: 60, time: { window: 14, mode: 'observed' }, distribution: { bins: 4 },
    });
    await expect(dashboard.views({})).rejects.toBeInstanceOf(TableNotReadyError);
    expect(() => dashboard.types({})).toThrow(TableNotReadyError);
  });

  it('computes all views for a selection', async () => {
    const { dashboard } = setup();
    const views = await dashboard.views({ region: '11' });
    expect(views.total).toBe(2);
    expect(views.level).toBe('department');
    expect(views.geo).toEqual({ '75': { count: 2, mean: 3000 } });
    expect(views.time.map(p => p.bucket)).toEqual(['2023-01-05', '2023-01-06']);
    expect(views.distribution).toEqual([{ binStart: 3000, binEnd: 3000, count: 2 }]);
  });

  it('serves repeated requests from the cache', async () => {
    const { dashboard, cache } = setup();
    const set = vi.spyOn(cache, 'set');

    const first = await dashboard.views({ propertyType: 'house' });
    const second = await dashboard.views({ propertyType: 'house' });
    expect(second).toEqual(first);
    expect(set).toHaveBeenCalledTimes(1);
  });

  it('recomputes after a new table is published', async () => {
    const { dashboard, store } = setup();
    expect((await dashboard.views({})).total).toBe(3);
    store.publish(clean(sales.slice(0, 1)));
    expect((await dashboard.views({})).total).toBe(1);
  });

  it('applies request options over the configured defaults', () => {
    const { dashboard } = setup();
    expect(dashboard.resolveOptions({ window: 3, binWidth: 500 })).toEqual({
      level: 'region',
      time: { window: 3, mode: 'observed' },
      distribution: { binWidth: 500 },
    });
    expect(dashboard.resolveOptions({ commune: '75056', maMode: 'calendar' })).toEqual({
      level: 'commune',
      time: { window: 14, mode: 'calendar' },
      distribution: { bins: 4 },
    });
  });

  it('computes single views', () => {
    const { dashboard } = setup();
    expect(dashboard.geo('commune', {})).toEqual({
      '13055': { count: 1, mean: 2000, name: 'Marseille' },
      '75056': { count: 2, mean: 3000, name: 'Paris' },
    });
    expect(dashboard.types({ department: '75' })).toEqual({
      apartment: { count: 1, share: 50, mean: 3000 },
      house: { count: 1, share: 50, mean: 3000 },
    });
    expect(dashboard.time({ window: 2 }).map(p => p.movingAverage)).toEqual([3000, 2750]);
    expect(dashboard.distribution({ bins: 2 })).toEqual([
      { binStart: 2000, binEnd: 2500, count: 1 },
      { binStart: 2500, binEnd: 3000, count: 2 },
    ]);
  });

  it('surfaces distributions that need too many bins', () => {
    const { dashboard } = setup();
    expect(() => dashboard.distribution({ binWidth: 0.5 })).toThrow(InvalidSelectionError);
  });

  it('caches the location tree per table version', async () => {
    const { dashboard, cache } = setup();
    const tree = await dashboard.locations();
    expect(tree.map(r => r.code)).toEqual(['11', '93']);
    expect(await cache.getStats()).toEqual({ type: 'memory', keys: 1 });
    expect(await dashboard.locations()).toEqual(tree);
  });

  it('reports table info', () => {
    const { dashboard } = setup();
    expect(dashboard.info()).toMatchObject({ version: 1, rows: 3 });
  });
});

describe('splitQuery', () => {
  it('separates the selection from view parameters', () => {
    expect(splitQuery({ region: '11', bins: 10, maMode: 'calendar' })).toEqual({
      selection: { region: '11' },
      params: { level: undefined, bins: 10, binWidth: undefined, window: undefined, maMode: 'calendar' },
    });
  });
});
