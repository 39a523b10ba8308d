import { describe, it, expect } from 'vitest';
import {
  DashboardViewsSchema, GeoViewQuerySchema, RefreshQuerySchema, SelectionQuerySchema, ViewsQuerySchema,
} from '../schemas.ts';

describe('SelectionQuerySchema', () => {
  it('accepts a full selection', () => {
    expect(SelectionQuerySchema.parse({
      region: ' 11 ', department: '75', commune: '75056',
      dateFrom: '2023-01-01', dateTo: '2023-12-31', propertyType: 'house',
    })).toEqual({
      region: '11', department: '75', commune: '75056',
      dateFrom: '2023-01-01', dateTo: '2023-12-31', propertyType: 'house',
    });
  });

  it('rejects impossible dates and unknown property types', () => {
    expect(SelectionQuerySchema.safeParse({ dateFrom: '2023-02-30' }).success).toBe(false);
    expect(SelectionQuerySchema.safeParse({ dateFrom: '01/02/2023' }).success).toBe(false);
    expect(SelectionQuerySchema.safeParse({ propertyType: 'castle' }).success).toBe(false);
  });

  it('rejects a reversed date range', () => {
    const result = SelectionQuerySchema.safeParse({ dateFrom: '2023-06-01', dateTo: '2023-01-01' });
    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe('dateFrom must not be after dateTo');
  });
});

describe('ViewsQuerySchema', () => {
  it('coerces numeric query strings', () => {
    expect(ViewsQuerySchema.parse({ bins: '30', window: '7', maMode: 'calendar', level: 'commune' })).toEqual({
      bins: 30, window: 7, maMode: 'calendar', level: 'commune',
    });
  });

  it('bounds bins and window', () => {
    expect(ViewsQuerySchema.safeParse({ bins: '0' }).success).toBe(false);
    expect(ViewsQuerySchema.safeParse({ bins: '1001' }).success).toBe(false);
    expect(ViewsQuerySchema.safeParse({ window: '366' }).success).toBe(false);
    expect(ViewsQuerySchema.safeParse({ binWidth: '-5' }).success).toBe(false);
  });

  it('does not take bins and binWidth together', () => {
    const result = ViewsQuerySchema.safeParse({ bins: '10', binWidth: '100' });
    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.path).toEqual(['binWidth']);
  });
});

describe('GeoViewQuerySchema', () => {
  it('requires a valid level', () => {
    expect(GeoViewQuerySchema.parse({ level: 'department' })).toEqual({ level: 'department' });
    expect(GeoViewQuerySchema.safeParse({ level: 'country' }).success).toBe(false);
    expect(GeoViewQuerySchema.safeParse({}).success).toBe(false);
  });
});

describe('RefreshQuerySchema', () => {
  it('defaults to not waiting', () => {
    expect(RefreshQuerySchema.parse({})).toEqual({ wait: false });
    expect(RefreshQuerySchema.parse({ key: 'test-secret', wait: 'true' })).toEqual({ key: 'test-secret', wait: true });
    expect(RefreshQuerySchema.safeParse({ wait: 'yes' }).success).toBe(false);
  });
});

describe('DashboardViewsSchema', () => {
  it('accepts a serialized views payload', () => {
    const payload = {
      total: 1,
      level: 'region',
      geo: { '11': { count: 1, mean: 3000, name: 'Île-de-France' } },
      types: { apartment: { count: 1, share: 100, mean: 3000 } },
      time: [{ bucket: '2023-01-05', count: 1, mean: 3000, movingAverage: 3000 }],
      distribution: [{ binStart: 3000, binEnd: 3000, count: 1 }],
    };
    expect(DashboardViewsSchema.parse(JSON.parse(JSON.stringify(payload)))).toEqual(payload);
  });

  it('rejects unknown property types', () => {
    expect(DashboardViewsSchema.safeParse({
      total: 0, level: 'region', geo: {}, types: { castle: { count: 1, share: 100, mean: 1 } }, time: [], distribution: [],
    }).success).toBe(false);
  });
});
