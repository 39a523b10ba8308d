/**
 * charts.ts — Views → chart specs
 *
 * Pure builders, one per dashboard chart. Specs hold plain numbers, labels
 * and colours so any rendering library can draw them.
 */
import { noDataColor, propertyTypeColors, sequentialColor, sequentialPalette, seriesColors } from './theme';
import { PROPERTY_TYPES } from './types';
import type {
  ChoroplethSpec, DistributionBin, GeoLevel, GeoView, HistogramSpec, LegendStep,
  LineSpec, PieSpec, PropertyType, TimePoint, TypeView,
} from './types';

export const PROPERTY_TYPE_LABELS: Record<PropertyType, string> = {
  apartment: 'Apartment',
  house: 'House',
  dependency: 'Outbuilding',
  commercial: 'Commercial',
  other: 'Other',
};

// ═══ CHOROPLETH ═══

function legendFor(min: number, max: number): LegendStep[] {
  const steps = sequentialPalette.length;
  const width = (max - min) / steps;
  return sequentialPalette.map((color, i) => ({
    from: min + i * width,
    to: i === steps - 1 ? max : min + (i + 1) * width,
    color,
  }));
}

/**
 * Mean price per m² per area on a sequential scale.
 * `areas` (e.g. from the location tree) adds areas without sales in grey.
 */
export function choroplethSpec(
  view: GeoView,
  level: GeoLevel,
  areas: ReadonlyArray<{ code: string; name: string }> = [],
): ChoroplethSpec {
  const entries = Object.entries(view);
  if (entries.length === 0) {
    return {
      level,
      domain: null,
      areas: areas.map(a => ({ code: a.code, name: a.name, value: 0, count: 0, color: noDataColor })),
      legend: [],
    };
  }

  const means = entries.map(([, s]) => s.mean);
  const min = Math.min(...means);
  const max = Math.max(...means);
  const names = new Map(areas.map(a => [a.code, a.name]));

  const withData = entries.map(([code, s]) => ({
    code,
    name: s.name ?? names.get(code) ?? code,
    value: s.mean,
    count: s.count,
    color: sequentialColor(s.mean, min, max),
  }));
  const empty = areas
    .filter(a => view[a.code] === undefined)
    .map(a => ({ code: a.code, name: a.name, value: 0, count: 0, color: noDataColor }));

  return {
    level,
    domain: [min, max],
    areas: [...withData, ...empty].sort((a, b) => a.code.localeCompare(b.code)),
    legend: min === max ? [{ from: min, to: max, color: sequentialColor(min, min, max) }] : legendFor(min, max),
  };
}

// ═══ PIE ═══

export function pieSpec(view: TypeView): PieSpec {
  const slices = PROPERTY_TYPES.flatMap(key => {
    const stat = view[key];
    if (!stat) return [];
    return [{
      key,
      label: PROPERTY_TYPE_LABELS[key],
      value: stat.count,
      share: stat.share,
      mean: stat.mean,
      color: propertyTypeColors[key],
    }];
  });
  return { total: slices.reduce((s, x) => s + x.value, 0), slices };
}

// ═══ LINE ═══

/** Daily means and their moving average as two series over the same buckets */
export function lineSpec(points: readonly TimePoint[], window?: number): LineSpec {
  return {
    series: [
      {
        id: 'mean',
        label: 'Mean price per m²',
        color: seriesColors.mean,
        points: points.map(p => ({ x: p.bucket, y: p.mean })),
      },
      {
        id: 'movingAverage',
        label: window === undefined ? 'Moving average' : `Moving average (${window})`,
        color: seriesColors.movingAverage,
        points: points.map(p => ({ x: p.bucket, y: p.movingAverage })),
      },
    ],
  };
}

// ═══ HISTOGRAM ═══

const round = (v: number): number => Math.round(v);

export function histogramSpec(bins: readonly DistributionBin[]): HistogramSpec {
  return {
    total: bins.reduce((s, b) => s + b.count, 0),
    bars: bins.map(b => ({
      label: b.binStart === b.binEnd ? `${round(b.binStart)}` : `${round(b.binStart)}-${round(b.binEnd)}`,
      from: b.binStart,
      to: b.binEnd,
      count: b.count,
    })),
  };
}
