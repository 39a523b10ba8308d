import { describe, it, expect } from 'vitest';
import { choroplethSpec, histogramSpec, lineSpec, pieSpec } from '../charts';
import { noDataColor, propertyTypeColors, sequentialColor, sequentialPalette, seriesColors } from '../theme';

const regions = [
  { code: '11', name: 'Île-de-France' },
  { code: '93', name: "Provence-Alpes-Côte d'Azur" },
  { code: '94', name: 'Corse' },
];

describe('choroplethSpec', () => {
  it('colours areas from low to high mean on the sequential scale', () => {
    const spec = choroplethSpec({
      '93': { count: 1, mean: 8000 },
      '11': { count: 2, mean: 1000, name: 'Île-de-France' },
    }, 'region', regions);

    expect(spec.domain).toEqual([1000, 8000]);
    expect(spec.areas).toEqual([
      { code: '11', name: 'Île-de-France', value: 1000, count: 2, color: sequentialPalette[0] },
      { code: '93', name: "Provence-Alpes-Côte d'Azur", value: 8000, count: 1, color: sequentialPalette[6] },
      { code: '94', name: 'Corse', value: 0, count: 0, color: noDataColor },
    ]);
    expect(spec.legend).toHaveLength(sequentialPalette.length);
    expect(spec.legend[0]).toEqual({ from: 1000, to: 2000, color: sequentialPalette[0] });
    expect(spec.legend[6]).toEqual({ from: 7000, to: 8000, color: sequentialPalette[6] });
  });

  it('falls back to the code for unnamed areas', () => {
    const spec = choroplethSpec({ IDF: { count: 2, mean: 3000 } }, 'region');
    expect(spec.areas).toEqual([{ code: 'IDF', name: 'IDF', value: 3000, count: 2, color: sequentialPalette[6] }]);
    expect(spec.legend).toEqual([{ from: 3000, to: 3000, color: sequentialPalette[6] }]);
  });

  it('has no domain for an empty view', () => {
    expect(choroplethSpec({}, 'department', [{ code: '75', name: '75' }])).toEqual({
      level: 'department',
      domain: null,
      areas: [{ code: '75', name: '75', value: 0, count: 0, color: noDataColor }],
      legend: [],
    });
  });
});

describe('sequentialColor', () => {
  it('maps the range ends to the palette ends', () => {
    expect(sequentialColor(0, 0, 70)).toBe(sequentialPalette[0]);
    expect(sequentialColor(35, 0, 70)).toBe(sequentialPalette[3]);
    expect(sequentialColor(70, 0, 70)).toBe(sequentialPalette[6]);
  });
});

describe('pieSpec', () => {
  it('lists slices in category order', () => {
    const spec = pieSpec({
      house: { count: 1, share: 25, mean: 2000 },
      apartment: { count: 3, share: 75, mean: 4000 },
    });
    expect(spec).toEqual({
      total: 4,
      slices: [
        { key: 'apartment', label: 'Apartment', value: 3, share: 75, mean: 4000, color: propertyTypeColors.apartment },
        { key: 'house', label: 'House', value: 1, share: 25, mean: 2000, color: propertyTypeColors.house },
      ],
    });
  });

  it('is empty without sales', () => {
    expect(pieSpec({})).toEqual({ total: 0, slices: [] });
  });
});

describe('lineSpec', () => {
  it('draws raw means and the moving average over the same buckets', () => {
    const spec = lineSpec([
      { bucket: '2023-01-01', count: 1, mean: 10, movingAverage: 10 },
      { bucket: '2023-01-02', count: 2, mean: 20, movingAverage: 15 },
    ], 14);
    expect(spec.series).toEqual([
      {
        id: 'mean', label: 'Mean price per m²', color: seriesColors.mean,
        points: [{ x: '2023-01-01', y: 10 }, { x: '2023-01-02', y: 20 }],
      },
      {
        id: 'movingAverage', label: 'Moving average (14)', color: seriesColors.movingAverage,
        points: [{ x: '2023-01-01', y: 10 }, { x: '2023-01-02', y: 15 }],
      },
    ]);
  });

  it('omits the window from the label when unknown', () => {
    expect(lineSpec([]).series[1]?.label).toBe('Moving average');
  });
});

describe('histogramSpec', () => {
  it('labels each bar with its rounded range', () => {
    expect(histogramSpec([
      { binStart: 0, binEnd: 2500.4, count: 3 },
      { binStart: 2500.4, binEnd: 5000, count: 1 },
    ])).toEqual({
      total: 4,
      bars: [
        { label: '0-2500', from: 0, to: 2500.4, count: 3 },
        { label: '2500-5000', from: 2500.4, to: 5000, count: 1 },
      ],
    });
  });

  it('labels a single-value bin with the value', () => {
    expect(histogramSpec([{ binStart: 5, binEnd: 5, count: 3 }]).bars[0]?.label).toBe('5');
  });
});
