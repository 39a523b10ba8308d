/**
 * theme.ts — Single source of truth for chart colours
 *
 * The chart builders take every colour from here; nothing else should carry
 * hex values.
 */
import type { PropertyType } from './types';

// ── Color Palette ──
export const colors = {
  accent: '#2563eb',
  textMute: '#94a3b8',

  blue: '#3b82f6',
  sky: '#0ea5e9',
  indigo: '#6366f1',
  emerald: '#10b981',
  amber: '#d97706',
  rose: '#e11d48',
  slate: '#64748b',
} as const;

// ── Sequential scale (low → high price per m²) ──
export const sequentialPalette = [
  '#eff6ff', '#dbeafe', '#bfdbfe', '#93c5fd', '#60a5fa', '#3b82f6', '#1d4ed8',
] as const;

// Areas without transactions in the selection
export const noDataColor = '#e5e7eb';

// ── Chart palette ──
export const propertyTypeColors: Record<PropertyType, string> = {
  apartment: colors.indigo,
  house: colors.emerald,
  dependency: colors.amber,
  commercial: colors.rose,
  other: colors.slate,
};

export const seriesColors = {
  mean: colors.sky,
  movingAverage: colors.accent,
  histogram: colors.indigo,
} as const;

// ── Utility functions ──

/** Colour of a value on the sequential scale over [min, max] */
export function sequentialColor(value: number, min: number, max: number): string {
  const steps = sequentialPalette.length;
  const idx = max > min ? Math.min(steps - 1, Math.floor(((value - min) / (max - min)) * steps)) : steps - 1;
  return sequentialPalette[Math.max(0, idx)] ?? noDataColor;
}
