// ═══════════════════════════════════════════════════════
// helpers.ts — Pure utility functions (zero dependencies)
// ═══════════════════════════════════════════════════════
import type { RawValue } from '../types.ts';

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const ISO_DAY = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T ])/;
const FR_DAY = /^(\d{2})\/(\d{2})\/(\d{4})$/;
const DAY_MS = 86_400_000;

/** Trimmed text, or null for empty / absent values */
export function parseText(v: RawValue): string | null {
  if (v === null || v === undefined) return null;
  const s = String(v).trim();
  return s === '' ? null : s;
}

/**
 * Coerce a raw cell to a finite number.
 * Accepts "1234.5", "1 234,5" (French decimal comma) and plain numbers.
 */
export function parseNumber(v: RawValue): number | null {
  if (typeof v === 'number') return Number.isFinite(v) ? v : null;
  const text = parseText(v);
  if (text === null) return null;
  let s = text.replace(/\s/g, '');
  if (s.includes(',') && !s.includes('.')) s = s.replace(',', '.');
  if (!NUMERIC.test(s)) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

/** Zero-padded "YYYY-MM-DD", or null if the calendar date does not exist */
function toDay(y: number, m: number, d: number): string | null {
  const t = new Date(Date.UTC(y, m - 1, d));
  if (t.getUTCFullYear() !== y || t.getUTCMonth() !== m - 1 || t.getUTCDate() !== d) return null;
  return `${String(y).padStart(4, '0')}-${String(m).padStart(2, '0')}-${String(d).padStart(2, '0')}`;
}

/**
 * Parse a sale date into a "YYYY-MM-DD" bucket key.
 * Accepts "2023-01-31", ISO timestamps (date part kept as written) and "31/01/2023".
 */
export function parseDay(v: RawValue): string | null {
  if (typeof v !== 'string') return null;
  const s = v.trim();
  const iso = ISO_DAY.exec(s);
  if (iso) return toDay(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  const fr = FR_DAY.exec(s);
  if (fr) return toDay(Number(fr[3]), Number(fr[2]), Number(fr[1]));
  return null;
}

/** Days since 1970-01-01 for a "YYYY-MM-DD" key */
export function dayNumber(day: string): number {
  return Math.floor(Date.parse(`${day}T00:00:00Z`) / DAY_MS);
}

/** Lowercase, accent-free, single-spaced form used for category matching */
export function foldText(s: string): string {
  return s
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();
}

/** Safe mean (returns 0 for n ≤ 0) */
export const avg = (sum: number, n: number): number => n > 0 ? sum / n : 0;

/** Promise-based delay */
export const sleep = (ms: number): Promise<void> => new Promise(r => setTimeout(r, ms));
