// ═══════════════════════════════════════════════════════
// regions.ts — Administrative geography reference
// Department → region lookup (INSEE codes) and commune → department derivation.
// ═══════════════════════════════════════════════════════
import { readFileSync } from 'fs';
import { z } from 'zod';

const RegionFileSchema = z.object({
  regions: z.record(z.string()),       // region code → name
  departments: z.record(z.string()),   // department code → region code
});

export type RegionReference = z.infer<typeof RegionFileSchema>;

let reference: RegionReference | null = null;

/** Lazily read data/regions.json (shipped beside src/) */
export function getRegionReference(): RegionReference {
  if (reference) return reference;
  const raw: unknown = JSON.parse(readFileSync(new URL('../../data/regions.json', import.meta.url), 'utf-8'));
  reference = RegionFileSchema.parse(raw);
  return reference;
}

/** "1" → "01", "2a" → "2A"; overseas codes pass through */
export function normalizeDepartmentCode(code: string): string {
  const c = code.trim().toUpperCase();
  return /^\d$/.test(c) ? `0${c}` : c;
}

/** INSEE commune codes are five characters; numeric parsing drops the leading zero */
export function normalizeCommuneCode(code: string): string {
  const c = code.trim().toUpperCase();
  return /^\d{4}$/.test(c) ? `0${c}` : c;
}

/**
 * Department code of a commune's INSEE code.
 *   - Overseas ("97xxx"): first three characters ("971", "974", ...)
 *   - Corsica: "2A" / "2B"
 *   - Otherwise: first two characters
 */
export function departmentOfCommune(communeCode: string): string | null {
  const c = normalizeCommuneCode(communeCode);
  if (c.length < 5) return null;
  return c.startsWith('97') ? c.slice(0, 3) : c.slice(0, 2);
}

// Own keys only: "constructor" or "toString" must not resolve to Object.prototype members
function lookup(table: Readonly<Record<string, string>>, key: string): string | null {
  return Object.hasOwn(table, key) ? table[key] ?? null : null;
}

export function regionOfDepartment(departmentCode: string): string | null {
  return lookup(getRegionReference().departments, normalizeDepartmentCode(departmentCode));
}

export function regionName(regionCode: string): string | null {
  return lookup(getRegionReference().regions, regionCode);
}

/**
 * Resolve a region given either its INSEE code ("11") or its name ("Île-de-France").
 * Unknown values are kept as-is so custom region keys still group.
 */
export function resolveRegion(value: string): { code: string; name: string | null } {
  const { regions } = getRegionReference();
  const known = lookup(regions, value);
  if (known !== null) return { code: value, name: known };
  const byName = Object.entries(regions).find(([, name]) => name.toLowerCase() === value.toLowerCase());
  return byName ? { code: byName[0], name: byName[1] } : { code: value, name: null };
}
