// ═══════════════════════════════════════════════════════
// hierarchy.ts — Region → department → commune tree for cascading selectors
// ═══════════════════════════════════════════════════════
import type { CanonicalTable, CommuneNode, RegionNode } from '../types.ts';

const byCode = (a: { code: string }, b: { code: string }): number => a.code.localeCompare(b.code);

/**
 * Locations present in the table. Rows lacking a region or department are
 * left out; communes without a name fall back to their code.
 */
export function buildHierarchy(table: CanonicalTable): RegionNode[] {
  const regions = new Map<string, { name: string; departments: Map<string, Map<string, string>> }>();

  for (const r of table.rows) {
    if (r.regionCode === null || r.departmentCode === null) continue;
    let region = regions.get(r.regionCode);
    if (!region) {
      region = { name: r.regionName ?? r.regionCode, departments: new Map() };
      regions.set(r.regionCode, region);
    }
    let communes = region.departments.get(r.departmentCode);
    if (!communes) { communes = new Map(); region.departments.set(r.departmentCode, communes); }
    if (r.communeCode !== null && !communes.has(r.communeCode)) {
      communes.set(r.communeCode, r.communeName ?? r.communeCode);
    }
  }

  return [...regions].map(([code, region]) => ({
    code,
    name: region.name,
    departments: [...region.departments].map(([deptCode, communes]) => ({
      code: deptCode,
      communes: [...communes].map(([c, name]): CommuneNode => ({ code: c, name })).sort(byCode),
    })).sort(byCode),
  })).sort(byCode);
}
