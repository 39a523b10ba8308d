import { describe, it, expect } from 'vitest';
import { buildHierarchy } from '../services/hierarchy.ts';
import { clean } from '../services/cleaner.ts';

const sale = (geo: Record<string, string>) => ({ price: 100000, area: 20, date: '2023-02-01', ...geo });

describe('buildHierarchy', () => {
  it('nests communes under departments under regions, sorted by code', () => {
    const table = clean([
      sale({ commune: '92012', commune_name: 'Boulogne-Billancourt' }),
      sale({ commune: '75056', commune_name: 'Paris' }),
      sale({ commune: '13055', commune_name: 'Marseille' }),
      sale({ commune: '75056', commune_name: 'Paris' }),
    ]);

    expect(buildHierarchy(table)).toEqual([
      {
        code: '11',
        name: 'Île-de-France',
        departments: [
          { code: '75', communes: [{ code: '75056', name: 'Paris' }] },
          { code: '92', communes: [{ code: '92012', name: 'Boulogne-Billancourt' }] },
        ],
      },
      {
        code: '93',
        name: "Provence-Alpes-Côte d'Azur",
        departments: [{ code: '13', communes: [{ code: '13055', name: 'Marseille' }] }],
      },
    ]);
  });

  it('falls back to codes for unnamed communes and unknown regions', () => {
    const table = clean([
      sale({ region: 'IDF', department: '75', commune: '75056' }),
    ]);
    expect(buildHierarchy(table)).toEqual([
      { code: 'IDF', name: 'IDF', departments: [{ code: '75', communes: [{ code: '75056', name: '75056' }] }] },
    ]);
  });

  it('keeps departments without communes and drops rows without a department', () => {
    const table = clean([
      sale({ department: '33' }),
      sale({ region: '53' }),
    ], { requiredLevels: [] });
    expect(buildHierarchy(table)).toEqual([
      { code: '75', name: 'Nouvelle-Aquitaine', departments: [{ code: '33', communes: [] }] },
    ]);
  });

  it('is empty for an empty table', () => {
    expect(buildHierarchy(clean([]))).toEqual([]);
  });
});
