import { describe, it, expect } from 'vitest';
import {
  checkArea, checkDate, checkGeography, checkPrice, checkPricePerArea, clean, missingColumns,
  normalizePropertyType, TableBuilder, toTransaction,
} from '../services/cleaner.ts';
import { DataFormatError } from '../services/errors.ts';
import type { PropertyType, RawRecord } from '../types.ts';

/** A valid DVF-style record for Paris; override fields per test */
function dvf(overrides: RawRecord = {}): RawRecord {
  return {
    valeur_fonciere: '300000',
    surface_reelle_bati: '100',
    date_mutation: '2023-01-05',
    type_local: 'Appartement',
    code_commune: '75056',
    nom_commune: 'Paris',
    ...overrides,
  };
}

describe('clean', () => {
  it('builds the canonical table for plain-named records', () => {
    const table = clean([
      { price: 300000, area: 100, date: '2023-01-05', type: 'Appartement', region: 'IDF' },
      { price: 150000, area: 50, date: '2023-01-06', type: 'Maison', region: 'IDF' },
    ], { requiredLevels: ['region'] });

    expect(table.rows).toHaveLength(2);
    expect(table.rows.map(r => r.pricePerArea)).toEqual([3000, 3000]);
    expect(table.rows.map(r => r.propertyType)).toEqual(['apartment', 'house']);
    expect(table.rows[0]?.regionCode).toBe('IDF');
    expect(table.rows[0]?.departmentCode).toBeNull();
    expect(table.stats).toEqual({
      received: 2,
      accepted: 2,
      rejected: 0,
      byReason: {
        invalid_price: 0, negative_price: 0, invalid_area: 0, non_positive_area: 0,
        invalid_price_per_area: 0, invalid_date: 0, missing_geography: 0, duplicate: 0,
      },
    });
  });

  it('derives department and region from the commune code', () => {
    const table = clean([dvf({
      valeur_fonciere: '250000',
      surface_reelle_bati: '50',
      type_local: 'Local industriel. commercial ou assimilé',
      code_commune: '13055',
      nom_commune: 'Marseille',
    })]);

    const row = table.rows[0];
    expect(row).toEqual({
      date: '2023-01-05',
      price: 250000,
      area: 50,
      pricePerArea: 5000,
      propertyType: 'commercial',
      regionCode: '93',
      regionName: "Provence-Alpes-Côte d'Azur",
      departmentCode: '13',
      communeCode: '13055',
      communeName: 'Marseille',
      latitude: null,
      longitude: null,
      mutationId: null,
      parcelId: null,
    });
  });

  it('counts each rejection under the first failing predicate', () => {
    const table = clean([
      dvf({ valeur_fonciere: 'abc', surface_reelle_bati: '0' }),
      dvf({ valeur_fonciere: '-1' }),
      dvf({ surface_reelle_bati: 'n/a' }),
      dvf({ surface_reelle_bati: '0' }),
      dvf({ date_mutation: 'not a date' }),
      dvf({ code_commune: '' }),
      dvf(),
    ]);

    expect(table.stats.accepted).toBe(1);
    expect(table.stats.rejected).toBe(6);
    expect(table.stats.byReason).toMatchObject({
      invalid_price: 1,
      negative_price: 1,
      invalid_area: 1,
      non_positive_area: 1,
      invalid_date: 1,
      missing_geography: 1,
    });
  });

  it('keeps received = accepted + rejected', () => {
    const table = clean([dvf(), dvf({ valeur_fonciere: null }), dvf({ date_mutation: '2023-02-30' })]);
    expect(table.stats.received).toBe(3);
    expect(table.stats.accepted + table.stats.rejected).toBe(table.stats.received);
  });

  it('accepts a zero price', () => {
    const table = clean([dvf({ valeur_fonciere: '0' })]);
    expect(table.rows[0]?.pricePerArea).toBe(0);
  });

  it('preserves input order and freezes the result', () => {
    const table = clean([
      dvf({ date_mutation: '2023-03-01' }),
      dvf({ date_mutation: '2023-01-01' }),
      dvf({ date_mutation: '2023-02-01' }),
    ]);
    expect(table.rows.map(r => r.date)).toEqual(['2023-03-01', '2023-01-01', '2023-02-01']);
    expect(Object.isFrozen(table)).toBe(true);
    expect(Object.isFrozen(table.rows)).toBe(true);
    expect(Object.isFrozen(table.rows[0])).toBe(true);
  });

  it('returns an empty table for empty input', () => {
    const table = clean([]);
    expect(table.rows).toEqual([]);
    expect(table.stats.received).toBe(0);
  });

  it('uses the given load timestamp', () => {
    expect(clean([dvf()], { loadedAt: '2024-01-01T00:00:00.000Z' }).loadedAt).toBe('2024-01-01T00:00:00.000Z');
  });

  describe('mandatory columns', () => {
    it('fails with DataFormatError naming the missing groups', () => {
      let caught: unknown;
      try {
        clean([{ price: 1, date: '2023-01-01' }]);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(DataFormatError);
      expect(caught).toMatchObject({ missing: ['area', 'geography'], status: 422 });
    });

    it('takes the union of columns across records', () => {
      const table = clean([
        { price: 1, area: 1, date: '2023-01-01' },
        { price: 100, area: 2, date: '2023-01-02', department: '75', commune: '75056' },
      ]);
      expect(table.stats.accepted).toBe(1);
      expect(table.stats.byReason.missing_geography).toBe(1);
      expect(table.rows[0]?.regionCode).toBe('11');
    });

    it('reports missing groups for a column set', () => {
      expect(missingColumns(new Set(['valeur_fonciere', 'surface_reelle_bati', 'date_mutation', 'code_commune']))).toEqual([]);
      expect(missingColumns(new Set(['price']))).toEqual(['area', 'date', 'geography']);
    });
  });

  describe('parcel de-duplication', () => {
    const records = [
      dvf({ id_parcelle: 'P1', valeur_fonciere: '100000' }),
      dvf({ id_parcelle: 'P1', valeur_fonciere: '200000' }),
      dvf({ id_parcelle: 'P2' }),
    ];

    it('keeps the first record of each parcel', () => {
      const table = clean(records);
      expect(table.rows.map(r => r.price)).toEqual([100000, 300000]);
      expect(table.stats.byReason.duplicate).toBe(1);
    });

    it('can be disabled', () => {
      const table = clean(records, { dedupe: false });
      expect(table.rows).toHaveLength(3);
      expect(table.stats.byReason.duplicate).toBe(0);
    });

    it('counts a repeat of a rejected parcel as a duplicate', () => {
      const table = clean([
        dvf({ id_parcelle: 'P1', valeur_fonciere: 'x' }),
        dvf({ id_parcelle: 'P1' }),
      ]);
      expect(table.stats.byReason).toMatchObject({ invalid_price: 1, duplicate: 1 });
      expect(table.rows).toHaveLength(0);
    });
  });

  it('requires every level by default', () => {
    const table = clean([
      dvf({ code_commune: null, code_departement: '99' }),
      dvf({ code_commune: null, code_departement: '75' }),
      dvf(),
    ]);
    expect(table.stats).toMatchObject({ accepted: 1, rejected: 2 });
    expect(table.stats.byReason.missing_geography).toBe(2);
    expect(table.rows[0]).toMatchObject({ regionCode: '11', departmentCode: '75', communeCode: '75056' });
  });

  it('accepts partial geography when fewer levels are required', () => {
    const table = clean([
      dvf({ code_commune: null, code_departement: '75' }),
      dvf({ code_commune: null, code_departement: '99' }),
    ], { requiredLevels: ['region', 'department'] });
    expect(table.rows).toHaveLength(1);
    expect(table.rows[0]).toMatchObject({ regionCode: '11', departmentCode: '75', communeCode: null });
  });

  it('rejects a price-per-area that overflows', () => {
    const table = clean([dvf({ surface_reelle_bati: '1e-320' }), dvf()]);
    expect(table.stats.byReason.invalid_price_per_area).toBe(1);
    expect(table.rows.map(r => r.pricePerArea)).toEqual([3000]);
  });

  it('rejects rows missing a required level', () => {
    const table = clean([dvf({ code_commune: null, code_departement: '75' })], { requiredLevels: ['commune'] });
    expect(table.stats.byReason.missing_geography).toBe(1);
  });
});

describe('TableBuilder', () => {
  it('accepts records incrementally', () => {
    const builder = new TableBuilder();
    builder.add(dvf());
    builder.add(dvf({ surface_reelle_bati: '-3' }));
    const table = builder.build();
    expect(table.stats).toMatchObject({ received: 2, accepted: 1, rejected: 1 });
  });
});

describe('predicates', () => {
  it('checkPrice', () => {
    expect(checkPrice('1 500,50')).toEqual({ ok: true, value: 1500.5 });
    expect(checkPrice('')).toEqual({ ok: false, reason: 'invalid_price' });
    expect(checkPrice(-10)).toEqual({ ok: false, reason: 'negative_price' });
  });

  it('checkArea', () => {
    expect(checkArea(42)).toEqual({ ok: true, value: 42 });
    expect(checkArea(undefined)).toEqual({ ok: false, reason: 'invalid_area' });
    expect(checkArea('0')).toEqual({ ok: false, reason: 'non_positive_area' });
  });

  it('checkDate', () => {
    expect(checkDate('2023-06-30T12:00:00Z')).toEqual({ ok: true, value: '2023-06-30' });
    expect(checkDate('2023-06-31')).toEqual({ ok: false, reason: 'invalid_date' });
  });

  it('checkGeography resolves regions given by name', () => {
    expect(checkGeography({ region: 'Bretagne', department: undefined, commune: undefined }, ['region'])).toEqual({
      ok: true,
      value: { regionCode: '53', regionName: 'Bretagne', departmentCode: null, communeCode: null },
    });
  });

  it('checkGeography needs all three levels by default', () => {
    expect(checkGeography({ region: 'Bretagne', department: undefined, commune: undefined }))
      .toEqual({ ok: false, reason: 'missing_geography' });
    expect(checkGeography({ region: null, department: '99', commune: null }, []))
      .toEqual({ ok: true, value: { regionCode: null, regionName: null, departmentCode: '99', communeCode: null } });
  });

  it('checkPricePerArea', () => {
    expect(checkPricePerArea(300000, 100)).toEqual({ ok: true, value: 3000 });
    expect(checkPricePerArea(1000, 1e-320)).toEqual({ ok: false, reason: 'invalid_price_per_area' });
  });

  it('checkGeography derives overseas departments', () => {
    const geo = checkGeography({ region: null, department: null, commune: '97411' });
    expect(geo).toEqual({
      ok: true,
      value: { regionCode: '04', regionName: 'La Réunion', departmentCode: '974', communeCode: '97411' },
    });
  });

  it('toTransaction reads optional coordinates and ids', () => {
    const outcome = toTransaction(dvf({ latitude: '48.85', longitude: 2.35, id_mutation: '2023-1', id_parcelle: '75056000AB0001' }));
    expect(outcome.ok && outcome.row).toMatchObject({
      latitude: 48.85, longitude: 2.35, mutationId: '2023-1', parcelId: '75056000AB0001',
    });
  });
});

describe('normalizePropertyType', () => {
  it.each<[string | undefined, PropertyType]>([
    ['Appartement', 'apartment'],
    ['APPARTEMENT', 'apartment'],
    ['Maison', 'house'],
    ['Dépendance', 'dependency'],
    ['Local industriel. commercial ou assimilé', 'commercial'],
    ['Château', 'other'],
    [undefined, 'other'],
  ])('%s → %s', (input, expected) => {
    expect(normalizePropertyType(input)).toBe(expected);
  });
});
