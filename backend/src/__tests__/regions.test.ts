import { describe, it, expect } from 'vitest';
import {
  departmentOfCommune, getRegionReference, normalizeCommuneCode, normalizeDepartmentCode,
  regionName, regionOfDepartment, resolveRegion,
} from '../services/regions.ts';

describe('region reference', () => {
  it('covers every metropolitan and overseas region', () => {
    const ref = getRegionReference();
    expect(Object.keys(ref.regions)).toHaveLength(18);
    expect(ref.regions['11']).toBe('Île-de-France');
    expect(ref.regions['94']).toBe('Corse');
  });

  it('maps departments to their region', () => {
    expect(regionOfDepartment('75')).toBe('11');
    expect(regionOfDepartment('13')).toBe('93');
    expect(regionOfDepartment('2A')).toBe('94');
    expect(regionOfDepartment('971')).toBe('01');
    expect(regionOfDepartment('974')).toBe('04');
    expect(regionOfDepartment('1')).toBe('84');
    expect(regionOfDepartment('99')).toBeNull();
  });

  it('names regions by code', () => {
    expect(regionName('93')).toBe("Provence-Alpes-Côte d'Azur");
    expect(regionName('XX')).toBeNull();
  });
});

describe('code normalization', () => {
  it('pads single-digit departments and uppercases Corsica', () => {
    expect(normalizeDepartmentCode('1')).toBe('01');
    expect(normalizeDepartmentCode('2a')).toBe('2A');
    expect(normalizeDepartmentCode('971')).toBe('971');
  });

  it('restores the leading zero of four-digit commune codes', () => {
    expect(normalizeCommuneCode('1053')).toBe('01053');
    expect(normalizeCommuneCode('75056')).toBe('75056');
  });
});

describe('departmentOfCommune', () => {
  it('uses two characters for metropolitan communes', () => {
    expect(departmentOfCommune('75056')).toBe('75');
    expect(departmentOfCommune('1053')).toBe('01');
  });

  it('uses three characters for overseas communes', () => {
    expect(departmentOfCommune('97411')).toBe('974');
  });

  it('keeps Corsican department letters', () => {
    expect(departmentOfCommune('2A004')).toBe('2A');
  });

  it('returns null for codes too short to derive from', () => {
    expect(departmentOfCommune('75')).toBeNull();
  });
});

describe('resolveRegion', () => {
  it('resolves INSEE codes', () => {
    expect(resolveRegion('11')).toEqual({ code: '11', name: 'Île-de-France' });
  });

  it('resolves names case-insensitively', () => {
    expect(resolveRegion('bretagne')).toEqual({ code: '53', name: 'Bretagne' });
  });

  it('keeps unknown values as their own key', () => {
    expect(resolveRegion('IDF')).toEqual({ code: 'IDF', name: null });
  });

  it('ignores inherited object keys', () => {
    expect(resolveRegion('constructor')).toEqual({ code: 'constructor', name: null });
    expect(resolveRegion('toString')).toEqual({ code: 'toString', name: null });
    expect(regionName('hasOwnProperty')).toBeNull();
    expect(regionOfDepartment('__proto__')).toBeNull();
  });
});
