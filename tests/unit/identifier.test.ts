import { describe, it, expect } from 'vitest';
import { isStandardDoi, normalizeIdentifier } from '../../apps/api/src/services/research-query/identifier';

describe('normalizeIdentifier', () => {
  it('prefers the OMID as primary key and keeps the DOI for the secondary index', () => {
    expect(normalizeIdentifier('doi:10.1000/abc meta:br/0601')).toEqual({
      doi: '10.1000/abc',
      omid: 'omid:br/0601',
      primaryKey: 'omid:br/0601',
    });
  });

  it('accepts a bare DOI and lower-cases it', () => {
    expect(normalizeIdentifier('10.1000/XYZ')).toEqual({
      doi: '10.1000/xyz',
      omid: null,
      primaryKey: '10.1000/xyz',
    });
  });

  it('finds a DOI after other identifiers', () => {
    expect(normalizeIdentifier('isbn:9780000000000 doi:10.1007/978-94')?.doi).toBe('10.1007/978-94');
  });

  it('ignores doi: values that are not standard DOIs', () => {
    expect(normalizeIdentifier('doi:abc meta:br/06')).toEqual({
      doi: null,
      omid: 'omid:br/06',
      primaryKey: 'omid:br/06',
    });
  });

  it('returns null for identifiers without a DOI or bibliographic OMID', () => {
    expect(normalizeIdentifier('orcid:0000-0003 meta:ra/0614')).toBeNull();
    expect(normalizeIdentifier('None')).toBeNull();
    expect(normalizeIdentifier('')).toBeNull();
    expect(normalizeIdentifier(null)).toBeNull();
  });
});

describe('isStandardDoi', () => {
  it('requires the 10. prefix and a slash', () => {
    expect(isStandardDoi('10.1000/abc')).toBe(true);
    expect(isStandardDoi('10.1000')).toBe(false);
    expect(isStandardDoi(null)).toBe(false);
  });
});
