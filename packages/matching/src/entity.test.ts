import { describe, it, expect } from 'vitest';
import { matchEntity } from './entity.js';
import { createMemoryLookup } from './memory-lookup.js';

const lookup = createMemoryLookup({
  oigEntities: [
    { name: 'ACME HEALTH', exclusionDate: '2019-07-10' },
    { name: 'SUNRISE HOME CARE', exclusionDate: '2018-01-01' },
  ],
  samEntities: [
    { name: 'BETA CLINIC', exclusionDate: '2021-03-02', city: 'DALLAS', state: 'TX', zip: '75201' },
    { name: 'SUNRISE HOME CARES', exclusionDate: '2017-02-02', city: 'TULSA', state: 'OK', zip: '74101' },
  ],
});

describe('matchEntity', () => {
  it('confirms exact OIG names', () => {
    const result = matchEntity(lookup, { name: 'ACME HEALTH' });
    expect(result.oigStatus).toBe('CONFIRMED');
    expect(result.oigDate).toBe('2019-07-10');
    expect(result.reason).toBe('Exact entity name match (OIG)');
    expect(result.samStatus).toBe('NOT FOUND');
  });

  it('confirms exact SAM names', () => {
    const result = matchEntity(lookup, { name: 'BETA CLINIC' });
    expect(result.samStatus).toBe('CONFIRMED');
    expect(result.samDate).toBe('2021-03-02');
    expect(result.reason).toBe('Exact entity name match (SAM)');
  });

  it('turns a strong fuzzy OIG name into a review item', () => {
    const result = matchEntity(lookup, { name: 'SUNRISE HOME CAR' });
    expect(result.oigStatus).toBe('NOT FOUND');
    expect(result.review).toEqual({
      source: 'OIG Entities',
      candidateName: 'SUNRISE HOME CARE',
      candidateExclusionDate: '2018-01-01',
      note: 'High-similarity OIG entity name match (score=97).',
      neededData: 'Tax ID / address corroboration',
    });
  });

  it('needs state or zip corroboration for fuzzy SAM names', () => {
    expect(matchEntity(lookup, { name: 'BETA CLINICS', state: 'tx' }).review?.note).toBe(
      'High-similarity SAM entity match (score=95.7) with state corroboration.'
    );
    expect(matchEntity(lookup, { name: 'BETA CLINICS', zip: '75201' }).review?.note).toBe(
      'High-similarity SAM entity match (score=95.7) with zip corroboration.'
    );
    expect(matchEntity(lookup, { name: 'BETA CLINICS', state: 'OK' }).review).toBeNull();
  });

  it('reports an empty normalized name for review', () => {
    expect(matchEntity(lookup, { name: '' }).review?.source).toBe('Source Record');
  });
});
