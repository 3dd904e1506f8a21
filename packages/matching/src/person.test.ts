import { describe, it, expect } from 'vitest';
import { matchPerson } from './person.js';
import { createMemoryLookup } from './memory-lookup.js';

const lookup = createMemoryLookup({
  oigPeople: [
    { first: 'CHRISTOPHER', last: 'ADAMS', dob: '1980-02-03', dobCompact: '19800203', exclusionDate: '2019-05-01' },
    { first: 'KATHERINE', last: 'BELL', dob: '1975-01-01', dobCompact: '19750101', exclusionDate: '2020-01-01' },
    { first: 'JOHN', last: 'SMITH', dob: '1970-01-15', dobCompact: '19700115', exclusionDate: '2020-03-01' },
  ],
  samPeople: [
    { first: 'JANE', last: 'DOE', exclusionDate: '2022-01-15', city: 'AUSTIN', state: 'TX', zip: '78701' },
  ],
});

describe('matchPerson: OIG', () => {
  it('confirms an exact name with matching DOB', () => {
    expect(matchPerson(lookup, { first: 'JOHN', last: 'SMITH', dobCompact: '19700115' })).toEqual({
      oigStatus: 'CONFIRMED',
      oigDate: '2020-03-01',
      samStatus: 'NOT FOUND',
      samDate: '',
      reason: 'Exact first+last+DOB',
      review: null,
    });
  });

  it('confirms a strong fuzzy first name with matching DOB', () => {
    const result = matchPerson(lookup, { first: 'CHRISTOPHR', last: 'ADAMS', dobCompact: '19800203' });
    expect(result.oigStatus).toBe('CONFIRMED');
    expect(result.reason).toBe('Fuzzy first (95.2) + DOB');
  });

  it('asks for a DOB when the source record has none', () => {
    const result = matchPerson(lookup, { first: 'KATHERIN', last: 'BELL' });
    expect(result.oigStatus).toBe('NOT FOUND');
    expect(result.review).toEqual({
      source: 'OIG People',
      candidateName: 'KATHERINE BELL',
      candidateExclusionDate: '2020-01-01',
      note: 'High-similarity OIG name match (score=94.1) but DOB missing in source record.',
      neededData: 'DOB',
    });
  });

  it('flags a name match whose DOB differs', () => {
    const result = matchPerson(lookup, { first: 'JOHN', last: 'SMITH', dobCompact: '19710101' });
    expect(result.oigStatus).toBe('NOT FOUND');
    expect(result.review?.note).toBe('High-similarity OIG name match (score=100) but DOB does not match reference.');
    expect(result.review?.neededData).toBe('Confirm DOB / SSN last4');
  });

  it('ignores weak similarity', () => {
    const result = matchPerson(lookup, { first: 'JON', last: 'SMITH', dobCompact: '19700115' });
    expect(result.oigStatus).toBe('NOT FOUND');
    expect(result.review).toBeNull();
  });

  it('reports an incomplete source name for review', () => {
    const result = matchPerson(lookup, { first: '', last: 'SMITH' });
    expect(result.review?.source).toBe('Source Record');
    expect(result.review?.neededData).toBe('First and last name');
  });
});

describe('matchPerson: SAM', () => {
  it('confirms on exact name and zip when the source has no city or state', () => {
    const result = matchPerson(lookup, { first: 'JANE', last: 'DOE', zip: '78701' });
    expect(result.samStatus).toBe('CONFIRMED');
    expect(result.samDate).toBe('2022-01-15');
  });

  it('requires city and state to agree when the source has them', () => {
    expect(
      matchPerson(lookup, { first: 'JANE', last: 'DOE', city: 'austin', state: 'tx', zip: '78701' }).samStatus
    ).toBe('CONFIRMED');
    expect(
      matchPerson(lookup, { first: 'JANE', last: 'DOE', city: 'DALLAS', state: 'TX', zip: '78701' }).samStatus
    ).toBe('NOT FOUND');
  });

  it('never reports an uncorroborated SAM name', () => {
    const result = matchPerson(lookup, { first: 'JANE', last: 'DOE' });
    expect(result.samStatus).toBe('NOT FOUND');
    expect(result.review).toBeNull();
  });
});
