import { describe, it, expect } from 'vitest';
import {
  normalizeName,
  normalizePersonName,
  normalizeEntityName,
  normalizeZip,
  normalizeDob,
  normalizeListDate,
  extractSsnLast4,
  isEin,
  splitFullName,
} from './normalize.js';

describe('normalizeName', () => {
  it('uppercases, strips punctuation and collapses whitespace', () => {
    expect(normalizeName("  o'brien-  smith ")).toBe('OBRIEN SMITH');
    expect(normalizeName('Mary   Ann')).toBe('MARY ANN');
    expect(normalizeName(undefined)).toBe('');
  });
});

describe('normalizePersonName', () => {
  it('removes generational suffixes from first and last names', () => {
    const name = normalizePersonName('John', 'Smith Jr.', 'q');
    expect(name).toEqual({ first: 'JOHN', last: 'SMITH', middle: 'Q', full: 'JOHN Q SMITH' });
  });

  it('builds the full name without a middle name', () => {
    expect(normalizePersonName('ann', 'lee').full).toBe('ANN LEE');
  });
});

describe('normalizeEntityName', () => {
  it('drops business suffix tokens', () => {
    expect(normalizeEntityName('Acme Medical Supply, L.L.C.')).toBe('ACME MEDICAL SUPPLY');
    expect(normalizeEntityName('Smith & Associates Group Inc')).toBe('SMITH');
  });
});

describe('normalizeZip', () => {
  it('keeps the first five digits', () => {
    expect(normalizeZip('27601-1234')).toBe('27601');
  });

  it('restores a leading zero lost by a spreadsheet', () => {
    expect(normalizeZip('2134')).toBe('02134');
  });

  it('returns empty for missing values', () => {
    expect(normalizeZip('')).toBe('');
  });
});

describe('normalizeDob', () => {
  it('parses US, ISO and compact dates', () => {
    expect(normalizeDob('3/7/1980')).toEqual({ iso: '1980-03-07', compact: '19800307' });
    expect(normalizeDob('1980-03-07')).toEqual({ iso: '1980-03-07', compact: '19800307' });
    expect(normalizeDob('19800307')).toEqual({ iso: '1980-03-07', compact: '19800307' });
  });

  it('rejects impossible dates and unknown formats', () => {
    expect(normalizeDob('2/30/1980')).toBeNull();
    expect(normalizeDob('March 7, 1980')).toBeNull();
    expect(normalizeDob('')).toBeNull();
  });

  it('keeps unparseable list dates verbatim', () => {
    expect(normalizeListDate('20190415')).toBe('2019-04-15');
    expect(normalizeListDate(' pending ')).toBe('pending');
  });
});

describe('identifiers', () => {
  it('extracts the last four SSN digits', () => {
    expect(extractSsnLast4('123-45-6789')).toBe('6789');
    expect(extractSsnLast4('12')).toBeNull();
  });

  it('recognises EINs written with a dash', () => {
    expect(isEin('12-3456789')).toBe(true);
    expect(isEin('123456789')).toBe(false);
  });
});

describe('splitFullName', () => {
  it('splits "LAST, FIRST MIDDLE"', () => {
    expect(splitFullName('Smith, John Q')).toEqual({ first: 'John', middle: 'Q', last: 'Smith' });
  });

  it('splits "FIRST MIDDLE LAST" and drops suffixes', () => {
    expect(splitFullName('Mary Ann Lee Jr.')).toEqual({ first: 'Mary', middle: 'Ann', last: 'Lee' });
  });

  it('keeps a single token as the first name', () => {
    expect(splitFullName('Cher')).toEqual({ first: 'Cher', middle: '', last: '' });
  });
});
