import { describe, it, expect } from 'vitest';
import { parseCityStateZip, toStateCode } from './location.js';

describe('parseCityStateZip', () => {
  it.each([
    ['Austin, TX 78701', { city: 'AUSTIN', state: 'TX', zip: '78701' }],
    ['Springfield, IL, 62701-1234', { city: 'SPRINGFIELD', state: 'IL', zip: '62701' }],
    ['Kansas City MO 64105', { city: 'KANSAS CITY', state: 'MO', zip: '64105' }],
    ['santa fe, new mexico 87501', { city: 'SANTA FE', state: 'NM', zip: '87501' }],
    ['New York New York', { city: 'NEW YORK', state: 'NY', zip: '' }],
    ['Dallas, TX 752011234', { city: 'DALLAS', state: 'TX', zip: '75201' }],
    ['Boston MA 2134', { city: 'BOSTON', state: 'MA', zip: '02134' }],
    ['Unknown Place', { city: 'UNKNOWN PLACE', state: '', zip: '' }],
    ['', { city: '', state: '', zip: '' }],
  ])('parses %j', (input, expected) => {
    expect(parseCityStateZip(input)).toEqual(expected);
  });
});

describe('toStateCode', () => {
  it('maps names and codes', () => {
    expect(toStateCode('Texas')).toBe('TX');
    expect(toStateCode('tx')).toBe('TX');
    expect(toStateCode('Narnia')).toBeNull();
  });
});
