/**
 * Name, date and identifier normalization
 *
 * Roster values and reference-list values go through the same functions so
 * that exact comparisons in the matchers line up.
 */

export const BUSINESS_SUFFIXES: ReadonlySet<string> = new Set([
  'LLC',
  'INC',
  'CORP',
  'CORPORATION',
  'CO',
  'COMPANY',
  'LTD',
  'LIMITED',
  'PLLC',
  'PC',
  'LP',
  'LLP',
  'ASSOCIATES',
  'GROUP',
  'SERVICES',
]);

export const PERSON_SUFFIXES: ReadonlySet<string> = new Set(['JR', 'SR', 'II', 'III', 'IV']);

export interface NormalizedPersonName {
  first: string;
  last: string;
  middle: string;
  full: string;
}

export interface PersonNameParts {
  first: string;
  middle: string;
  last: string;
}

export interface DobParts {
  iso: string; // YYYY-MM-DD
  compact: string; // YYYYMMDD
}

export function normalizeWhitespace(value: string): string {
  return value.trim().replace(/\s+/g, ' ');
}

/**
 * Uppercase, strip punctuation, collapse whitespace
 */
export function normalizeName(value: string | null | undefined): string {
  if (!value) return '';
  return normalizeWhitespace(value.toUpperCase().replace(/[^\p{L}\p{N}_\s]/gu, ''));
}

export function removePersonSuffixes(name: string): string {
  return name
    .split(' ')
    .filter((token) => token.length > 0 && !PERSON_SUFFIXES.has(token))
    .join(' ');
}

export function normalizePersonName(
  first: string | null | undefined,
  last: string | null | undefined,
  middle?: string | null
): NormalizedPersonName {
  const normFirst = removePersonSuffixes(normalizeName(first));
  const normLast = removePersonSuffixes(normalizeName(last));
  const normMiddle = middle ? normalizeName(middle) : '';
  return {
    first: normFirst,
    last: normLast,
    middle: normMiddle,
    full: normalizeWhitespace(`${normFirst} ${normMiddle} ${normLast}`),
  };
}

export function normalizeEntityName(name: string | null | undefined): string {
  const normalized = normalizeName(name);
  if (!normalized) return '';
  return normalized
    .split(' ')
    .filter((token) => !BUSINESS_SUFFIXES.has(token))
    .join(' ');
}

/**
 * Five-digit zip. A four-digit value is a zip whose leading zero was eaten by
 * a spreadsheet, so it is padded back.
 */
export function normalizeZip(zip: string | null | undefined): string {
  if (!zip) return '';
  const digits = zip.replace(/\D/g, '');
  if (digits.length === 4) return digits.padStart(5, '0');
  return digits.slice(0, 5);
}

const DOB_FORMATS: Array<{ pattern: RegExp; order: ['y' | 'm' | 'd', 'y' | 'm' | 'd', 'y' | 'm' | 'd'] }> = [
  { pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, order: ['m', 'd', 'y'] },
  { pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})$/, order: ['y', 'm', 'd'] },
  { pattern: /^(\d{4})(\d{2})(\d{2})$/, order: ['y', 'm', 'd'] },
];

/**
 * Accepts M/D/YYYY, YYYY-MM-DD and YYYYMMDD. Returns null for anything else,
 * including impossible calendar dates.
 */
export function normalizeDob(value: string | null | undefined): DobParts | null {
  if (!value) return null;
  const text = value.trim();

  for (const { pattern, order } of DOB_FORMATS) {
    const match = pattern.exec(text);
    if (!match) continue;

    const parts: Record<'y' | 'm' | 'd', number> = { y: 0, m: 0, d: 0 };
    order.forEach((key, i) => {
      parts[key] = parseInt(match[i + 1], 10);
    });

    const date = new Date(Date.UTC(parts.y, parts.m - 1, parts.d));
    if (
      date.getUTCFullYear() !== parts.y ||
      date.getUTCMonth() !== parts.m - 1 ||
      date.getUTCDate() !== parts.d
    ) {
      return null;
    }

    const yyyy = String(parts.y).padStart(4, '0');
    const mm = String(parts.m).padStart(2, '0');
    const dd = String(parts.d).padStart(2, '0');
    return { iso: `${yyyy}-${mm}-${dd}`, compact: `${yyyy}${mm}${dd}` };
  }

  return null;
}

/**
 * Reference-list dates are stored as ISO when they parse, verbatim otherwise
 */
export function normalizeListDate(value: string | null | undefined): string {
  if (!value) return '';
  return normalizeDob(value)?.iso ?? value.trim();
}

export function extractSsnLast4(ssn: string | null | undefined): string | null {
  if (!ssn) return null;
  const digits = ssn.replace(/\D/g, '');
  return digits.length >= 4 ? digits.slice(-4) : null;
}

export function isEin(taxId: string | null | undefined): boolean {
  if (!taxId) return false;
  const digits = taxId.replace(/\D/g, '');
  return digits.length === 9 && taxId.includes('-');
}

function dropSuffixTokens(tokens: string[]): string[] {
  return tokens.filter((token) => token.length > 0 && !PERSON_SUFFIXES.has(normalizeName(token)));
}

/**
 * Split a single "full name" cell. "LAST, FIRST MIDDLE" when a comma is
 * present, otherwise "FIRST MIDDLE LAST".
 */
export function splitFullName(value: string | null | undefined): PersonNameParts {
  const name = normalizeWhitespace(value ?? '');
  if (!name) return { first: '', middle: '', last: '' };

  if (name.includes(',')) {
    const [left, ...rest] = name.split(',');
    const given = dropSuffixTokens(rest.join(' ').split(' '));
    return {
      first: given[0] ?? '',
      middle: given.slice(1).join(' '),
      last: left.trim(),
    };
  }

  const tokens = dropSuffixTokens(name.split(' '));
  if (tokens.length === 0) return { first: '', middle: '', last: '' };
  if (tokens.length === 1) return { first: tokens[0], middle: '', last: '' };
  return {
    first: tokens[0],
    middle: tokens.slice(1, -1).join(' '),
    last: tokens[tokens.length - 1],
  };
}
