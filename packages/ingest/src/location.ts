import { readFileSync } from 'fs';
import { z } from 'zod';
import { normalizeWhitespace, normalizeZip } from '@exclusion/core';

export interface Location {
  city: string;
  state: string;
  zip: string;
}

let stateNames: Map<string, string> | null = null;
let stateCodes: Set<string> | null = null;

function loadStates(): { names: Map<string, string>; codes: Set<string> } {
  if (!stateNames || !stateCodes) {
    const raw: unknown = JSON.parse(readFileSync(new URL('../data/us-states.json', import.meta.url), 'utf-8'));
    const parsed = z.record(z.string().length(2)).parse(raw);
    stateNames = new Map(Object.entries(parsed));
    stateCodes = new Set(stateNames.values());
  }
  return { names: stateNames, codes: stateCodes };
}

/**
 * USPS code for a state name or code, or null when it is neither
 */
export function toStateCode(value: string | null | undefined): string | null {
  if (!value) return null;
  const text = normalizeWhitespace(value).toUpperCase().replace(/\.$/, '');
  if (!text) return null;
  const { names, codes } = loadStates();
  if (codes.has(text)) return text;
  return names.get(text) ?? null;
}

// A zip must start on a digit boundary so a dashless ZIP+4 is not read from its middle
const ZIP_AT_END = /(?:^|\D)(\d{5})(?:-?\d{4})?$|(?:^|\D)(\d{4})$/;

/**
 * Split a combined "City, ST 12345" cell. Also takes "City, ST, 12345",
 * "City ST 12345", ZIP+4 and spelled-out state names. Missing parts come back
 * as empty strings.
 */
export function parseCityStateZip(value: string | null | undefined): Location {
  let text = normalizeWhitespace(value ?? '');
  if (!text) return { city: '', state: '', zip: '' };

  let zip = '';
  const zipMatch = ZIP_AT_END.exec(text);
  if (zipMatch) {
    zip = normalizeZip(zipMatch[1] ?? zipMatch[2]);
    text = text.slice(0, zipMatch.index + zipMatch[0].search(/\d/));
  }
  text = text.replace(/[\s,]+$/, '');

  if (text.includes(',')) {
    const parts = text
      .split(',')
      .map((part) => part.trim())
      .filter((part) => part.length > 0);
    const state = toStateCode(parts[parts.length - 1]);
    if (state && parts.length > 1) {
      return { city: parts.slice(0, -1).join(', ').toUpperCase(), state, zip };
    }
    if (state && parts.length === 1) {
      return { city: '', state, zip };
    }
  }

  // No usable comma: the state is the trailing one to three words
  const tokens = text.replace(/,/g, ' ').split(' ').filter((token) => token.length > 0);
  for (let width = Math.min(3, tokens.length); width >= 1; width -= 1) {
    const state = toStateCode(tokens.slice(-width).join(' '));
    if (state) {
      return { city: tokens.slice(0, -width).join(' ').toUpperCase(), state, zip };
    }
  }

  return { city: tokens.join(' ').toUpperCase(), state: '', zip };
}
