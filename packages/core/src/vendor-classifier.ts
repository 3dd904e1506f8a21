/**
 * Vendor classification: decides whether a vendor row is screened as an
 * entity, as a person, or both.
 */

import type { VendorClassification } from './types.js';

const VENDOR_BUSINESS_SUFFIXES: ReadonlySet<string> = new Set([
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
]);

const BUSINESS_KEYWORDS: ReadonlySet<string> = new Set([
  'GROUP',
  'SERVICES',
  'ASSOCIATES',
  'ENTERPRISES',
  'HOLDINGS',
  'SOLUTIONS',
  'CLINIC',
  'MEDICAL',
  'HEALTH',
  'THERAPY',
  'SUPPLY',
]);

export function classifyVendor(name: string | null | undefined, taxId?: string | null): VendorClassification {
  if (!name || !name.trim()) return 'AMBIGUOUS';

  const tokens = name
    .toUpperCase()
    .trim()
    .replace(/[^\p{L}\p{N}_\s]/gu, '')
    .split(/\s+/)
    .filter(Boolean);

  // EIN-shaped tax id (##-####### or nine bare digits)
  if (taxId && taxId.replace(/\D/g, '').length === 9) {
    return 'ENTITY';
  }

  if (tokens.some((token) => VENDOR_BUSINESS_SUFFIXES.has(token) || BUSINESS_KEYWORDS.has(token))) {
    return 'ENTITY';
  }

  if (tokens.length >= 2 && tokens.length <= 3) {
    return 'PERSON_VENDOR';
  }

  return 'AMBIGUOUS';
}
