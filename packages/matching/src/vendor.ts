import {
  classifyVendor,
  isConfirmed,
  normalizeEntityName,
  normalizePersonName,
  splitFullName,
  type ExclusionLookup,
  type MatchResult,
  type VendorClassification,
} from '@exclusion/core';
import { matchEntity } from './entity.js';
import { matchPerson } from './person.js';

export interface VendorQuery {
  /** vendor name as written in the roster */
  name: string;
  taxId?: string | null;
  city?: string | null;
  state?: string | null;
  zip?: string | null;
}

export interface VendorScreening {
  classification: VendorClassification;
  normalizedName: string;
  result: MatchResult;
}

function matchAsPerson(lookup: ExclusionLookup, vendor: VendorQuery): MatchResult {
  const parts = splitFullName(vendor.name);
  const name = normalizePersonName(parts.first, parts.last);
  return matchPerson(lookup, {
    first: name.first,
    last: name.last,
    city: vendor.city,
    state: vendor.state,
    zip: vendor.zip,
  });
}

/**
 * Screen one vendor. ENTITY and PERSON_VENDOR go to their matcher; an
 * AMBIGUOUS vendor runs both and reports the person result only when it
 * confirmed something.
 */
export function screenVendor(lookup: ExclusionLookup, vendor: VendorQuery): VendorScreening {
  const classification = classifyVendor(vendor.name, vendor.taxId);
  const normalizedName = normalizeEntityName(vendor.name);
  const entityQuery = { name: normalizedName, city: vendor.city, state: vendor.state, zip: vendor.zip };

  switch (classification) {
    case 'ENTITY':
      return { classification, normalizedName, result: matchEntity(lookup, entityQuery) };
    case 'PERSON_VENDOR':
      return { classification, normalizedName, result: matchAsPerson(lookup, vendor) };
    case 'AMBIGUOUS': {
      const entityResult = matchEntity(lookup, entityQuery);
      const personResult = matchAsPerson(lookup, vendor);
      return {
        classification,
        normalizedName,
        result: isConfirmed(personResult) ? personResult : entityResult,
      };
    }
  }
}
