/**
 * Roster records -> screened rows
 */

import {
  extractSsnLast4,
  normalizeDob,
  normalizePersonName,
  type ExclusionLookup,
  type ScreenedPersonRow,
  type ScreenedVendorRow,
} from '@exclusion/core';
import type { RosterRecord } from '@exclusion/ingest';
import { matchPerson, screenVendor } from '@exclusion/matching';

export function screenPerson(lookup: ExclusionLookup, record: RosterRecord): ScreenedPersonRow {
  const name = normalizePersonName(record.firstName, record.lastName, record.middleName);
  const dob = normalizeDob(record.dob);
  const result = matchPerson(lookup, {
    first: name.first,
    last: name.last,
    dobCompact: dob?.compact,
    city: record.city,
    state: record.state,
    zip: record.zip,
  });

  return {
    ...result,
    rowNumber: record.rowNumber,
    name: name.full,
    displayName: record.displayName,
    firstName: record.firstName,
    lastName: record.lastName,
    dob: dob?.iso ?? null,
    ssnLast4: extractSsnLast4(record.ssn),
    role: record.jobTitle,
    employmentStatus: record.status,
    city: record.city,
    state: record.state,
    zip: record.zip,
  };
}

export function screenVendorRecord(lookup: ExclusionLookup, record: RosterRecord): ScreenedVendorRow {
  const screening = screenVendor(lookup, {
    name: record.entityName,
    taxId: record.taxId,
    city: record.city,
    state: record.state,
    zip: record.zip,
  });

  return {
    ...screening.result,
    rowNumber: record.rowNumber,
    name: record.entityName,
    normalizedName: screening.normalizedName,
    classification: screening.classification,
    city: record.city,
    state: record.state,
    zip: record.zip,
  };
}
