/**
 * Roster extraction: table -> semantic records
 */

import {
  normalizeDob,
  normalizeWhitespace,
  normalizeZip,
  splitFullName,
  type SectionName,
} from '@exclusion/core';
import { ROSTER_FIELDS, createLogger, type RosterField, type SectionConfig } from '@exclusion/config';
import { readTable, type TableData } from './table.js';
import { resolveColumns, type ColumnResolution } from './columns.js';
import { parseCityStateZip, toStateCode } from './location.js';

const logger = createLogger('ingest');

export interface RosterRecord {
  /** 1-based, first data row after the header is 1 */
  rowNumber: number;
  raw: Partial<Record<RosterField, string>>;
  /** name as written; the full-name cell or "first middle last" */
  displayName: string;
  firstName: string;
  middleName: string;
  lastName: string;
  entityName: string;
  taxId: string;
  dob: string;
  ssn: string;
  jobTitle: string;
  status: string;
  city: string;
  state: string;
  zip: string;
}

export interface RosterResult {
  kind: SectionName;
  records: RosterRecord[];
  resolution: ColumnResolution;
  warnings: string[];
  table: TableData;
}

function pickFields(row: Record<string, string>, resolution: ColumnResolution): Partial<Record<RosterField, string>> {
  const raw: Partial<Record<RosterField, string>> = {};
  for (const field of ROSTER_FIELDS) {
    const header = resolution.mapping[field];
    if (header !== undefined && row[header] !== undefined) {
      raw[field] = row[header];
    }
  }
  return raw;
}

function personName(raw: Partial<Record<RosterField, string>>): Pick<RosterRecord, 'displayName' | 'firstName' | 'middleName' | 'lastName'> {
  const first = normalizeWhitespace(raw.first_name ?? '');
  const last = normalizeWhitespace(raw.last_name ?? '');
  const middle = normalizeWhitespace(raw.middle_name ?? '');

  if (first || last) {
    return {
      displayName: normalizeWhitespace(`${first} ${middle} ${last}`),
      firstName: first,
      middleName: middle,
      lastName: last,
    };
  }

  const full = normalizeWhitespace(raw.name_column ?? '');
  const parts = splitFullName(full);
  return {
    displayName: full,
    firstName: parts.first,
    middleName: middle || parts.middle,
    lastName: parts.last,
  };
}

function location(raw: Partial<Record<RosterField, string>>): Pick<RosterRecord, 'city' | 'state' | 'zip'> {
  const parsed = parseCityStateZip(raw.city_state_zip);
  const city = normalizeWhitespace(raw.city ?? '').toUpperCase();
  const stateText = normalizeWhitespace(raw.state ?? '');
  const state = stateText ? (toStateCode(stateText) ?? stateText.toUpperCase()) : '';
  const zip = normalizeZip(raw.zip);

  return {
    city: city || parsed.city,
    state: state || parsed.state,
    zip: zip || parsed.zip,
  };
}

/**
 * Turn table rows into roster records. Rows without a name are skipped with a
 * warning; an unreadable DOB is kept blank and warned about. Warnings carry
 * row numbers, never roster values.
 */
export function extractRecords(
  table: TableData,
  resolution: ColumnResolution,
  kind: SectionName
): { records: RosterRecord[]; warnings: string[] } {
  const records: RosterRecord[] = [];
  const warnings: string[] = [];

  table.rows.forEach((row, index) => {
    const rowNumber = index + 1;
    const raw = pickFields(row, resolution);
    const names =
      kind === 'vendors'
        ? { displayName: normalizeWhitespace(raw.entity_name ?? ''), firstName: '', middleName: '', lastName: '' }
        : personName(raw);

    if (!names.displayName && !names.firstName && !names.lastName) {
      warnings.push(`Row ${rowNumber}: no name, row skipped`);
      return;
    }

    const dob = normalizeWhitespace(raw.dob ?? '');
    if (dob && !normalizeDob(dob)) {
      warnings.push(`Row ${rowNumber}: unrecognised DOB format, screened without DOB`);
    }

    records.push({
      rowNumber,
      raw,
      ...names,
      entityName: kind === 'vendors' ? names.displayName : '',
      taxId: normalizeWhitespace(raw.tax_id ?? ''),
      dob,
      ssn: normalizeWhitespace(raw.ssn ?? ''),
      jobTitle: normalizeWhitespace(raw.job_title ?? ''),
      status: normalizeWhitespace(raw.status ?? ''),
      ...location(raw),
    });
  });

  return { records, warnings };
}

export async function readRoster(path: string, section: SectionConfig, kind: SectionName): Promise<RosterResult> {
  const table = await readTable(path, section);
  const resolution = resolveColumns(table.headers, section, kind, path);
  const { records, warnings } = extractRecords(table, resolution, kind);

  logger.info(
    {
      event: 'ingest.roster.read',
      kind,
      path,
      rows: table.rows.length,
      records: records.length,
      warnings: warnings.length,
    },
    `Read ${records.length} ${kind} records`
  );

  return { kind, records, resolution, warnings, table };
}
