/**
 * Audit workbook: every screened row, every row needing review, and the run
 * metadata, one sheet each
 */

import ExcelJS from 'exceljs';
import type { Workbook } from 'exceljs';
import type {
  RunMetadata,
  ScreenedPersonRow,
  ScreenedVendorRow,
  ScreeningResults,
  SectionName,
} from '@exclusion/core';
import { createLogger } from '@exclusion/config';

const logger = createLogger('reports');

export const SHEET_NAMES = {
  staff: 'Staff Results',
  board: 'Board Results',
  vendors: 'Vendor Results',
  possible: 'Possible Matches',
  metadata: 'Run Metadata',
} as const;

type Cell = string | number;

interface SheetData {
  headers: string[];
  rows: Cell[][];
}

const yesNo = (value: boolean): string => (value ? 'Yes' : 'No');

const PERSON_HEADERS = [
  'Row',
  'Name',
  'First Name',
  'Last Name',
  'DOB',
  'SSN Last 4',
  'Role',
  'Employment Status',
  'City',
  'State',
  'Zip',
  'OIG Status',
  'OIG Date',
  'SAM Status',
  'SAM Date',
  'Reason',
  'Review Required',
];

export function personSheet(rows: ScreenedPersonRow[]): SheetData {
  return {
    headers: PERSON_HEADERS,
    rows: rows.map((row) => [
      row.rowNumber,
      row.displayName,
      row.firstName,
      row.lastName,
      row.dob ?? '',
      row.ssnLast4 ?? '',
      row.role,
      row.employmentStatus,
      row.city,
      row.state,
      row.zip,
      row.oigStatus,
      row.oigDate,
      row.samStatus,
      row.samDate,
      row.reason,
      yesNo(row.review !== null),
    ]),
  };
}

export function vendorSheet(rows: ScreenedVendorRow[]): SheetData {
  return {
    headers: [
      'Row',
      'Name',
      'Normalized Name',
      'Classification',
      'City',
      'State',
      'Zip',
      'OIG Status',
      'OIG Date',
      'SAM Status',
      'SAM Date',
      'Reason',
      'Review Required',
    ],
    rows: rows.map((row) => [
      row.rowNumber,
      row.name,
      row.normalizedName,
      row.classification,
      row.city,
      row.state,
      row.zip,
      row.oigStatus,
      row.oigDate,
      row.samStatus,
      row.samDate,
      row.reason,
      yesNo(row.review !== null),
    ]),
  };
}

const SECTION_LABELS: Record<SectionName, string> = {
  staff: 'Staff',
  board: 'Board',
  vendors: 'Vendors',
};

export function possibleMatchesSheet(results: ScreeningResults): SheetData {
  const rows: Cell[][] = [];
  const sections: Array<[SectionName, Array<ScreenedPersonRow | ScreenedVendorRow>]> = [
    ['staff', results.staff],
    ['board', results.board],
    ['vendors', results.vendors],
  ];

  for (const [section, sectionRows] of sections) {
    for (const row of sectionRows) {
      if (!row.review) continue;
      rows.push([
        SECTION_LABELS[section],
        row.rowNumber,
        'displayName' in row ? row.displayName : row.name,
        row.review.source,
        row.review.candidateName,
        row.review.candidateExclusionDate,
        row.review.note,
        row.review.neededData,
      ]);
    }
  }

  return {
    headers: [
      'Section',
      'Row',
      'Name',
      'Review Source',
      'Candidate Name',
      'Candidate Exclusion Date',
      'Note',
      'Needed Data',
    ],
    rows,
  };
}

/**
 * Flatten nested metadata into dotted keys; arrays are joined with "; "
 */
export function flattenMetadata(value: unknown, prefix = ''): Array<[string, string]> {
  if (value === null || value === undefined) {
    return prefix ? [[prefix, '']] : [];
  }
  if (Array.isArray(value)) {
    return [[prefix, value.map((item) => (typeof item === 'object' ? JSON.stringify(item) : String(item))).join('; ')]];
  }
  if (typeof value === 'object') {
    return Object.entries(value).flatMap(([key, child]) => flattenMetadata(child, prefix ? `${prefix}.${key}` : key));
  }
  return [[prefix, String(value)]];
}

/**
 * Column width from the longest cell, clamped to 10..60 characters
 */
export function columnWidth(header: string, rows: ReadonlyArray<readonly Cell[]>, index: number): number {
  let longest = header.length;
  for (const row of rows) {
    longest = Math.max(longest, String(row[index] ?? '').length);
  }
  return Math.min(60, Math.max(10, longest + 2));
}

function addSheet(workbook: Workbook, name: string, data: SheetData): void {
  const sheet = workbook.addWorksheet(name);

  if (data.rows.length === 0) {
    sheet.addRow(['No records']);
    return;
  }

  sheet.columns = data.headers.map((header, i) => ({
    header,
    key: `c${i}`,
    width: columnWidth(header, data.rows, i),
  }));
  sheet.getRow(1).font = { bold: true };
  sheet.views = [{ state: 'frozen', ySplit: 1 }];
  for (const row of data.rows) {
    sheet.addRow(row);
  }
}

export function buildAuditWorkbook(results: ScreeningResults, metadata: RunMetadata): Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.created = new Date(metadata.timestamp);

  addSheet(workbook, SHEET_NAMES.staff, personSheet(results.staff));
  addSheet(workbook, SHEET_NAMES.board, personSheet(results.board));
  addSheet(workbook, SHEET_NAMES.vendors, vendorSheet(results.vendors));
  addSheet(workbook, SHEET_NAMES.possible, possibleMatchesSheet(results));

  const meta = workbook.addWorksheet(SHEET_NAMES.metadata);
  meta.columns = [
    { header: 'Key', key: 'key', width: 40 },
    { header: 'Value', key: 'value', width: 80 },
  ];
  meta.getRow(1).font = { bold: true };
  for (const [key, value] of flattenMetadata(metadata)) {
    meta.addRow([key, value]);
  }

  return workbook;
}

export async function writeAuditWorkbook(
  path: string,
  results: ScreeningResults,
  metadata: RunMetadata
): Promise<string> {
  await buildAuditWorkbook(results, metadata).xlsx.writeFile(path);
  logger.info({ event: 'report.audit.written', path }, 'Audit workbook written');
  return path;
}
