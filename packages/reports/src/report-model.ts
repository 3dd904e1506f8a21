/**
 * What goes on a screening report, independent of how it is drawn
 */

import {
  isConfirmed,
  type MatchStatus,
  type ScreenedPersonRow,
  type ScreenedVendorRow,
} from '@exclusion/core';

export type PdfReportInput =
  | {
      kind: 'staff' | 'board';
      clientName: string;
      month: string;
      rows: ScreenedPersonRow[];
      reportDate?: Date;
    }
  | {
      kind: 'vendors';
      clientName: string;
      month: string;
      rows: ScreenedVendorRow[];
      reportDate?: Date;
    };

export type NoticeTone = 'clear' | 'alert' | 'review';

export interface ReportColumn {
  header: string;
  /** share of the content width */
  fraction: number;
}

export interface ReportModel {
  clientName: string;
  title: string;
  month: string;
  summary: string[];
  notice: { tone: NoticeTone; title: string; text: string };
  tableTitle: string;
  columns: ReportColumn[];
  rows: string[][];
  footer: string;
}

const KIND_TEXT = {
  staff: {
    title: 'Staff Exclusion Screening Report',
    label: 'Staff',
    noun: 'staff members',
    tableTitle: 'Screened Staff List',
    clear:
      'All staff members have been screened against the OIG and SAM exclusion databases. No matches were found. All staff are clear to continue employment.',
  },
  board: {
    title: 'Board Exclusion Screening Report',
    label: 'Board Members',
    noun: 'board members',
    tableTitle: 'Screened Board Members',
    clear:
      'All board members have been screened against the OIG and SAM exclusion databases. No matches were found.',
  },
  vendors: {
    title: 'Vendor Exclusion Screening Report',
    label: 'Vendors',
    noun: 'vendors',
    tableTitle: 'Screened Vendors',
    clear: 'All vendors have been screened against the OIG and SAM exclusion databases. No matches were found.',
  },
} as const;

export const REPORT_FOOTER =
  'This report was generated using automated screening against the U.S. Department of Health and Human ' +
  'Services Office of Inspector General (OIG) List of Excluded Individuals and Entities and the System ' +
  'for Award Management (SAM) Exclusions database.';

const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

/**
 * "March 05, 2024"
 */
export function formatReportDate(date: Date): string {
  return `${MONTH_NAMES[date.getMonth()]} ${String(date.getDate()).padStart(2, '0')}, ${date.getFullYear()}`;
}

/**
 * ISO dates display as M/D/YYYY; anything else is shown as stored
 */
export function formatDisplayDate(value: string | null | undefined): string {
  const text = value?.trim() ?? '';
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(text);
  if (!match) return text;
  return `${Number(match[2])}/${Number(match[3])}/${match[1]}`;
}

export function exclusionDateCell(status: MatchStatus, date: string): string {
  return status === 'CONFIRMED' ? formatDisplayDate(date) : '';
}

function notice(kind: PdfReportInput['kind'], total: number, confirmed: number, review: number): ReportModel['notice'] {
  const text = KIND_TEXT[kind];
  if (confirmed > 0) {
    return {
      tone: 'alert',
      title: 'EXCLUSIONS FOUND',
      text:
        `${confirmed} of ${total} ${text.noun} matched the OIG or SAM exclusion lists. ` +
        'Review the matches below and the audit workbook before taking action.',
    };
  }
  if (review > 0) {
    return {
      tone: 'review',
      title: 'POSSIBLE MATCHES PENDING REVIEW',
      text:
        `No confirmed exclusions. ${review} of ${total} ${text.noun} have possible matches that need review; ` +
        'see the Possible Matches sheet of the audit workbook.',
    };
  }
  return { tone: 'clear', title: 'NO EXCLUSIONS FOUND', text: text.clear };
}

function tableFor(input: PdfReportInput): Pick<ReportModel, 'columns' | 'rows'> {
  switch (input.kind) {
    case 'staff':
      return {
        columns: [
          { header: 'Last Name', fraction: 0.19 },
          { header: 'First Name', fraction: 0.18 },
          { header: 'Job Title', fraction: 0.47 },
          { header: 'Employment Status', fraction: 0.16 },
        ],
        rows: input.rows.map((row) => [row.lastName, row.firstName, row.role, row.employmentStatus]),
      };
    case 'board':
      return {
        columns: [
          { header: 'Name', fraction: 0.42 },
          { header: 'DOB', fraction: 0.13 },
          { header: 'SAM.gov Exclusion Date', fraction: 0.22 },
          { header: 'HHS/OIG Exclusion Date', fraction: 0.23 },
        ],
        rows: input.rows.map((row) => [
          row.displayName,
          formatDisplayDate(row.dob),
          exclusionDateCell(row.samStatus, row.samDate),
          exclusionDateCell(row.oigStatus, row.oigDate),
        ]),
      };
    case 'vendors':
      return {
        columns: [
          { header: 'Name', fraction: 0.5 },
          { header: 'City', fraction: 0.15 },
          { header: 'State', fraction: 0.08 },
          { header: 'SAM.gov Exclusion Date', fraction: 0.135 },
          { header: 'HHS/OIG Exclusion Date', fraction: 0.135 },
        ],
        rows: input.rows.map((row) => [
          row.name,
          row.city,
          row.state,
          exclusionDateCell(row.samStatus, row.samDate),
          exclusionDateCell(row.oigStatus, row.oigDate),
        ]),
      };
  }
}

export function buildReportModel(input: PdfReportInput): ReportModel {
  const text = KIND_TEXT[input.kind];
  const rows: Array<ScreenedPersonRow | ScreenedVendorRow> = input.rows;
  const total = rows.length;
  const oigFound = rows.filter((row) => row.oigStatus === 'CONFIRMED').length;
  const samFound = rows.filter((row) => row.samStatus === 'CONFIRMED').length;
  const confirmed = rows.filter(isConfirmed).length;
  const review = rows.filter((row) => row.review !== null && !isConfirmed(row)).length;

  return {
    clientName: input.clientName,
    title: text.title,
    month: input.month,
    summary: [
      `Total ${text.label} Screened: ${total}`,
      `OIG Exclusions Found: ${oigFound}`,
      `SAM Exclusions Found: ${samFound}`,
      `Total Matches: ${confirmed}`,
      `Report Date: ${formatReportDate(input.reportDate ?? new Date())}`,
    ],
    notice: notice(input.kind, total, confirmed, review),
    tableTitle: text.tableTitle,
    ...tableFor(input),
    footer: REPORT_FOOTER,
  };
}
