/**
 * One screening run: rosters in, audit workbook + PDFs + metadata out
 */

import { join, resolve } from 'path';
import {
  ConfigError,
  ENGINE_VERSION,
  MATCH_THRESHOLD_VERSION,
  SECTION_NAMES,
  assertMonth,
  isConfirmed,
  type RunMetadata,
  type ScreenedRow,
  type ScreeningResults,
  type SectionName,
  type SectionRunInfo,
} from '@exclusion/core';
import {
  ROSTER_FIELDS,
  createLogger,
  getSection,
  resolveClientConfig,
  resolveClientsDir,
  resolveDataDir,
} from '@exclusion/config';
import { readRoster, type RosterResult } from '@exclusion/ingest';
import { createExclusionLookup, fileSha256, openReferenceCache, readCacheMeta } from '@exclusion/reference';
import { writeAuditWorkbook, writePdfReport, type PdfReportInput } from '@exclusion/reports';
import { appendRunLog, createRunDirectory, writeMetadata, METADATA_FILE } from '@exclusion/history';
import { screenPerson, screenVendorRecord } from './screen.js';

const logger = createLogger('runner');

export const AUDIT_FILE = 'Audit.xlsx';

export const REPORT_FILES: Record<SectionName, string> = {
  staff: 'Staff_Report.pdf',
  board: 'Board_Report.pdf',
  vendors: 'Vendor_Report.pdf',
};

export interface RunOptions {
  /** client_name, file stem in the clients directory, or a YAML path */
  client: string;
  month: string;
  staff?: string;
  board?: string;
  vendors?: string;
  /** list files, hashed into the metadata when given */
  oig?: string;
  sam?: string;
  dataDir?: string;
  clientsDir?: string;
  now?: Date;
}

export interface RunOutput {
  runDir: string;
  auditPath: string;
  metadataPath: string;
  reportPaths: Partial<Record<SectionName, string>>;
  metadata: RunMetadata;
  results: ScreeningResults;
}

function sectionInfo(roster: RosterResult, rows: ScreenedRow[], fileHash: string): SectionRunInfo {
  const columns: SectionRunInfo['columns'] = {};
  for (const field of ROSTER_FIELDS) {
    const header = roster.resolution.mapping[field];
    const source = roster.resolution.sources[field];
    if (header !== undefined && source !== undefined) {
      columns[field] = { header, source };
    }
  }

  return {
    file: roster.table.path,
    file_sha256: fileHash,
    file_type: roster.table.fileType,
    delimiter: roster.table.delimiter,
    header_row_index: roster.table.headerRowIndex,
    rows: rows.length,
    confirmed: rows.filter(isConfirmed).length,
    review_required: rows.filter((row) => row.review !== null).length,
    warnings: roster.warnings,
    columns,
  };
}

function reportInput(section: SectionName, results: ScreeningResults, clientName: string, month: string, reportDate: Date): PdfReportInput {
  return section === 'vendors'
    ? { kind: 'vendors', clientName, month, rows: results.vendors, reportDate }
    : { kind: section, clientName, month, rows: results[section], reportDate };
}

/**
 * Screen every supplied roster for a client and month against that month's
 * reference cache, then write the run's artefacts.
 */
export async function runExclusionCheck(options: RunOptions): Promise<RunOutput> {
  const month = assertMonth(options.month);
  const dataDir = options.dataDir ?? resolveDataDir();
  const now = options.now ?? new Date();

  const files: Partial<Record<SectionName, string>> = {
    staff: options.staff,
    board: options.board,
    vendors: options.vendors,
  };
  const supplied = SECTION_NAMES.filter((section) => files[section]);
  if (supplied.length === 0) {
    throw new ConfigError('At least one roster (staff, board or vendors) is required');
  }

  const { path: configPath, config } = resolveClientConfig(options.client, options.clientsDir ?? resolveClientsDir());
  const clientName = config.client_name;

  logger.info({ event: 'run.start', client: clientName, month, sections: supplied }, `Screening ${clientName} for ${month}`);

  const results: ScreeningResults = { staff: [], board: [], vendors: [] };
  const sections: RunMetadata['sections'] = {};

  const db = openReferenceCache(dataDir, month);
  let cacheMeta: Record<string, string> = {};
  try {
    const lookup = createExclusionLookup(db);
    cacheMeta = readCacheMeta(db);

    for (const section of supplied) {
      const file = files[section];
      if (!file) continue;
      const path = resolve(file);

      const roster = await readRoster(path, getSection(config, section), section);
      let rows: ScreenedRow[];
      if (section === 'vendors') {
        results.vendors = roster.records.map((record) => screenVendorRecord(lookup, record));
        rows = results.vendors;
      } else {
        results[section] = roster.records.map((record) => screenPerson(lookup, record));
        rows = results[section];
      }

      const info = sectionInfo(roster, rows, await fileSha256(path));
      sections[section] = info;
      logger.info(
        {
          event: 'run.section.complete',
          section,
          rows: info.rows,
          confirmed: info.confirmed,
          reviewRequired: info.review_required,
          warnings: info.warnings.length,
        },
        `Screened ${info.rows} ${section} rows`
      );
    }
  } finally {
    db.close();
  }

  const runDir = createRunDirectory(dataDir, clientName, month);
  const allRows: ScreenedRow[] = [...results.staff, ...results.board, ...results.vendors];

  const metadata: RunMetadata = {
    client: clientName,
    month,
    engine_version: ENGINE_VERSION,
    threshold_version: MATCH_THRESHOLD_VERSION,
    timestamp: now.toISOString(),
    staff_count: results.staff.length,
    board_count: results.board.length,
    vendor_count: results.vendors.length,
    confirmed_count: allRows.filter(isConfirmed).length,
    review_count: allRows.filter((row) => row.review !== null).length,
    oig_file_hash: options.oig ? await fileSha256(resolve(options.oig)) : undefined,
    sam_file_hash: options.sam ? await fileSha256(resolve(options.sam)) : undefined,
    reference_cache: cacheMeta,
    sections,
  };

  const auditPath = await writeAuditWorkbook(join(runDir, AUDIT_FILE), results, metadata);

  const reportPaths: Partial<Record<SectionName, string>> = {};
  for (const section of supplied) {
    const path = join(runDir, REPORT_FILES[section]);
    await writePdfReport(path, reportInput(section, results, clientName, month, now));
    reportPaths[section] = path;
  }

  writeMetadata(runDir, metadata);
  appendRunLog(
    runDir,
    `Run complete (config ${configPath}): staff=${metadata.staff_count} board=${metadata.board_count} ` +
      `vendors=${metadata.vendor_count} confirmed=${metadata.confirmed_count} review=${metadata.review_count}`,
    now
  );

  logger.info(
    {
      event: 'run.complete',
      client: clientName,
      month,
      runDir,
      confirmed: metadata.confirmed_count,
      review: metadata.review_count,
    },
    `Run complete for ${clientName} ${month}`
  );

  return {
    runDir,
    auditPath,
    metadataPath: join(runDir, METADATA_FILE),
    reportPaths,
    metadata,
    results,
  };
}
