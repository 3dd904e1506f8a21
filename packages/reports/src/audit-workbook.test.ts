import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import ExcelJS from 'exceljs';
import {
  emptyMatchResult,
  type RunMetadata,
  type ScreenedVendorRow,
  type ScreeningResults,
} from '@exclusion/core';
import {
  SHEET_NAMES,
  buildAuditWorkbook,
  columnWidth,
  flattenMetadata,
  writeAuditWorkbook,
} from './audit-workbook.js';

const results: ScreeningResults = {
  staff: [
    {
      ...emptyMatchResult(),
      rowNumber: 1,
      name: 'ANN LEE',
      displayName: 'Ann Lee',
      firstName: 'Ann',
      lastName: 'Lee',
      dob: '1975-02-03',
      ssnLast4: '6789',
      role: 'Nurse',
      employmentStatus: 'Active',
      city: '',
      state: '',
      zip: '',
      oigStatus: 'CONFIRMED',
      oigDate: '2020-03-01',
      reason: 'Exact first+last+DOB',
    },
  ],
  board: [],
  vendors: [
    {
      ...emptyMatchResult(),
      rowNumber: 4,
      name: 'Sunrise Home Car',
      normalizedName: 'SUNRISE HOME CAR',
      classification: 'ENTITY',
      city: 'TULSA',
      state: 'OK',
      zip: '74101',
      review: {
        source: 'OIG Entities',
        candidateName: 'SUNRISE HOME CARE',
        candidateExclusionDate: '2018-01-01',
        note: 'Fuzzy entity name match (97.0)',
        neededData: 'Tax ID / address corroboration',
      },
    },
  ],
};

const metadata: RunMetadata = {
  client: 'Tri Area Health',
  month: '2024-05',
  engine_version: '1.0.0',
  threshold_version: '2024.1-strong95-possible90',
  timestamp: '2024-05-31T12:00:00.000Z',
  staff_count: 1,
  board_count: 0,
  vendor_count: 1,
  confirmed_count: 1,
  review_count: 1,
  reference_cache: { month: '2024-05' },
  sections: {
    staff: {
      file: 'staff.csv',
      file_sha256: 'abc123',
      file_type: 'csv',
      delimiter: ',',
      header_row_index: 0,
      rows: 1,
      confirmed: 1,
      review_required: 0,
      warnings: ['Row 2: no name, row skipped', 'Row 3: no name, row skipped'],
      columns: { first_name: { header: 'First Name', source: 'alias' } },
    },
  },
};

describe('flattenMetadata', () => {
  it('uses dotted keys and joins arrays', () => {
    const flat = flattenMetadata(metadata);
    expect(flat).toContainEqual(['staff_count', '1']);
    expect(flat).toContainEqual(['reference_cache.month', '2024-05']);
    expect(flat).toContainEqual(['sections.staff.delimiter', ',']);
    expect(flat).toContainEqual(['sections.staff.columns.first_name.source', 'alias']);
    expect(flat).toContainEqual(['sections.staff.warnings', 'Row 2: no name, row skipped; Row 3: no name, row skipped']);
  });

  it('keeps null leaves as blank values', () => {
    expect(flattenMetadata({ a: { b: null } })).toEqual([['a.b', '']]);
  });
});

describe('columnWidth', () => {
  it('fits the longest cell within 10..60', () => {
    expect(columnWidth('Row', [[1], [22]], 0)).toBe(10);
    expect(columnWidth('Name', [['Sunrise Home Care Agency']], 0)).toBe(26);
    expect(columnWidth('Name', [['x'.repeat(200)]], 0)).toBe(60);
    expect(columnWidth('Normalized Name', [[1]], 1)).toBe(17);
  });
});

describe('buildAuditWorkbook', () => {
  it('sizes columns on a large vendor roster', () => {
    const vendors: ScreenedVendorRow[] = Array.from({ length: 150_000 }, (_, i) => ({
      ...emptyMatchResult(),
      rowNumber: i + 1,
      name: `Vendor ${i}`,
      normalizedName: `VENDOR ${i}`,
      classification: 'ENTITY',
      city: '',
      state: '',
      zip: '',
    }));

    const workbook = buildAuditWorkbook({ staff: [], board: [], vendors }, metadata);
    const sheet = workbook.getWorksheet(SHEET_NAMES.vendors);

    expect(sheet?.rowCount).toBe(150_001);
    expect(sheet?.getColumn(2).width).toBe(15);
    expect(sheet?.getColumn(3).width).toBe(17);
  });
});

describe('writeAuditWorkbook', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'audit-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes one sheet per section plus review and metadata sheets', async () => {
    const path = await writeAuditWorkbook(join(dir, 'Audit.xlsx'), results, metadata);

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(path);

    expect(workbook.worksheets.map((sheet) => sheet.name)).toEqual([
      SHEET_NAMES.staff,
      SHEET_NAMES.board,
      SHEET_NAMES.vendors,
      SHEET_NAMES.possible,
      SHEET_NAMES.metadata,
    ]);

    const staff = workbook.getWorksheet(SHEET_NAMES.staff);
    expect(staff?.getRow(1).getCell(2).value).toBe('Name');
    expect(staff?.getRow(2).getCell(2).value).toBe('Ann Lee');
    expect(staff?.getRow(2).getCell(6).value).toBe('6789');
    expect(staff?.getRow(2).getCell(12).value).toBe('CONFIRMED');
    expect(staff?.getRow(2).getCell(17).value).toBe('No');

    expect(workbook.getWorksheet(SHEET_NAMES.board)?.getCell('A1').value).toBe('No records');

    const possible = workbook.getWorksheet(SHEET_NAMES.possible);
    expect(possible?.rowCount).toBe(2);
    expect(possible?.getRow(2).getCell(1).value).toBe('Vendors');
    expect(possible?.getRow(2).getCell(2).value).toBe(4);
    expect(possible?.getRow(2).getCell(3).value).toBe('Sunrise Home Car');
    expect(possible?.getRow(2).getCell(5).value).toBe('SUNRISE HOME CARE');

    const meta = workbook.getWorksheet(SHEET_NAMES.metadata);
    const values = new Map<string, string>();
    meta?.eachRow((row, index) => {
      if (index === 1) return;
      values.set(String(row.getCell(1).value), String(row.getCell(2).value));
    });
    expect(values.get('client')).toBe('Tri Area Health');
    expect(values.get('sections.staff.file')).toBe('staff.csv');
  });
});
