import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { sectionSchema } from '@exclusion/config';
import { extractRecords, readRoster } from './roster.js';
import type { TableData } from './table.js';

describe('readRoster', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'ingest-roster-'));
    writeFileSync(
      join(dir, 'board.csv'),
      [
        'Board Roster 2024',
        'Member Name,Date of Birth,Location',
        '"Lee, Ann Marie",02/03/1975,"Austin, TX 78701"',
        'Robert J Ray Jr,1975-13-40,Dallas Texas',
        ',,',
        'Solo,,',
      ].join('\n')
    );
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('splits full names and combined locations', async () => {
    const section = sectionSchema.parse({ skip_rows: 1, name_column: 'Member Name' });
    const roster = await readRoster(join(dir, 'board.csv'), section, 'board');

    expect(roster.resolution.sources).toEqual({
      name_column: 'configured',
      dob: 'alias',
      city_state_zip: 'alias',
    });
    expect(roster.records.map((r) => [r.rowNumber, r.firstName, r.middleName, r.lastName])).toEqual([
      [1, 'Ann', 'Marie', 'Lee'],
      [2, 'Robert', 'J', 'Ray'],
      [3, 'Solo', '', ''],
    ]);
    expect(roster.records[0]).toMatchObject({
      displayName: 'Lee, Ann Marie',
      dob: '02/03/1975',
      city: 'AUSTIN',
      state: 'TX',
      zip: '78701',
    });
    expect(roster.records[1]).toMatchObject({ city: 'DALLAS', state: 'TX', zip: '' });
    expect(roster.warnings).toEqual(['Row 2: unrecognised DOB format, screened without DOB']);
  });
});

describe('extractRecords', () => {
  it('prefers explicit location columns and skips nameless vendors', () => {
    const table: TableData = {
      path: 'vendors.csv',
      fileType: 'csv',
      delimiter: ',',
      headerRowIndex: 0,
      headers: ['Vendor', 'City', 'State', 'Zip', 'CSZ'],
      rows: [
        { Vendor: 'Acme LLC', City: '  round rock ', State: 'texas', Zip: '786641234', CSZ: 'Austin, TX 78701' },
        { Vendor: '', City: 'X', State: '', Zip: '', CSZ: '' },
      ],
    };
    const resolution = {
      mapping: { entity_name: 'Vendor', city: 'City', state: 'State', zip: 'Zip', city_state_zip: 'CSZ' },
      sources: {},
    };

    const { records, warnings } = extractRecords(table, resolution, 'vendors');

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      rowNumber: 1,
      entityName: 'Acme LLC',
      city: 'ROUND ROCK',
      state: 'TX',
      zip: '78664',
    });
    expect(warnings).toEqual(['Row 2: no name, row skipped']);
  });
});
