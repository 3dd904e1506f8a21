import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { existsSync, mkdtempSync, readdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { CacheError } from '@exclusion/core';
import {
  buildReferenceCache,
  cacheExists,
  describeCache,
  getCachePath,
  listCacheMonths,
  openReferenceCache,
  readCacheMeta,
  type CacheBuildSummary,
} from './cache.js';
import { createExclusionLookup } from './lookup.js';
import { fileSha256 } from './hash.js';

const OIG_CSV = [
  'LASTNAME,FIRSTNAME,MIDNAME,BUSNAME,DOB,EXCLDATE',
  'SMITH,JOHN,A,,19700115,20200301',
  ',,,"Acme Health Services, LLC",,20190710',
  "O'Neil,Mary,,,,",
].join('\n');

const SAM_CSV = [
  '\uFEFFClassification,Name,Prefix,First,Middle,Last,Suffix,Address 1,City,State / Province,Country,Zip Code,Active Date',
  'Individual,,,Jane,,Doe,,1 Main,Austin,TX,USA,78701,01/15/2022',
  'Firm,Beta Clinic Inc,,,,,,2 Oak,Dallas,TX,USA,75201-1234,03/02/2021',
].join('\n');

describe('reference cache', () => {
  let dir: string;
  let dataDir: string;
  let oigPath: string;
  let samPath: string;
  let summary: CacheBuildSummary;

  beforeAll(async () => {
    dir = mkdtempSync(join(tmpdir(), 'reference-'));
    dataDir = join(dir, 'data');
    oigPath = join(dir, 'oig.csv');
    samPath = join(dir, 'sam.csv');
    writeFileSync(oigPath, OIG_CSV);
    writeFileSync(samPath, SAM_CSV);
    summary = await buildReferenceCache({ dataDir, month: '2024-05', oigPath, samPath, batchSize: 1 });
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes the cache under the data directory', () => {
    expect(summary.path).toBe(join(dataDir, 'reference_cache', 'reference_2024-05.sqlite'));
    expect(getCachePath(dataDir, '2024-05')).toBe(summary.path);
    expect(cacheExists(dataDir, '2024-05')).toBe(true);
    expect(summary.counts).toEqual({ oig_people: 2, oig_entities: 1, sam_people: 1, sam_entities: 1 });
    expect(readdirSync(join(dataDir, 'reference_cache'))).toEqual(['reference_2024-05.sqlite']);
  });

  it('stores normalized names and ISO dates', () => {
    const db = openReferenceCache(dataDir, '2024-05');
    try {
      const lookup = createExclusionLookup(db);
      expect(lookup.oigPeopleByLastName('SMITH')).toEqual([
        { first: 'JOHN', last: 'SMITH', dob: '1970-01-15', dobCompact: '19700115', exclusionDate: '2020-03-01' },
      ]);
      expect(lookup.oigPeopleByLastName('ONEIL')).toEqual([
        { first: 'MARY', last: 'ONEIL', dob: '', dobCompact: '', exclusionDate: '' },
      ]);
      expect(lookup.oigEntitiesByName('ACME HEALTH')).toEqual([{ name: 'ACME HEALTH', exclusionDate: '2019-07-10' }]);
      expect(lookup.samPeopleByLastName('DOE')).toEqual([
        { first: 'JANE', last: 'DOE', exclusionDate: '2022-01-15', city: 'AUSTIN', state: 'TX', zip: '78701' },
      ]);

      const entities = lookup.allSamEntities();
      expect(entities).toEqual([
        { name: 'BETA CLINIC', exclusionDate: '2021-03-02', city: 'DALLAS', state: 'TX', zip: '75201' },
      ]);
      expect(lookup.allSamEntities()).toBe(entities);
    } finally {
      db.close();
    }
  });

  it('records build metadata', async () => {
    const db = openReferenceCache(dataDir, '2024-05');
    try {
      const meta = readCacheMeta(db);
      expect(meta.month).toBe('2024-05');
      expect(meta.oig_people).toBe('2');
      expect(meta.sam_file).toBe('sam.csv');
      expect(meta.sam_sha256).toBe(await fileSha256(samPath));
    } finally {
      db.close();
    }

    const status = describeCache(dataDir, '2024-05');
    expect(status.exists).toBe(true);
    expect(status.meta?.sam_entities).toBe('1');
    expect(describeCache(dataDir, '2024-04')).toEqual({
      month: '2024-04',
      path: getCachePath(dataDir, '2024-04'),
      exists: false,
    });
    expect(listCacheMonths(dataDir)).toEqual(['2024-05']);
  });

  it('refuses to rebuild an existing month', async () => {
    await expect(buildReferenceCache({ dataDir, month: '2024-05', oigPath, samPath })).rejects.toThrow(
      `Reference cache for 2024-05 already exists: ${summary.path}`
    );
  });

  it('fails without leaving files behind when an input is missing', async () => {
    const missing = join(dir, 'missing.csv');
    await expect(buildReferenceCache({ dataDir, month: '2024-06', oigPath: missing, samPath })).rejects.toThrow(
      `OIG file not found: ${missing}`
    );
    expect(existsSync(getCachePath(dataDir, '2024-06'))).toBe(false);
  });

  it('requires the cache to exist before opening it', () => {
    expect(() => openReferenceCache(dataDir, '2023-01')).toThrow(CacheError);
    expect(() => getCachePath(dataDir, '2023-1')).toThrow('Month must be YYYY-MM, got "2023-1"');
  });
});

describe('fileSha256', () => {
  it('hashes file contents', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'hash-'));
    try {
      const path = join(dir, 'abc.txt');
      writeFileSync(path, 'abc');
      expect(await fileSha256(path)).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
