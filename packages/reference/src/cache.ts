/**
 * Monthly reference cache
 *
 * One SQLite file per month holding the normalized OIG LEIE and SAM exclusion
 * lists. Matching only ever reads from it; it is built once per month from the
 * files the operator downloaded.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, readdirSync, renameSync, rmSync, statSync } from 'fs';
import { basename, dirname, join, resolve } from 'path';
import {
  CacheError,
  ENGINE_VERSION,
  assertMonth,
  normalizeDob,
  normalizeEntityName,
  normalizeListDate,
  normalizePersonName,
  normalizeWhitespace,
  normalizeZip,
} from '@exclusion/core';
import { createLogger, referenceCacheDir } from '@exclusion/config';
import { pick, streamCsvRows, type CsvRow } from './csv-stream.js';
import { fileSha256 } from './hash.js';

const logger = createLogger('reference');

const DEFAULT_BATCH_SIZE = 5000;

const SCHEMA = `
  CREATE TABLE oig_people (
    first TEXT NOT NULL,
    last TEXT NOT NULL,
    dob TEXT NOT NULL,
    dob_compact TEXT NOT NULL,
    exclusion_date TEXT NOT NULL
  );
  CREATE TABLE oig_entities (
    name TEXT NOT NULL,
    exclusion_date TEXT NOT NULL
  );
  CREATE TABLE sam_people (
    first TEXT NOT NULL,
    last TEXT NOT NULL,
    exclusion_date TEXT NOT NULL,
    city TEXT NOT NULL,
    state TEXT NOT NULL,
    zip TEXT NOT NULL
  );
  CREATE TABLE sam_entities (
    name TEXT NOT NULL,
    exclusion_date TEXT NOT NULL,
    city TEXT NOT NULL,
    state TEXT NOT NULL,
    zip TEXT NOT NULL
  );
  CREATE TABLE cache_meta (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );
`;

const INDEXES = `
  CREATE INDEX idx_oig_people ON oig_people(last, first, dob_compact);
  CREATE INDEX idx_oig_entities ON oig_entities(name);
  CREATE INDEX idx_sam_people ON sam_people(last, first);
  CREATE INDEX idx_sam_entities ON sam_entities(name);
`;

export interface BuildCacheOptions {
  dataDir: string;
  month: string;
  oigPath: string;
  samPath: string;
  batchSize?: number;
}

export interface CacheCounts {
  oig_people: number;
  oig_entities: number;
  sam_people: number;
  sam_entities: number;
}

export interface CacheBuildSummary {
  path: string;
  month: string;
  counts: CacheCounts;
  oigSha256: string;
  samSha256: string;
  durationMs: number;
}

export interface CacheStatus {
  month: string;
  path: string;
  exists: boolean;
  sizeBytes?: number;
  meta?: Record<string, string>;
}

export function getCachePath(dataDir: string, month: string): string {
  return join(referenceCacheDir(dataDir), `reference_${assertMonth(month)}.sqlite`);
}

export function cacheExists(dataDir: string, month: string): boolean {
  return existsSync(getCachePath(dataDir, month));
}

type Row = [string, ...string[]];

/**
 * Buffers rows per table and flushes them in one transaction per batch
 */
class BatchWriter {
  private readonly pending = new Map<keyof CacheCounts, Row[]>();
  private readonly statements: Record<keyof CacheCounts, Database.Statement<Row>>;
  private readonly flushAll: (batches: Array<[keyof CacheCounts, Row[]]>) => void;
  readonly counts: CacheCounts = { oig_people: 0, oig_entities: 0, sam_people: 0, sam_entities: 0 };

  constructor(
    db: Database.Database,
    private readonly batchSize: number
  ) {
    this.statements = {
      oig_people: db.prepare<Row>('INSERT INTO oig_people VALUES (?, ?, ?, ?, ?)'),
      oig_entities: db.prepare<Row>('INSERT INTO oig_entities VALUES (?, ?)'),
      sam_people: db.prepare<Row>('INSERT INTO sam_people VALUES (?, ?, ?, ?, ?, ?)'),
      sam_entities: db.prepare<Row>('INSERT INTO sam_entities VALUES (?, ?, ?, ?, ?)'),
    };
    this.flushAll = db.transaction((batches: Array<[keyof CacheCounts, Row[]]>) => {
      for (const [table, rows] of batches) {
        const statement = this.statements[table];
        for (const row of rows) statement.run(...row);
      }
    });
  }

  add(table: keyof CacheCounts, row: Row): void {
    const rows = this.pending.get(table) ?? [];
    rows.push(row);
    this.pending.set(table, rows);
    this.counts[table] += 1;
    if (rows.length >= this.batchSize) this.flush();
  }

  flush(): void {
    const batches = [...this.pending.entries()].filter(([, rows]) => rows.length > 0);
    if (batches.length === 0) return;
    this.flushAll(batches);
    this.pending.clear();
  }
}

function loadOigRow(writer: BatchWriter, row: CsvRow): void {
  const exclusionDate = normalizeListDate(pick(row, 'EXCLDATE'));
  const first = pick(row, 'FIRSTNAME');
  const last = pick(row, 'LASTNAME');

  if (first && last) {
    const name = normalizePersonName(first, last, pick(row, 'MIDNAME'));
    const dob = normalizeDob(pick(row, 'DOB'));
    writer.add('oig_people', [name.first, name.last, dob?.iso ?? '', dob?.compact ?? '', exclusionDate]);
  }

  const business = normalizeEntityName(pick(row, 'BUSNAME'));
  if (business) {
    writer.add('oig_entities', [business, exclusionDate]);
  }
}

function loadSamRow(writer: BatchWriter, row: CsvRow): void {
  const exclusionDate = normalizeListDate(pick(row, 'Exclusion Date', 'Active Date'));
  const city = normalizeWhitespace(pick(row, 'City')).toUpperCase();
  const state = normalizeWhitespace(pick(row, 'State', 'State / Province')).toUpperCase();
  const zip = normalizeZip(pick(row, 'Zip', 'Zip Code'));
  const first = pick(row, 'First');
  const last = pick(row, 'Last');

  if (first && last) {
    const name = normalizePersonName(first, last);
    writer.add('sam_people', [name.first, name.last, exclusionDate, city, state, zip]);
  }

  const entity = normalizeEntityName(pick(row, 'Name'));
  if (entity) {
    writer.add('sam_entities', [entity, exclusionDate, city, state, zip]);
  }
}

function requireFile(path: string, label: string, month: string): string {
  const absolute = resolve(path);
  if (!existsSync(absolute)) {
    throw new CacheError(`${label} file not found: ${absolute}`, month);
  }
  return absolute;
}

/**
 * Build the cache for a month. Refuses to overwrite an existing cache; the
 * database is written to a temporary file and renamed into place at the end.
 */
export async function buildReferenceCache(options: BuildCacheOptions): Promise<CacheBuildSummary> {
  const month = assertMonth(options.month);
  const path = getCachePath(options.dataDir, month);
  if (existsSync(path)) {
    throw new CacheError(`Reference cache for ${month} already exists: ${path}`, month);
  }

  const oigPath = requireFile(options.oigPath, 'OIG', month);
  const samPath = requireFile(options.samPath, 'SAM', month);

  mkdirSync(dirname(path), { recursive: true });
  const tempPath = `${path}.building-${process.pid}`;
  rmSync(tempPath, { force: true });

  const started = Date.now();
  logger.info({ event: 'cache.build.start', month, path }, `Building reference cache for ${month}`);

  const db = new Database(tempPath);
  try {
    db.pragma('journal_mode = OFF');
    db.pragma('synchronous = OFF');
    db.exec(SCHEMA);

    const writer = new BatchWriter(db, options.batchSize ?? DEFAULT_BATCH_SIZE);

    const oigRows = await streamCsvRows(oigPath, (row) => loadOigRow(writer, row));
    writer.flush();
    logger.info({ event: 'cache.build.oig', month, rows: oigRows }, 'Loaded OIG list');

    const samRows = await streamCsvRows(samPath, (row) => loadSamRow(writer, row));
    writer.flush();
    logger.info({ event: 'cache.build.sam', month, rows: samRows }, 'Loaded SAM list');

    db.exec(INDEXES);

    const [oigSha256, samSha256] = await Promise.all([fileSha256(oigPath), fileSha256(samPath)]);
    const meta: Record<string, string> = {
      month,
      built_at: new Date().toISOString(),
      engine_version: ENGINE_VERSION,
      oig_file: basename(oigPath),
      sam_file: basename(samPath),
      oig_sha256: oigSha256,
      sam_sha256: samSha256,
      oig_people: String(writer.counts.oig_people),
      oig_entities: String(writer.counts.oig_entities),
      sam_people: String(writer.counts.sam_people),
      sam_entities: String(writer.counts.sam_entities),
    };
    const insertMeta = db.prepare<[string, string]>('INSERT INTO cache_meta (key, value) VALUES (?, ?)');
    db.transaction(() => {
      for (const [key, value] of Object.entries(meta)) insertMeta.run(key, value);
    })();

    db.close();
    renameSync(tempPath, path);

    const summary: CacheBuildSummary = {
      path,
      month,
      counts: { ...writer.counts },
      oigSha256,
      samSha256,
      durationMs: Date.now() - started,
    };
    logger.info(
      { event: 'cache.build.complete', month, path, counts: summary.counts, durationMs: summary.durationMs },
      `Reference cache built for ${month}`
    );
    return summary;
  } catch (error) {
    if (db.open) db.close();
    rmSync(tempPath, { force: true });
    logger.error(
      { event: 'cache.build.failed', month, error: error instanceof Error ? error.message : String(error) },
      'Reference cache build failed'
    );
    throw error;
  }
}

/**
 * Read-only handle on a month's cache
 */
export function openReferenceCache(dataDir: string, month: string): Database.Database {
  const path = getCachePath(dataDir, month);
  if (!existsSync(path)) {
    throw new CacheError(
      `Reference cache for ${month} does not exist. Build it with: exclusion cache build --month ${month} --oig <file> --sam <file>`,
      month
    );
  }
  return new Database(path, { readonly: true, fileMustExist: true });
}

export function readCacheMeta(db: Database.Database): Record<string, string> {
  const rows = db.prepare<[], { key: string; value: string }>('SELECT key, value FROM cache_meta ORDER BY key').all();
  return Object.fromEntries(rows.map((row) => [row.key, row.value]));
}

export function describeCache(dataDir: string, month: string): CacheStatus {
  const path = getCachePath(dataDir, month);
  if (!existsSync(path)) {
    return { month, path, exists: false };
  }

  const db = openReferenceCache(dataDir, month);
  try {
    return { month, path, exists: true, sizeBytes: statSync(path).size, meta: readCacheMeta(db) };
  } finally {
    db.close();
  }
}

const CACHE_FILE = /^reference_(\d{4}-\d{2})\.sqlite$/;

/**
 * Months with a built cache, newest first
 */
export function listCacheMonths(dataDir: string): string[] {
  const dir = referenceCacheDir(dataDir);
  if (!existsSync(dir)) return [];
  return readdirSync(dir)
    .map((file) => CACHE_FILE.exec(file)?.[1])
    .filter((month): month is string => month !== undefined)
    .sort()
    .reverse();
}
