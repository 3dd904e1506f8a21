/**
 * Run history: one directory per client and month under <dataDir>/runs,
 * holding the artefacts, metadata.json and an append-only run_log.txt
 */

import { appendFileSync, existsSync, mkdirSync, readFileSync, readdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { ConfigError, assertMonth, type RunMetadata } from '@exclusion/core';
import { createLogger, runsDir } from '@exclusion/config';

const logger = createLogger('history');

export const METADATA_FILE = 'metadata.json';
export const RUN_LOG_FILE = 'run_log.txt';

export type RunMetadataInput = Omit<RunMetadata, 'timestamp'> & { timestamp?: string };

export interface RunSummary {
  dir: string;
  client: string;
  month: string;
  timestamp: string;
  staffCount: number;
  boardCount: number;
  vendorCount: number;
  confirmedCount: number;
  reviewCount: number;
}

const storedMetadataSchema = z.object({
  client: z.string(),
  month: z.string(),
  timestamp: z.string(),
  staff_count: z.number().int().default(0),
  board_count: z.number().int().default(0),
  vendor_count: z.number().int().default(0),
  confirmed_count: z.number().int().default(0),
  review_count: z.number().int().default(0),
});

/**
 * Directory-safe client name: "Tri Area Health" -> "Tri_Area_Health"
 */
export function slugClientName(name: string): string {
  const slug = name
    .trim()
    .replace(/[^A-Za-z0-9._-]+/g, '_')
    .replace(/^[._]+|[._]+$/g, '');
  return slug || 'client';
}

/**
 * Create (or reuse) the run directory for a client and month. Names that
 * share a slug, such as "Clinic & Co" and "Clinic Co", cannot share a
 * directory: an existing run for another client is an error.
 */
export function createRunDirectory(dataDir: string, client: string, month: string): string {
  const dir = join(runsDir(dataDir), slugClientName(client), assertMonth(month));

  const owner = readRunSummary(dir)?.client;
  if (owner !== undefined && owner.trim() !== client.trim()) {
    throw new ConfigError(
      `Run directory ${dir} belongs to client "${owner}"; rename "${client}" so its directory name differs`
    );
  }

  mkdirSync(dir, { recursive: true });
  return dir;
}

export function writeMetadata(dir: string, metadata: RunMetadataInput): RunMetadata {
  const complete: RunMetadata = { ...metadata, timestamp: metadata.timestamp ?? new Date().toISOString() };
  const path = join(dir, METADATA_FILE);
  writeFileSync(path, `${JSON.stringify(complete, null, 2)}\n`, 'utf-8');
  logger.debug({ event: 'history.metadata.written', path }, 'Wrote run metadata');
  return complete;
}

export function appendRunLog(dir: string, message: string, now: Date = new Date()): void {
  appendFileSync(join(dir, RUN_LOG_FILE), `[${now.toISOString()}] ${message}\n`, 'utf-8');
}

function readRunSummary(dir: string): RunSummary | null {
  const path = join(dir, METADATA_FILE);
  if (!existsSync(path)) return null;

  let document: unknown;
  try {
    document = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn({ event: 'history.metadata.unreadable', path, error: message }, 'Skipping unreadable run metadata');
    return null;
  }

  const parsed = storedMetadataSchema.safeParse(document);
  if (!parsed.success) {
    logger.warn({ event: 'history.metadata.invalid', path }, 'Skipping run metadata with missing fields');
    return null;
  }

  const meta = parsed.data;
  return {
    dir,
    client: meta.client,
    month: meta.month,
    timestamp: meta.timestamp,
    staffCount: meta.staff_count,
    boardCount: meta.board_count,
    vendorCount: meta.vendor_count,
    confirmedCount: meta.confirmed_count,
    reviewCount: meta.review_count,
  };
}

function subdirectories(dir: string): string[] {
  if (!existsSync(dir)) return [];
  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => join(dir, entry.name));
}

/**
 * Past runs, newest first by metadata timestamp
 * @param client restricts the listing to one client (name or slug)
 */
export function listRuns(dataDir: string, client?: string): RunSummary[] {
  const root = runsDir(dataDir);
  const clientDirs = client ? [join(root, slugClientName(client))] : subdirectories(root);

  return clientDirs
    .flatMap(subdirectories)
    .map(readRunSummary)
    .filter((run): run is RunSummary => run !== null)
    .sort((a, b) => b.timestamp.localeCompare(a.timestamp));
}
