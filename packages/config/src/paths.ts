/**
 * Where caches, runs and client configurations live on disk
 */

import { homedir } from 'os';
import { join, resolve } from 'path';
import { findRepoRoot } from './env.js';

export function resolveDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const configured = env.EXCLUSION_DATA_DIR?.trim();
  return configured ? resolve(configured) : join(homedir(), 'ExclusionAppData');
}

export function resolveClientsDir(env: NodeJS.ProcessEnv = process.env): string {
  const configured = env.EXCLUSION_CLIENTS_DIR?.trim();
  return configured ? resolve(configured) : join(findRepoRoot(), 'clients');
}

export function referenceCacheDir(dataDir: string): string {
  return join(dataDir, 'reference_cache');
}

export function runsDir(dataDir: string): string {
  return join(dataDir, 'runs');
}
