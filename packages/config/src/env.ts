/**
 * Centralized environment variable loader
 *
 * Locates the repo root and loads .env / .env.local once.
 * The toolkit reads no credentials, so diagnostics print values as set.
 */

import { config } from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { join, resolve, dirname } from 'path';

export interface EnvKeyStatus {
  key: string;
  present: boolean;
  value?: string;
  length?: number;
  source?: string;
}

export interface EnvDiagnostics {
  cwd: string;
  repoRoot: string;
  envFilePath: string;
  envFileExists: boolean;
  keys: EnvKeyStatus[];
  warnings: string[];
}

export interface EnvInitResult {
  repoRoot: string;
  envFilePath: string;
  envLocalFilePath: string;
  loaded: boolean;
  localLoaded: boolean;
  keysLoaded: string[];
  keySources: Record<string, string>; // key -> '.env' | '.env.local'
}

const ROOT_PACKAGE_NAME = 'exclusion-screening';

/**
 * Variables the toolkit reads; reported by the env diagnostics
 */
export const KNOWN_ENV_KEYS = [
  'EXCLUSION_DATA_DIR',
  'EXCLUSION_CLIENTS_DIR',
  'LOG_LEVEL',
  'LOG_PRETTY',
  'ENV_FILE',
] as const;

/**
 * Find repository root by walking up from the start directory
 */
export function findRepoRoot(startPath: string = process.cwd()): string {
  let current = resolve(startPath);

  for (;;) {
    const packageJsonPath = join(current, 'package.json');
    if (existsSync(packageJsonPath)) {
      try {
        const pkg: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
        if (
          typeof pkg === 'object' &&
          pkg !== null &&
          ('workspaces' in pkg || ('name' in pkg && pkg.name === ROOT_PACKAGE_NAME))
        ) {
          return current;
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[env] Ignoring unreadable ${packageJsonPath}: ${message}`);
      }
    }

    if (existsSync(join(current, '.git'))) {
      return current;
    }

    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }

  return resolve(startPath);
}

// CRLF, null bytes and other control characters (newline/tab allowed)
function hasUnprintableChars(value: string): boolean {
  return /[\r\x00-\x08\x0B-\x0C\x0E-\x1F]/.test(value);
}

function hasQuotesOrWhitespace(value: string): boolean {
  return /^["'\s]|["'\s]$/.test(value);
}

let cachedResult: EnvInitResult | null = null;

function loadFile(path: string, source: string, keysLoaded: string[], keySources: Record<string, string>): boolean {
  const result = config({ path, override: true });
  const parsed = result.parsed ?? {};

  for (const [key, value] of Object.entries(parsed)) {
    if (value.trim().length > 0) {
      keySources[key] = source;
      if (!keysLoaded.includes(key)) keysLoaded.push(key);
    }
  }

  if (result.error && Object.keys(parsed).length === 0) {
    console.warn(`[env] Warning: Error loading ${source} file: ${result.error.message}`);
    return false;
  }
  return true;
}

/**
 * Initialize environment variables. Call before anything reads process.env.
 *
 * Loads <repo-root>/.env, then <repo-root>/.env.local on top of it. A
 * non-empty variable already set in the process is never replaced by an empty
 * value from either file.
 */
export function initEnv(envFileOverride?: string): EnvInitResult {
  if (cachedResult) {
    return cachedResult;
  }

  const repoRoot = findRepoRoot(process.cwd());
  const explicitPath = envFileOverride || process.env.ENV_FILE;
  const envFilePath = resolve(explicitPath || join(repoRoot, '.env'));
  const envLocalFilePath = resolve(join(repoRoot, '.env.local'));

  const existingEnv: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value && value.trim().length > 0) {
      existingEnv[key] = value;
    }
  }

  const keysLoaded: string[] = [];
  const keySources: Record<string, string> = {};

  let loaded = false;
  if (existsSync(envFilePath)) {
    loaded = loadFile(envFilePath, '.env', keysLoaded, keySources);
  } else if (explicitPath) {
    // .env is optional; only a path someone asked for is worth a warning
    console.warn(`[env] .env file not found at: ${envFilePath}`);
  }

  let localLoaded = false;
  if (existsSync(envLocalFilePath)) {
    localLoaded = loadFile(envLocalFilePath, '.env.local', keysLoaded, keySources);
  }

  for (const [key, existingValue] of Object.entries(existingEnv)) {
    const currentValue = process.env[key];
    if (!currentValue || currentValue.trim().length === 0) {
      process.env[key] = existingValue;
    }
  }

  cachedResult = {
    repoRoot,
    envFilePath,
    envLocalFilePath,
    loaded,
    localLoaded,
    keysLoaded,
    keySources,
  };

  return cachedResult;
}

/**
 * Get environment diagnostics
 */
export function getEnvDiagnostics(keys: readonly string[]): EnvDiagnostics {
  const cwd = process.cwd();
  const repoRoot = cachedResult?.repoRoot ?? findRepoRoot(cwd);
  const envFilePath = cachedResult?.envFilePath ?? resolve(process.env.ENV_FILE || join(repoRoot, '.env'));
  const envFileExists = existsSync(envFilePath);
  const keySources = cachedResult?.keySources ?? {};

  const statuses = keys.map((key): EnvKeyStatus => {
    const value = process.env[key];
    if (!value || value.trim().length === 0) {
      return { key, present: false };
    }
    return {
      key,
      present: true,
      length: value.trim().length,
      value,
      source: keySources[key],
    };
  });

  const warnings: string[] = [];

  if (!envFileExists) {
    warnings.push(`.env file not found at: ${envFilePath}`);
  }

  for (const key of keys) {
    const value = process.env[key];
    if (!value) continue;
    if (hasQuotesOrWhitespace(value)) {
      warnings.push(`${key} contains quotes or leading/trailing whitespace (may cause issues)`);
    }
    if (hasUnprintableChars(value)) {
      warnings.push(`${key} contains unprintable characters (possible CRLF/encoding issue)`);
    }
  }

  return {
    cwd,
    repoRoot,
    envFilePath,
    envFileExists,
    keys: statuses,
    warnings,
  };
}
