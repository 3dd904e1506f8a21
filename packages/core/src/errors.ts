/**
 * Error types raised across the screening pipeline
 */

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join('\n')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class IngestError extends Error {
  readonly file: string;

  constructor(message: string, file: string) {
    super(message);
    this.name = 'IngestError';
    this.file = file;
  }
}

export class CacheError extends Error {
  readonly month: string;

  constructor(message: string, month: string) {
    super(message);
    this.name = 'CacheError';
    this.month = month;
  }
}

const MONTH_PATTERN = /^\d{4}-(0[1-9]|1[0-2])$/;

/**
 * Months key caches and run directories; always YYYY-MM
 */
export function assertMonth(month: string): string {
  const trimmed = month.trim();
  if (!MONTH_PATTERN.test(trimmed)) {
    throw new ConfigError(`Month must be YYYY-MM, got "${month}"`);
  }
  return trimmed;
}
