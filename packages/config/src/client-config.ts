/**
 * Client configuration (clients/<client>.yaml)
 *
 * One YAML document per client, with optional staff / board / vendors
 * sections. Each section tells the ingest layer how to find the header row
 * and which source column holds which field.
 */

import { existsSync, readFileSync, readdirSync } from 'fs';
import { basename, extname, join } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, type SectionName } from '@exclusion/core';

export const ROSTER_FIELDS = [
  'first_name',
  'last_name',
  'middle_name',
  'name_column',
  'dob',
  'ssn',
  'job_title',
  'status',
  'entity_name',
  'tax_id',
  'city',
  'state',
  'zip',
  'city_state_zip',
] as const;

export type RosterField = (typeof ROSTER_FIELDS)[number];

const columnHeader = z.string().trim().min(1, 'column header must not be empty').optional();

export const sectionSchema = z
  .object({
    file_type: z.enum(['auto', 'csv', 'excel']).default('auto'),
    header_row: z
      .union([
        z.literal('auto'),
        z.number().int('header_row must be an integer').min(0, 'header_row must be 0 or greater'),
      ])
      .default(0),
    skip_rows: z.number().int('skip_rows must be an integer').min(0, 'skip_rows must be 0 or greater').default(0),
    delimiter: z
      .string()
      .refine((value) => value === 'auto' || value.length === 1, {
        message: 'delimiter must be a single character or "auto"',
      })
      .optional(),
    true_header_tokens: z.array(z.string().trim().min(1)).default([]),
    sheet: z.union([z.string().min(1), z.number().int().min(0)]).optional(),

    first_name: columnHeader,
    last_name: columnHeader,
    middle_name: columnHeader,
    name_column: columnHeader,
    dob: columnHeader,
    ssn: columnHeader,
    job_title: columnHeader,
    status: columnHeader,
    entity_name: columnHeader,
    tax_id: columnHeader,
    city: columnHeader,
    state: columnHeader,
    zip: columnHeader,
    city_state_zip: columnHeader,
  })
  .strict()
  .superRefine((section, ctx) => {
    if (section.header_row === 'auto' && section.true_header_tokens.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['true_header_tokens'],
        message: 'true_header_tokens must list at least one header when header_row is auto',
      });
    }
    if (section.file_type === 'excel' && section.delimiter !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['delimiter'],
        message: 'delimiter applies to CSV files only and cannot be set with file_type: excel',
      });
    }
  });

export const clientConfigSchema = z
  .object({
    client_name: z.string().trim().min(1, 'client_name is required'),
    staff: sectionSchema.optional(),
    board: sectionSchema.optional(),
    vendors: sectionSchema.optional(),
  })
  .strict();

export type SectionConfig = z.infer<typeof sectionSchema>;
export type ClientConfig = z.infer<typeof clientConfigSchema>;
export type FileType = SectionConfig['file_type'];

export type ClientConfigEntry =
  | { ok: true; path: string; name: string; config: ClientConfig }
  | { ok: false; path: string; name: string; error: string };

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}

/**
 * Parse and validate a client configuration document
 * @param source shown in error messages, usually the file path
 */
export function parseClientConfig(text: string, source: string): ClientConfig {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Client config ${source} is not valid YAML`, [message]);
  }

  const parsed = clientConfigSchema.safeParse(document ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Client config ${source} is invalid`, parsed.error.issues.map(formatIssue));
  }
  return parsed.data;
}

export function loadClientConfig(path: string): ClientConfig {
  if (!existsSync(path)) {
    throw new ConfigError(`Client config not found: ${path}`);
  }
  return parseClientConfig(readFileSync(path, 'utf-8'), path);
}

const DEFAULT_SECTION: SectionConfig = sectionSchema.parse({});

/**
 * Section with defaults applied. A missing section means "auto-resolve
 * everything from the first row".
 */
export function getSection(config: ClientConfig, name: SectionName): SectionConfig {
  return config[name] ?? { ...DEFAULT_SECTION };
}

function isYamlFile(file: string): boolean {
  const ext = extname(file).toLowerCase();
  return ext === '.yaml' || ext === '.yml';
}

/**
 * Every client config in a directory, sorted by file name. Broken files are
 * listed with their error rather than hidden.
 */
export function listClientConfigs(dir: string): ClientConfigEntry[] {
  if (!existsSync(dir)) {
    throw new ConfigError(`Clients directory not found: ${dir}`);
  }

  return readdirSync(dir)
    .filter(isYamlFile)
    .sort()
    .map((file): ClientConfigEntry => {
      const path = join(dir, file);
      const stem = basename(file, extname(file));
      try {
        const config = loadClientConfig(path);
        return { ok: true, path, name: config.client_name || stem, config };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return { ok: false, path, name: stem, error: message };
      }
    });
}

/**
 * Resolve a client reference given on the command line: a path to a YAML
 * file, a client_name, or a file stem inside the clients directory.
 */
export function resolveClientConfig(ref: string, clientsDir: string): { path: string; config: ClientConfig } {
  if (isYamlFile(ref) || existsSync(ref)) {
    return { path: ref, config: loadClientConfig(ref) };
  }

  const entries = listClientConfigs(clientsDir);
  const match = entries.find((entry) => entry.name === ref || basename(entry.path, extname(entry.path)) === ref);
  if (!match) {
    throw new ConfigError(`No client config named "${ref}" in ${clientsDir}`);
  }
  if (!match.ok) {
    throw new ConfigError(match.error);
  }
  return { path: match.path, config: match.config };
}
