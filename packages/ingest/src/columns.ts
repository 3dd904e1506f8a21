/**
 * Semantic column resolution
 *
 * Explicit header mappings from the client config win; every other field is
 * looked up in the alias table (data/column-aliases.json).
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { IngestError, type ColumnSource, type SectionName } from '@exclusion/core';
import type { RosterField, SectionConfig } from '@exclusion/config';
import { headerKey } from './table.js';

export type ColumnMapping = Partial<Record<RosterField, string>>;

export interface ColumnResolution {
  /** semantic field -> header as it appears in the file */
  mapping: ColumnMapping;
  sources: Partial<Record<RosterField, ColumnSource>>;
}

const PERSON_FIELDS: readonly RosterField[] = [
  'first_name',
  'last_name',
  'middle_name',
  'name_column',
  'dob',
  'ssn',
  'job_title',
  'status',
  'city',
  'state',
  'zip',
  'city_state_zip',
];

export const SECTION_FIELDS: Record<SectionName, readonly RosterField[]> = {
  staff: PERSON_FIELDS,
  board: PERSON_FIELDS,
  vendors: ['entity_name', 'tax_id', 'city', 'state', 'zip', 'city_state_zip'],
};

const aliasFileSchema = z.record(z.array(z.string()));

let aliasCache: Map<string, string[]> | null = null;

function loadAliases(): Map<string, string[]> {
  if (!aliasCache) {
    const raw: unknown = JSON.parse(readFileSync(new URL('../data/column-aliases.json', import.meta.url), 'utf-8'));
    const parsed = aliasFileSchema.parse(raw);
    aliasCache = new Map(Object.entries(parsed).map(([field, aliases]) => [field, aliases.map(headerKey)]));
  }
  return aliasCache;
}

export function aliasesFor(field: RosterField): string[] {
  return loadAliases().get(field) ?? [];
}

function hasPersonName(mapping: ColumnMapping): boolean {
  return Boolean(mapping.name_column) || Boolean(mapping.first_name && mapping.last_name);
}

function missingRequired(mapping: ColumnMapping, kind: SectionName): string | null {
  switch (kind) {
    case 'staff':
      return hasPersonName(mapping) ? null : 'first_name and last_name (or name_column)';
    case 'board':
      return hasPersonName(mapping) ? null : 'name_column (or first_name and last_name)';
    case 'vendors':
      return mapping.entity_name ? null : 'entity_name';
  }
}

/**
 * Map semantic fields onto the table's headers
 * @param source file path used in errors
 */
export function resolveColumns(
  headers: readonly string[],
  section: SectionConfig,
  kind: SectionName,
  source = '<inline>'
): ColumnResolution {
  const byKey = new Map<string, string>();
  for (const header of headers) {
    const key = headerKey(header);
    if (!byKey.has(key)) byKey.set(key, header);
  }

  const mapping: ColumnMapping = {};
  const sources: Partial<Record<RosterField, ColumnSource>> = {};
  const used = new Set<string>();
  const fields = SECTION_FIELDS[kind];

  for (const field of fields) {
    const configured = section[field];
    if (!configured) continue;
    const header = byKey.get(headerKey(configured));
    if (!header) {
      throw new IngestError(
        `Column "${configured}" configured for ${kind}.${field} is not in the header row (found: ${headers.join(', ')})`,
        source
      );
    }
    mapping[field] = header;
    sources[field] = 'configured';
    used.add(header);
  }

  for (const field of fields) {
    if (mapping[field]) continue;
    for (const alias of aliasesFor(field)) {
      const header = byKey.get(alias);
      if (header && !used.has(header)) {
        mapping[field] = header;
        sources[field] = 'alias';
        used.add(header);
        break;
      }
    }
  }

  const missing = missingRequired(mapping, kind);
  if (missing) {
    throw new IngestError(`Could not resolve required ${kind} column(s): ${missing}`, source);
  }

  return { mapping, sources };
}
