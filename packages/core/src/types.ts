/**
 * Shared screening types
 */

export type SectionName = 'staff' | 'board' | 'vendors';

export const SECTION_NAMES: readonly SectionName[] = ['staff', 'board', 'vendors'];

export type MatchStatus = 'CONFIRMED' | 'NOT FOUND';

export type VendorClassification = 'ENTITY' | 'PERSON_VENDOR' | 'AMBIGUOUS';

export type ReviewSource = 'OIG People' | 'OIG Entities' | 'SAM Entities' | 'Source Record';

/**
 * A candidate hit that a person has to look at before the run is signed off
 */
export interface ReviewItem {
  source: ReviewSource;
  candidateName: string;
  candidateExclusionDate: string;
  note: string;
  neededData: string;
}

export interface MatchResult {
  oigStatus: MatchStatus;
  oigDate: string;
  samStatus: MatchStatus;
  samDate: string;
  reason: string;
  review: ReviewItem | null;
}

export interface ScreenedPersonRow extends MatchResult {
  rowNumber: number;
  name: string; // normalized full name
  displayName: string; // as written in the roster
  firstName: string;
  lastName: string;
  dob: string | null; // ISO
  ssnLast4: string | null;
  role: string;
  employmentStatus: string;
  city: string;
  state: string;
  zip: string;
}

export interface ScreenedVendorRow extends MatchResult {
  rowNumber: number;
  name: string; // as written in the roster
  normalizedName: string;
  classification: VendorClassification;
  city: string;
  state: string;
  zip: string;
}

export interface ScreeningResults {
  staff: ScreenedPersonRow[];
  board: ScreenedPersonRow[];
  vendors: ScreenedVendorRow[];
}

export type ScreenedRow = ScreenedPersonRow | ScreenedVendorRow;

export type ColumnSource = 'configured' | 'alias';

/**
 * Per-section entry of metadata.json
 */
export interface SectionRunInfo {
  file: string;
  file_sha256: string;
  file_type: 'csv' | 'excel';
  delimiter: string | null;
  header_row_index: number;
  rows: number;
  confirmed: number;
  review_required: number;
  warnings: string[];
  columns: Record<string, { header: string; source: ColumnSource }>;
}

/**
 * metadata.json written into every run directory
 */
export interface RunMetadata {
  client: string;
  month: string;
  engine_version: string;
  threshold_version: string;
  timestamp: string;
  staff_count: number;
  board_count: number;
  vendor_count: number;
  confirmed_count: number;
  review_count: number;
  oig_file_hash?: string;
  sam_file_hash?: string;
  reference_cache: Record<string, string>;
  sections: Partial<Record<SectionName, SectionRunInfo>>;
}

export function isConfirmed(row: MatchResult): boolean {
  return row.oigStatus === 'CONFIRMED' || row.samStatus === 'CONFIRMED';
}

export function emptyMatchResult(): MatchResult {
  return {
    oigStatus: 'NOT FOUND',
    oigDate: '',
    samStatus: 'NOT FOUND',
    samDate: '',
    reason: '',
    review: null,
  };
}
