/**
 * Tabular roster readers
 *
 * CSV and Excel files are both reduced to a matrix of trimmed strings before
 * header detection, so the rest of ingest never cares where a roster came
 * from.
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { extname } from 'path';
import Papa from 'papaparse';
import ExcelJS from 'exceljs';
import type { CellValue, Workbook, Worksheet } from 'exceljs';
import { IngestError } from '@exclusion/core';
import { createLogger, type SectionConfig } from '@exclusion/config';

const logger = createLogger('ingest');

export type Matrix = string[][];

export type ResolvedFileType = 'csv' | 'excel';

export interface TableData {
  path: string;
  fileType: ResolvedFileType;
  delimiter: string | null;
  /** physical index of the header row, blank rows included */
  headerRowIndex: number;
  headers: string[];
  rows: Array<Record<string, string>>;
}

export const DELIMITER_CANDIDATES = [',', ';', '\t', '|'] as const;

const SNIFF_LINES = 10;

const EXCEL_EXTENSIONS = new Set(['.xlsx', '.xlsm']);

/**
 * Header comparison key: case and whitespace insensitive
 */
export function headerKey(value: string): string {
  return value.trim().replace(/\s+/g, ' ').toLowerCase();
}

export function detectFileType(path: string, configured: SectionConfig['file_type'] = 'auto'): ResolvedFileType {
  if (configured !== 'auto') return configured;
  return EXCEL_EXTENSIONS.has(extname(path).toLowerCase()) ? 'excel' : 'csv';
}

// Occurrences of a character outside double-quoted fields
function countOutsideQuotes(line: string, char: string): number {
  let count = 0;
  let quoted = false;
  for (const c of line) {
    if (c === '"') quoted = !quoted;
    else if (c === char && !quoted) count += 1;
  }
  return count;
}

/**
 * Pick the delimiter whose per-line count is most consistent across the first
 * non-empty lines. Ties go to the earlier candidate; nothing found means comma.
 */
export function sniffDelimiter(sample: string): string {
  const lines = sample
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .slice(0, SNIFF_LINES);

  let best: string = ',';
  let bestScore = 0;

  for (const candidate of DELIMITER_CANDIDATES) {
    const counts = lines.map((line) => countOutsideQuotes(line, candidate));
    const frequency = new Map<number, number>();
    for (const count of counts) {
      if (count > 0) frequency.set(count, (frequency.get(count) ?? 0) + 1);
    }

    let score = 0;
    for (const agreeing of frequency.values()) {
      score = Math.max(score, agreeing);
    }

    if (score > bestScore) {
      best = candidate;
      bestScore = score;
    }
  }

  return best;
}

function isBlankRow(row: readonly string[]): boolean {
  return row.every((cell) => cell.length === 0);
}

// Blank rows stay in place so skip_rows counts physical lines; only the tail goes
function dropTrailingBlankRows(matrix: Matrix): Matrix {
  let end = matrix.length;
  while (end > 0 && isBlankRow(matrix[end - 1])) end -= 1;
  return matrix.slice(0, end);
}

export function readCsvMatrix(text: string, delimiter: string, source = '<inline>'): Matrix {
  const parsed = Papa.parse<string[]>(text.replace(/^\uFEFF/, ''), {
    delimiter,
    header: false,
    dynamicTyping: false,
    skipEmptyLines: false,
  });

  const quoteError = parsed.errors.find((error) => error.type === 'Quotes');
  if (quoteError) {
    const row = quoteError.row === undefined ? '' : ` near row ${quoteError.row + 1}`;
    throw new IngestError(`Malformed CSV${row}: ${quoteError.message}`, source);
  }

  return dropTrailingBlankRows(parsed.data.map((row) => row.map((cell) => cell.trim())));
}

function formatExcelDate(date: Date): string {
  return `${date.getUTCMonth() + 1}/${date.getUTCDate()}/${date.getUTCFullYear()}`;
}

/**
 * Display text of a cell: dates as M/D/YYYY, rich text flattened, formulas
 * replaced by their cached result
 */
export function cellText(value: CellValue | undefined): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return formatExcelDate(value);
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if ('richText' in value) return value.richText.map((part) => part.text).join('').trim();
  if ('formula' in value || 'sharedFormula' in value) return cellText(value.result);
  if ('hyperlink' in value) return String(value.text).trim();
  return '';
}

function pickWorksheet(workbook: Workbook, sheet: string | number | undefined, path: string): Worksheet {
  const worksheet =
    sheet === undefined
      ? workbook.worksheets[0]
      : typeof sheet === 'number'
        ? workbook.worksheets[sheet]
        : workbook.getWorksheet(sheet);

  if (!worksheet) {
    const names = workbook.worksheets.map((ws) => ws.name).join(', ');
    throw new IngestError(`Sheet ${sheet === undefined ? '(first)' : JSON.stringify(sheet)} not found; workbook has: ${names || 'no sheets'}`, path);
  }
  return worksheet;
}

export async function readExcelMatrix(path: string, sheet?: string | number): Promise<Matrix> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(path);
  const worksheet = pickWorksheet(workbook, sheet, path);

  const matrix: Matrix = [];
  const width = worksheet.columnCount;
  for (let r = 1; r <= worksheet.rowCount; r += 1) {
    const row = worksheet.getRow(r);
    const cells: string[] = [];
    for (let c = 1; c <= width; c += 1) {
      cells.push(cellText(row.getCell(c).value));
    }
    matrix.push(cells);
  }
  return dropTrailingBlankRows(matrix);
}

/**
 * Index of the header row in the matrix. skip_rows drops that many physical
 * rows, blank ones included. Of the non-blank rows left, an integer header_row
 * picks one by position and `auto` takes the first containing every
 * true_header_tokens entry.
 */
export function locateHeaderRow(matrix: Matrix, section: SectionConfig, source = '<inline>'): number {
  const offset = section.skip_rows;
  const candidates: number[] = [];
  for (let index = offset; index < matrix.length; index += 1) {
    if (!isBlankRow(matrix[index])) candidates.push(index);
  }

  if (section.header_row !== 'auto') {
    const index = candidates[section.header_row];
    if (index === undefined) {
      throw new IngestError(
        `Header row ${section.header_row} (after skipping ${offset} rows) is beyond the end of the file (${candidates.length} non-blank rows left)`,
        source
      );
    }
    return index;
  }

  const tokens = section.true_header_tokens.map(headerKey);
  for (const index of candidates) {
    const cells = new Set(matrix[index].map(headerKey));
    if (tokens.every((token) => cells.has(token))) {
      return index;
    }
  }

  throw new IngestError(`No row contains all header tokens: ${section.true_header_tokens.join(', ')}`, source);
}

// Blank headers become "Column N"; repeated headers get " (2)", " (3)", ...
function uniqueHeaders(row: readonly string[]): string[] {
  const seen = new Map<string, number>();
  return row.map((cell, i) => {
    const base = cell.length > 0 ? cell : `Column ${i + 1}`;
    const key = headerKey(base);
    const count = (seen.get(key) ?? 0) + 1;
    seen.set(key, count);
    return count === 1 ? base : `${base} (${count})`;
  });
}

export async function readTable(path: string, section: SectionConfig): Promise<TableData> {
  if (!existsSync(path)) {
    throw new IngestError(`Roster file not found: ${path}`, path);
  }

  const fileType = detectFileType(path, section.file_type);
  let delimiter: string | null = null;
  let matrix: Matrix;

  if (fileType === 'csv') {
    const text = await readFile(path, 'utf-8');
    delimiter = section.delimiter && section.delimiter !== 'auto' ? section.delimiter : sniffDelimiter(text);
    matrix = readCsvMatrix(text, delimiter, path);
  } else {
    matrix = await readExcelMatrix(path, section.sheet);
  }

  const headerRowIndex = locateHeaderRow(matrix, section, path);
  const headers = uniqueHeaders(matrix[headerRowIndex]);

  const rows = matrix
    .slice(headerRowIndex + 1)
    .filter((cells) => !isBlankRow(cells))
    .map((cells) => {
      const record: Record<string, string> = {};
      headers.forEach((header, i) => {
        record[header] = cells[i] ?? '';
      });
      return record;
    });

  logger.debug(
    { event: 'ingest.table.read', path, fileType, delimiter, headerRowIndex, columns: headers.length, rows: rows.length },
    'Roster table read'
  );

  return { path, fileType, delimiter, headerRowIndex, headers, rows };
}
