import { createReadStream } from 'fs';
import Papa from 'papaparse';

export type CsvRow = Record<string, string>;

/**
 * Stream a headed CSV row by row. Header names are trimmed and lose any BOM.
 * An exception thrown by `onRow` aborts the parse and rejects.
 * @returns number of rows handed to `onRow`
 */
export function streamCsvRows(path: string, onRow: (row: CsvRow) => void): Promise<number> {
  return new Promise((resolve, reject) => {
    let count = 0;
    let failure: unknown = null;

    Papa.parse<CsvRow>(createReadStream(path, { encoding: 'utf-8' }), {
      header: true,
      dynamicTyping: false,
      skipEmptyLines: 'greedy',
      transformHeader: (header) => header.replace(/^\uFEFF/, '').trim(),
      step: (results, parser) => {
        if (failure !== null) return;
        try {
          onRow(results.data);
          count += 1;
        } catch (error) {
          failure = error;
          parser.abort();
        }
      },
      complete: () => {
        if (failure !== null) reject(failure);
        else resolve(count);
      },
      error: (error) => reject(error),
    });
  });
}

/**
 * First non-blank value among the given columns
 */
export function pick(row: CsvRow, ...columns: string[]): string {
  for (const column of columns) {
    const value = row[column]?.trim();
    if (value) return value;
  }
  return '';
}
