export * from './cache.js';
export * from './lookup.js';
export * from './hash.js';
export { streamCsvRows, type CsvRow } from './csv-stream.js';
