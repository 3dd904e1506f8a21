export * from './table.js';
export * from './columns.js';
export * from './location.js';
export * from './roster.js';
