export * from './report-model.js';
export * from './pdf.js';
export * from './audit-workbook.js';
