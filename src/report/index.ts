/**
 * Reports Module
 */

export { summarizeRecords, groupValue, UNKNOWN_VALUE } from './summary.js';
export type { RecordSummary, DistinctSummary } from './summary.js';

export { exportRecords, parseExportFormat, csvEscape, exportColumns, toCsv } from './export.js';
export type { ExportFormat, ExportFile } from './export.js';
