/**
 * Record Export
 *
 * Serializes a project's records as JSON or CSV
 */

import { ValidationError } from '../utils/errors.js';
import type { ExtractedRecord, Project } from '../types/index.js';

export type ExportFormat = 'json' | 'csv';

export interface ExportFile {
  contentType: string;
  filename: string;
  body: string;
}

export function parseExportFormat(value: unknown): ExportFormat {
  const format = typeof value === 'string' ? value.toLowerCase() : 'json';
  if (format !== 'json' && format !== 'csv') {
    throw new ValidationError("Unsupported format. Use 'json' or 'csv'");
  }
  return format;
}

export function csvEscape(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Rule fields in rule order, then fields only some records carry, sorted
 */
export function exportColumns(project: Project, records: ExtractedRecord[]): string[] {
  const ruleFields = [
    ...Object.keys(project.rules.fields),
    ...Object.keys(project.rules.detail?.fields ?? {}),
  ];
  const known = new Set(ruleFields);
  const extra = new Set<string>();

  for (const record of records) {
    for (const name of Object.keys(record.fields)) {
      if (!known.has(name)) extra.add(name);
    }
  }

  return [...new Set(ruleFields), ...[...extra].sort()];
}

export function toCsv(project: Project, records: ExtractedRecord[]): string {
  const columns = exportColumns(project, records);
  const header = ['dedup_key', ...columns, 'detail_url', 'first_seen_at', 'last_seen_at'];

  const rows = records.map((record) => [
    record.dedupKey,
    ...columns.map((name) => record.fields[name] ?? ''),
    record.detailUrl ?? '',
    record.firstSeenAt.toISOString(),
    record.lastSeenAt.toISOString(),
  ]);

  return [header, ...rows].map((row) => row.map(csvEscape).join(',')).join('\r\n') + '\r\n';
}

export function exportRecords(
  project: Project,
  records: ExtractedRecord[],
  format: ExportFormat | string,
  now: Date = new Date()
): ExportFile {
  const parsed = parseExportFormat(format);
  const stamp = now.toISOString().slice(0, 10);

  if (parsed === 'csv') {
    return {
      contentType: 'text/csv; charset=utf-8',
      filename: `${project.id}-${stamp}.csv`,
      body: toCsv(project, records),
    };
  }

  return {
    contentType: 'application/json; charset=utf-8',
    filename: `${project.id}-${stamp}.json`,
    body: JSON.stringify(
      {
        projectId: project.id,
        total: records.length,
        exportedAt: now.toISOString(),
        records,
      },
      null,
      2
    ),
  };
}
