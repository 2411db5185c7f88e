/**
 * Record Summary
 *
 * Aggregates stored records by the groupings a project's rules declare
 */

import type { ExtractedRecord, SummaryRules } from '../types/index.js';

export const UNKNOWN_VALUE = 'Unknown';

export interface DistinctSummary {
  count: number;
  top: Array<{ value: string; count: number }>;
}

export interface RecordSummary {
  totalRecords: number;
  groups: Record<string, Record<string, number>>;
  distinct: Record<string, DistinctSummary>;
  generatedAt: string;
}

/**
 * Group key for a value: the last segment after `split`, or the trimmed value
 */
export function groupValue(raw: string | undefined, split?: string): string {
  const value = (raw ?? '').trim();
  if (!value) {
    return UNKNOWN_VALUE;
  }
  if (split === undefined) {
    return value;
  }
  if (!value.includes(split)) {
    return UNKNOWN_VALUE;
  }

  const segments = value.split(split);
  const last = (segments[segments.length - 1] ?? '').trim();
  return last || UNKNOWN_VALUE;
}

function countBy(values: Iterable<string>): Map<string, number> {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return counts;
}

/**
 * Most frequent first; equal counts in alphabetical order
 */
function rank(counts: Map<string, number>): Array<{ value: string; count: number }> {
  return [...counts.entries()]
    .map(([value, count]) => ({ value, count }))
    .sort((a, b) => b.count - a.count || (a.value < b.value ? -1 : a.value > b.value ? 1 : 0));
}

export function summarizeRecords(
  records: ExtractedRecord[],
  rules: SummaryRules | undefined,
  now: Date = new Date()
): RecordSummary {
  const groups: RecordSummary['groups'] = {};
  const distinct: RecordSummary['distinct'] = {};

  for (const group of rules?.groups ?? []) {
    const counts = countBy(records.map((record) => groupValue(record.fields[group.field], group.split)));
    groups[group.name] = Object.fromEntries(rank(counts).map(({ value, count }) => [value, count]));
  }

  for (const rule of rules?.distinct ?? []) {
    const values = records
      .map((record) => (record.fields[rule.field] ?? '').trim())
      .filter((value) => value.length > 0);
    const ranked = rank(countBy(values));
    distinct[rule.name] = { count: ranked.length, top: ranked.slice(0, rule.limit) };
  }

  return {
    totalRecords: records.length,
    groups,
    distinct,
    generatedAt: now.toISOString(),
  };
}
