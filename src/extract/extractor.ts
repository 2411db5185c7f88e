/**
 * Record Extractor
 *
 * Turns raw values collected by the fetcher into cleaned record fields,
 * and computes the dedup key a record is stored under.
 */

import crypto from 'crypto';
import type { RawDetail, RawItem } from '../scraper/types.js';
import type {
  ExtractedRecord,
  ExtractionRules,
  FieldRule,
  RecordFields,
} from '../types/index.js';
import { cleanValue, collapseWhitespace, parseKeyValueLines } from './transforms.js';

export interface FieldExtraction {
  fields: RecordFields;
  /** Required fields that came out empty */
  missing: string[];
}

/**
 * Apply listing rules to an item, then merge detail fields. Listing values
 * win over detail values of the same name.
 */
export function extractFields(
  item: RawItem,
  rules: ExtractionRules,
  detail?: RawDetail
): FieldExtraction {
  const fields: RecordFields = {};
  const missing: string[] = [];

  applyRules(rules.fields, item.values, fields, missing);

  if (rules.detail) {
    const detailFields: RecordFields = {};
    const detailMissing: string[] = [];
    applyRules(rules.detail.fields, detail?.values ?? {}, detailFields, detailMissing);
    // A listing value satisfies a required detail field of the same name
    missing.push(...detailMissing.filter((name) => !(name in fields)));

    const { keyValuePrefix, blockField } = rules.detail;
    (detail?.blocks ?? []).forEach((block, index) => {
      const text = block.trim();
      if (blockField && text) {
        const name = `${blockField}_${index + 1}`;
        if (!(name in detailFields)) detailFields[name] = text;
      }

      const pairs = parseKeyValueLines(block, keyValuePrefix);
      for (const [key, value] of Object.entries(pairs)) {
        if (!(key in detailFields)) detailFields[key] = value;
      }
    });

    for (const [key, value] of Object.entries(detailFields)) {
      if (!(key in fields)) fields[key] = value;
    }
  }

  return { fields, missing };
}

function applyRules(
  fieldRules: Record<string, FieldRule>,
  values: Record<string, string | null>,
  into: RecordFields,
  missing: string[]
): void {
  for (const [name, rule] of Object.entries(fieldRules)) {
    const value = cleanValue(values[name], rule);
    if (value) {
      into[name] = value;
    } else if (rule.required) {
      missing.push(name);
    }
  }
}

/**
 * Dedup key over the key fields, or over every field when no key field
 * has a value
 */
export function computeDedupKey(
  projectId: string,
  fields: RecordFields,
  keyFields?: string[]
): string {
  const normalize = (value: string | undefined): string =>
    collapseWhitespace(value ?? '').toLowerCase();

  let parts: string[] = [];
  if (keyFields && keyFields.some((field) => normalize(fields[field]) !== '')) {
    parts = keyFields.map((field) => `${field}=${normalize(fields[field])}`);
  } else {
    parts = Object.keys(fields)
      .sort()
      .map((field) => `${field}=${normalize(fields[field])}`);
  }

  return crypto
    .createHash('sha256')
    .update([projectId, ...parts].join('\u001f'))
    .digest('hex')
    .slice(0, 32);
}

export interface BuildRecordInput {
  projectId: string;
  runId: string;
  fetchResultId: string;
  fields: RecordFields;
  detailUrl: string | null;
  keyFields?: string[];
  seenAt: Date;
}

export function buildRecord(input: BuildRecordInput): ExtractedRecord {
  return {
    id: crypto.randomUUID(),
    projectId: input.projectId,
    runId: input.runId,
    fetchResultId: input.fetchResultId,
    dedupKey: computeDedupKey(input.projectId, input.fields, input.keyFields),
    fields: input.fields,
    detailUrl: input.detailUrl,
    firstSeenAt: input.seenAt,
    lastSeenAt: input.seenAt,
  };
}
