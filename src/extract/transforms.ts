/**
 * Text transforms applied to raw scraped values
 */

import type { FieldRule } from '../types/index.js';

/**
 * Trim and collapse every whitespace run to a single space
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * `Project Type` -> `project_type`
 */
export function toSnakeCase(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/**
 * Remove a leading prefix, ignoring case. The compared head is the exact
 * slice that gets cut, whatever lowercasing does to its length.
 */
export function stripPrefix(value: string, prefix: string): string {
  const head = value.slice(0, prefix.length);
  return head.toLowerCase() === prefix.toLowerCase() ? value.slice(prefix.length).trim() : value;
}

/**
 * Clean one raw value according to its field rule. Returns '' when the value
 * is empty after cleaning and the rule has no default.
 */
export function cleanValue(raw: string | null | undefined, rule: FieldRule): string {
  let value = collapseWhitespace(raw ?? '');

  if (rule.stripPrefix) {
    value = stripPrefix(value, rule.stripPrefix);
  }

  if (value && rule.pattern) {
    const match = new RegExp(rule.pattern).exec(value);
    value = match ? collapseWhitespace(match[1] ?? match[0]) : '';
  }

  if (!value && rule.default !== undefined) {
    value = rule.default;
  }

  return value;
}

/**
 * Parse `Key: Value` lines into fields named `<prefix><snake_key>`.
 * Lines with no colon or more than one colon are ignored, as are
 * lines with an empty key or value.
 */
export function parseKeyValueLines(text: string, prefix = ''): Record<string, string> {
  const fields: Record<string, string> = {};

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    const parts = line.split(':');
    if (parts.length !== 2) continue;

    const [rawKey = '', rawValue = ''] = parts;
    const key = toSnakeCase(rawKey);
    const value = collapseWhitespace(rawValue);
    if (!key || !value) continue;

    fields[`${prefix}${key}`] = value;
  }

  return fields;
}
