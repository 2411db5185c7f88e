/**
 * Shared test data
 */

import type { ExtractedRecord, ProjectInput } from '../../src/types/index.js';

export const TARGET = 'https://listings.example.test/projects';

export function detailUrl(slug: string): string {
  return `https://listings.example.test/projects/${slug}`;
}

export function projectInput(overrides: Partial<ProjectInput> = {}): ProjectInput {
  return {
    id: 'estate-projects',
    name: 'Estate projects',
    targets: [TARGET],
    maxPages: 5,
    rateLimitMs: 0,
    rules: {
      itemSelector: 'div.card',
      labelSelector: 'span.label',
      fields: {
        name: { selector: 'h5', required: true },
        rera: { label: 'RERA No.', required: true },
        promoter: { selector: 'small', stripPrefix: 'by ' },
        address: { selector: 'span.address', default: 'Unknown' },
      },
      detail: {
        linkSelector: 'a.details',
        fields: { gstin: { label: 'GST No.' } },
        keyValueSelector: 'div.promoter',
        keyValuePrefix: 'promoter_',
      },
      pagination: { mode: 'query', param: 'page' },
      keyFields: ['rera'],
      summary: {
        groups: [{ name: 'byCity', field: 'address', split: ',' }],
        distinct: [{ name: 'promoters', field: 'promoter', limit: 5 }],
      },
    },
    ...overrides,
  };
}

export function record(
  fields: Record<string, string>,
  overrides: Partial<ExtractedRecord> = {}
): ExtractedRecord {
  const seen = new Date('2026-01-15T08:00:00.000Z');
  return {
    id: `rec-${Object.values(fields).join('-')}`,
    projectId: 'estate-projects',
    runId: 'run-1',
    fetchResultId: 'fetch-1',
    dedupKey: `key-${Object.values(fields).join('-')}`,
    fields,
    detailUrl: null,
    firstSeenAt: seen,
    lastSeenAt: seen,
    ...overrides,
  };
}
