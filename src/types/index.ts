/**
 * Core types for the scrape project engine
 */

import type { ExtractionRules } from '../registry/schema.js';

export type {
  ExtractionRules,
  FieldRule,
  DetailRules,
  PaginationRule,
  SummaryRules,
  ProjectInput,
  ProjectPatch,
} from '../registry/schema.js';

export type ProjectStatus = 'active' | 'paused';

export interface Project {
  id: string;
  name: string;
  targets: string[];
  rules: ExtractionRules;
  schedule: string | null;
  status: ProjectStatus;
  maxPages: number;
  rateLimitMs: number;
  createdAt: Date;
  updatedAt: Date;
}

export type FetchKind = 'listing' | 'detail';

export interface FetchResult {
  id: string;
  projectId: string;
  runId: string;
  kind: FetchKind;
  url: string;
  status: number | null;
  payload: string;
  fetchedAt: Date;
}

export type RecordFields = Record<string, string>;

export interface ExtractedRecord {
  id: string;
  projectId: string;
  runId: string;
  fetchResultId: string;
  dedupKey: string;
  fields: RecordFields;
  detailUrl: string | null;
  firstSeenAt: Date;
  lastSeenAt: Date;
}

export type RunTrigger = 'manual' | 'schedule' | 'cli';
export type RunStatus = 'running' | 'succeeded' | 'failed';

export interface RunCounters {
  pagesProcessed: number;
  recordsFound: number;
  recordsNew: number;
  recordsDuplicate: number;
  itemsSkipped: number;
  errors: number;
}

export interface ScrapeRun extends RunCounters {
  id: string;
  projectId: string;
  trigger: RunTrigger;
  status: RunStatus;
  startedAt: Date;
  finishedAt: Date | null;
  errorMessage: string | null;
}

export interface RunResult extends RunCounters {
  success: boolean;
  message: string;
  runId: string;
  projectId: string;
  status: RunStatus;
  detailUrls: string[];
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
}

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
}
