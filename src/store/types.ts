/**
 * Result Store contract
 *
 * Implemented by the PostgreSQL store and the in-memory store. Both keep
 * the same dedup semantics: one record per (projectId, dedupKey).
 */

import type {
  ExtractedRecord,
  FetchResult,
  Project,
  ProjectStatus,
  ScrapeRun,
} from '../types/index.js';

export interface RecordQuery {
  /** Case-insensitive substring match against any field value */
  q?: string;
  /** Case-insensitive substring match per field */
  where?: Record<string, string>;
  limit?: number;
  offset?: number;
}

export interface RecordPage {
  total: number;
  records: ExtractedRecord[];
}

export interface SaveRecordsResult {
  inserted: number;
  duplicates: number;
}

export interface StoreStats {
  totalProjects: number;
  activeProjects: number;
  totalRuns: number;
  totalRecords: number;
  lastRunAt: Date | null;
}

export const MAX_RECORD_LIMIT = 500;

export interface ScrapeStore {
  readonly kind: 'postgres' | 'memory';

  init(): Promise<void>;
  close(): Promise<void>;

  // Projects
  insertProject(project: Project): Promise<void>;
  getProject(id: string): Promise<Project | null>;
  listProjects(filter?: { status?: ProjectStatus }): Promise<Project[]>;
  updateProject(project: Project): Promise<void>;
  /** Removes the project with its runs, fetch results and records */
  deleteProject(id: string): Promise<boolean>;

  // Runs
  createRun(run: ScrapeRun): Promise<void>;
  finishRun(run: ScrapeRun): Promise<void>;
  getRun(id: string): Promise<ScrapeRun | null>;
  listRuns(projectId: string, limit?: number): Promise<ScrapeRun[]>;

  // Fetch results
  saveFetchResult(result: FetchResult): Promise<void>;
  getFetchResult(id: string): Promise<FetchResult | null>;

  // Records
  /**
   * Insert new records. A record whose (projectId, dedupKey) already exists
   * only advances the stored record's lastSeenAt.
   */
  saveRecords(records: ExtractedRecord[]): Promise<SaveRecordsResult>;
  listRecords(projectId: string, query?: RecordQuery): Promise<RecordPage>;
  allRecords(projectId: string): Promise<ExtractedRecord[]>;

  getStats(): Promise<StoreStats>;
}

export function clampLimit(limit: number | undefined, fallback: number): number {
  if (limit === undefined || !Number.isFinite(limit) || limit <= 0) return fallback;
  return Math.min(Math.floor(limit), MAX_RECORD_LIMIT);
}

export function clampOffset(offset: number | undefined): number {
  if (offset === undefined || !Number.isFinite(offset) || offset < 0) return 0;
  return Math.floor(offset);
}
