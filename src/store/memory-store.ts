/**
 * In-memory Result Store
 *
 * Used when no DATABASE_URL is configured, and by the test suite.
 */

import { ConflictError, NotFoundError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type {
  ExtractedRecord,
  FetchResult,
  Project,
  ProjectStatus,
  ScrapeRun,
} from '../types/index.js';
import {
  clampLimit,
  clampOffset,
  type RecordPage,
  type RecordQuery,
  type SaveRecordsResult,
  type ScrapeStore,
  type StoreStats,
} from './types.js';

export class MemoryStore implements ScrapeStore {
  readonly kind = 'memory' as const;

  private readonly projects = new Map<string, Project>();
  private readonly runs = new Map<string, ScrapeRun>();
  private readonly fetchResults = new Map<string, FetchResult>();
  // projectId -> dedupKey -> record
  private readonly records = new Map<string, Map<string, ExtractedRecord>>();

  async init(): Promise<void> {
    logger.info('Using in-memory store (data is lost on restart)');
  }

  async close(): Promise<void> {
    // Nothing to release
  }

  // ─── Projects ──────────────────────────────────────────────────────────────

  async insertProject(project: Project): Promise<void> {
    if (this.projects.has(project.id)) {
      throw new ConflictError(`Project '${project.id}' already exists`);
    }
    this.projects.set(project.id, structuredClone(project));
  }

  async getProject(id: string): Promise<Project | null> {
    const project = this.projects.get(id);
    return project ? structuredClone(project) : null;
  }

  async listProjects(filter: { status?: ProjectStatus } = {}): Promise<Project[]> {
    return [...this.projects.values()]
      .filter((project) => !filter.status || project.status === filter.status)
      .sort((a, b) => a.id.localeCompare(b.id))
      .map((project) => structuredClone(project));
  }

  async updateProject(project: Project): Promise<void> {
    if (!this.projects.has(project.id)) return;
    this.projects.set(project.id, structuredClone(project));
  }

  async deleteProject(id: string): Promise<boolean> {
    if (!this.projects.delete(id)) return false;

    for (const [runId, run] of this.runs) {
      if (run.projectId === id) this.runs.delete(runId);
    }
    for (const [fetchId, result] of this.fetchResults) {
      if (result.projectId === id) this.fetchResults.delete(fetchId);
    }
    this.records.delete(id);
    return true;
  }

  // ─── Runs ──────────────────────────────────────────────────────────────────

  async createRun(run: ScrapeRun): Promise<void> {
    this.requireProject(run.projectId);
    this.runs.set(run.id, structuredClone(run));
  }

  async finishRun(run: ScrapeRun): Promise<void> {
    if (!this.runs.has(run.id)) return;
    this.runs.set(run.id, structuredClone(run));
  }

  async getRun(id: string): Promise<ScrapeRun | null> {
    const run = this.runs.get(id);
    return run ? structuredClone(run) : null;
  }

  async listRuns(projectId: string, limit = 20): Promise<ScrapeRun[]> {
    // Map iteration is insertion order; reverse it so equal start times list newest first
    return [...this.runs.values()]
      .filter((run) => run.projectId === projectId)
      .reverse()
      .sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime())
      .slice(0, clampLimit(limit, 20))
      .map((run) => structuredClone(run));
  }

  // ─── Fetch results ─────────────────────────────────────────────────────────

  async saveFetchResult(result: FetchResult): Promise<void> {
    this.requireProject(result.projectId);
    this.fetchResults.set(result.id, structuredClone(result));
  }

  async getFetchResult(id: string): Promise<FetchResult | null> {
    const result = this.fetchResults.get(id);
    return result ? structuredClone(result) : null;
  }

  // ─── Records ───────────────────────────────────────────────────────────────

  async saveRecords(records: ExtractedRecord[]): Promise<SaveRecordsResult> {
    const result: SaveRecordsResult = { inserted: 0, duplicates: 0 };
    for (const record of records) {
      this.requireProject(record.projectId);
    }

    for (const record of records) {
      let byKey = this.records.get(record.projectId);
      if (!byKey) {
        byKey = new Map();
        this.records.set(record.projectId, byKey);
      }

      const existing = byKey.get(record.dedupKey);
      if (existing) {
        if (record.lastSeenAt > existing.lastSeenAt) {
          existing.lastSeenAt = new Date(record.lastSeenAt);
        }
        result.duplicates++;
        continue;
      }

      byKey.set(record.dedupKey, structuredClone(record));
      result.inserted++;
    }

    return result;
  }

  async listRecords(projectId: string, query: RecordQuery = {}): Promise<RecordPage> {
    const q = query.q?.toLowerCase();
    const where = Object.entries(query.where ?? {}).map(
      ([field, value]) => [field, value.toLowerCase()] as const
    );

    const matching = this.sortedRecords(projectId).filter((record) => {
      if (q && !Object.values(record.fields).some((value) => value.toLowerCase().includes(q))) {
        return false;
      }
      return where.every(([field, value]) =>
        (record.fields[field] ?? '').toLowerCase().includes(value)
      );
    });

    const offset = clampOffset(query.offset);
    const limit = clampLimit(query.limit, 50);

    return {
      total: matching.length,
      records: matching.slice(offset, offset + limit).map((record) => structuredClone(record)),
    };
  }

  async allRecords(projectId: string): Promise<ExtractedRecord[]> {
    return this.sortedRecords(projectId).map((record) => structuredClone(record));
  }

  async getStats(): Promise<StoreStats> {
    let totalRecords = 0;
    for (const byKey of this.records.values()) {
      totalRecords += byKey.size;
    }

    let lastRunAt: Date | null = null;
    for (const run of this.runs.values()) {
      if (!lastRunAt || run.startedAt > lastRunAt) lastRunAt = run.startedAt;
    }

    const projects = [...this.projects.values()];
    return {
      totalProjects: projects.length,
      activeProjects: projects.filter((project) => project.status === 'active').length,
      totalRuns: this.runs.size,
      totalRecords,
      lastRunAt: lastRunAt ? new Date(lastRunAt) : null,
    };
  }

  // Stable sort: records first seen in the same millisecond keep insertion order
  private sortedRecords(projectId: string): ExtractedRecord[] {
    return [...(this.records.get(projectId)?.values() ?? [])].sort(
      (a, b) => a.firstSeenAt.getTime() - b.firstSeenAt.getTime()
    );
  }

  /** Rows of a removed project are rejected, as the PostgreSQL foreign keys do */
  private requireProject(projectId: string): void {
    if (!this.projects.has(projectId)) {
      throw new NotFoundError(`Project '${projectId}' not found`);
    }
  }
}
