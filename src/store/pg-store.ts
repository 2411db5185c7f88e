/**
 * PostgreSQL Result Store
 */

import type pg from 'pg';
import { createPool, initSchema, withTransaction } from '../db/index.js';
import { ConflictError, NotFoundError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type {
  ExtractedRecord,
  FetchKind,
  FetchResult,
  Project,
  ProjectStatus,
  RecordFields,
  RunStatus,
  RunTrigger,
  ScrapeRun,
  ExtractionRules,
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

const UNIQUE_VIOLATION = '23505';
const FOREIGN_KEY_VIOLATION = '23503';

export class PgStore implements ScrapeStore {
  readonly kind = 'postgres' as const;

  private pool: pg.Pool | null = null;

  constructor(private readonly connectionString: string) {}

  async init(): Promise<void> {
    if (this.pool) {
      logger.debug('Database pool already initialized');
      return;
    }
    const pool = await createPool(this.connectionString);
    await initSchema(pool);
    this.pool = pool;
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      logger.info('Database connection pool closed');
    }
  }

  private db(): pg.Pool {
    if (!this.pool) {
      throw new Error('Database not initialized. Call init() first.');
    }
    return this.pool;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Project Operations
  // ═══════════════════════════════════════════════════════════════════════════

  async insertProject(project: Project): Promise<void> {
    try {
      await this.db().query(
        `INSERT INTO projects (
           id, name, targets, rules, schedule, status, max_pages, rate_limit_ms, created_at, updated_at
         ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
        [
          project.id,
          project.name,
          JSON.stringify(project.targets),
          JSON.stringify(project.rules),
          project.schedule,
          project.status,
          project.maxPages,
          project.rateLimitMs,
          project.createdAt,
          project.updatedAt,
        ]
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`Project '${project.id}' already exists`);
      }
      throw error;
    }
  }

  async getProject(id: string): Promise<Project | null> {
    const result = await this.db().query<ProjectRow>('SELECT * FROM projects WHERE id = $1', [id]);
    const row = result.rows[0];
    return row ? mapProjectRow(row) : null;
  }

  async listProjects(filter: { status?: ProjectStatus } = {}): Promise<Project[]> {
    const result = filter.status
      ? await this.db().query<ProjectRow>('SELECT * FROM projects WHERE status = $1 ORDER BY id', [
          filter.status,
        ])
      : await this.db().query<ProjectRow>('SELECT * FROM projects ORDER BY id');
    return result.rows.map(mapProjectRow);
  }

  async updateProject(project: Project): Promise<void> {
    await this.db().query(
      `UPDATE projects SET
         name = $2, targets = $3, rules = $4, schedule = $5, status = $6,
         max_pages = $7, rate_limit_ms = $8, updated_at = $9
       WHERE id = $1`,
      [
        project.id,
        project.name,
        JSON.stringify(project.targets),
        JSON.stringify(project.rules),
        project.schedule,
        project.status,
        project.maxPages,
        project.rateLimitMs,
        project.updatedAt,
      ]
    );
  }

  async deleteProject(id: string): Promise<boolean> {
    return withTransaction(this.db(), async (client) => {
      // records reference fetch_results without a cascade, so clear them first
      await client.query('DELETE FROM records WHERE project_id = $1', [id]);
      const result = await client.query('DELETE FROM projects WHERE id = $1', [id]);
      return (result.rowCount ?? 0) > 0;
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Run Operations
  // ═══════════════════════════════════════════════════════════════════════════

  async createRun(run: ScrapeRun): Promise<void> {
    await withProject(run.projectId, () =>
      this.db().query(
        `INSERT INTO scrape_runs (id, project_id, trigger, status, started_at)
         VALUES ($1, $2, $3, $4, $5)`,
        [run.id, run.projectId, run.trigger, run.status, run.startedAt]
      )
    );
  }

  async finishRun(run: ScrapeRun): Promise<void> {
    await this.db().query(
      `UPDATE scrape_runs SET
         status = $2, finished_at = $3, pages_processed = $4, records_found = $5,
         records_new = $6, records_duplicate = $7, items_skipped = $8, errors = $9,
         error_message = $10
       WHERE id = $1`,
      [
        run.id,
        run.status,
        run.finishedAt,
        run.pagesProcessed,
        run.recordsFound,
        run.recordsNew,
        run.recordsDuplicate,
        run.itemsSkipped,
        run.errors,
        run.errorMessage,
      ]
    );
  }

  async getRun(id: string): Promise<ScrapeRun | null> {
    const result = await this.db().query<RunRow>('SELECT * FROM scrape_runs WHERE id = $1', [id]);
    const row = result.rows[0];
    return row ? mapRunRow(row) : null;
  }

  async listRuns(projectId: string, limit = 20): Promise<ScrapeRun[]> {
    const result = await this.db().query<RunRow>(
      `SELECT * FROM scrape_runs WHERE project_id = $1
       ORDER BY started_at DESC, id DESC
       LIMIT $2`,
      [projectId, clampLimit(limit, 20)]
    );
    return result.rows.map(mapRunRow);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Fetch Result Operations
  // ═══════════════════════════════════════════════════════════════════════════

  async saveFetchResult(fetchResult: FetchResult): Promise<void> {
    await withProject(fetchResult.projectId, () =>
      this.db().query(
        `INSERT INTO fetch_results (id, project_id, run_id, kind, url, http_status, payload, fetched_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
        [
          fetchResult.id,
          fetchResult.projectId,
          fetchResult.runId,
          fetchResult.kind,
          fetchResult.url,
          fetchResult.status,
          fetchResult.payload,
          fetchResult.fetchedAt,
        ]
      )
    );
  }

  async getFetchResult(id: string): Promise<FetchResult | null> {
    const result = await this.db().query<FetchResultRow>('SELECT * FROM fetch_results WHERE id = $1', [
      id,
    ]);
    const row = result.rows[0];
    return row ? mapFetchResultRow(row) : null;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Record Operations
  // ═══════════════════════════════════════════════════════════════════════════

  async saveRecords(records: ExtractedRecord[]): Promise<SaveRecordsResult> {
    const [first] = records;
    if (!first) {
      return { inserted: 0, duplicates: 0 };
    }

    return withProject(first.projectId, () => this.upsertRecords(records));
  }

  private async upsertRecords(records: ExtractedRecord[]): Promise<SaveRecordsResult> {
    return withTransaction(this.db(), async (client) => {
      const result: SaveRecordsResult = { inserted: 0, duplicates: 0 };

      for (const record of records) {
        // xmax is 0 only for a freshly inserted row
        const upsert = await client.query<{ inserted: boolean }>(
          `INSERT INTO records (
             id, project_id, run_id, fetch_result_id, dedup_key, fields, detail_url,
             first_seen_at, last_seen_at
           ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
           ON CONFLICT (project_id, dedup_key) DO UPDATE SET
             last_seen_at = GREATEST(records.last_seen_at, EXCLUDED.last_seen_at)
           RETURNING (xmax = 0) AS inserted`,
          [
            record.id,
            record.projectId,
            record.runId,
            record.fetchResultId,
            record.dedupKey,
            JSON.stringify(record.fields),
            record.detailUrl,
            record.firstSeenAt,
            record.lastSeenAt,
          ]
        );

        if (upsert.rows[0]?.inserted) {
          result.inserted++;
        } else {
          result.duplicates++;
        }
      }

      return result;
    });
  }

  async listRecords(projectId: string, query: RecordQuery = {}): Promise<RecordPage> {
    const params: unknown[] = [];
    const pushParam = (value: unknown): string => {
      params.push(value);
      return `$${params.length}`;
    };

    const filters = [`project_id = ${pushParam(projectId)}`];

    if (query.q) {
      const ref = pushParam(`%${escapeLike(query.q)}%`);
      filters.push(`EXISTS (SELECT 1 FROM jsonb_each_text(fields) AS f(key, value) WHERE f.value ILIKE ${ref})`);
    }

    for (const [field, value] of Object.entries(query.where ?? {})) {
      filters.push(
        `COALESCE(fields->>${pushParam(field)}, '') ILIKE ${pushParam(`%${escapeLike(value)}%`)}`
      );
    }

    const where = `WHERE ${filters.join(' AND ')}`;
    const countResult = await this.db().query<{ count: string }>(
      `SELECT COUNT(*) AS count FROM records ${where}`,
      params
    );

    const limitRef = pushParam(clampLimit(query.limit, 50));
    const offsetRef = pushParam(clampOffset(query.offset));
    const result = await this.db().query<RecordRow>(
      `SELECT * FROM records ${where}
       ORDER BY first_seen_at, seq
       LIMIT ${limitRef} OFFSET ${offsetRef}`,
      params
    );

    return {
      total: Number(countResult.rows[0]?.count ?? 0),
      records: result.rows.map(mapRecordRow),
    };
  }

  async allRecords(projectId: string): Promise<ExtractedRecord[]> {
    const result = await this.db().query<RecordRow>(
      'SELECT * FROM records WHERE project_id = $1 ORDER BY first_seen_at, seq',
      [projectId]
    );
    return result.rows.map(mapRecordRow);
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Statistics
  // ═══════════════════════════════════════════════════════════════════════════

  async getStats(): Promise<StoreStats> {
    const result = await this.db().query<{
      total_projects: string;
      active_projects: string;
      total_runs: string;
      total_records: string;
      last_run_at: Date | null;
    }>(`
      SELECT
        (SELECT COUNT(*) FROM projects) AS total_projects,
        (SELECT COUNT(*) FROM projects WHERE status = 'active') AS active_projects,
        (SELECT COUNT(*) FROM scrape_runs) AS total_runs,
        (SELECT COUNT(*) FROM records) AS total_records,
        (SELECT MAX(started_at) FROM scrape_runs) AS last_run_at
    `);
    const row = result.rows[0];

    return {
      totalProjects: Number(row?.total_projects ?? 0),
      activeProjects: Number(row?.active_projects ?? 0),
      totalRuns: Number(row?.total_runs ?? 0),
      totalRecords: Number(row?.total_records ?? 0),
      lastRunAt: row?.last_run_at ?? null,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Helper Functions
// ═══════════════════════════════════════════════════════════════════════════════

function hasCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

function isUniqueViolation(error: unknown): boolean {
  return hasCode(error, UNIQUE_VIOLATION);
}

/**
 * Run a write whose rows reference a project; a removed project surfaces as
 * NotFoundError instead of a foreign key violation
 */
async function withProject<T>(projectId: string, write: () => Promise<T>): Promise<T> {
  try {
    return await write();
  } catch (error) {
    if (hasCode(error, FOREIGN_KEY_VIOLATION)) {
      throw new NotFoundError(`Project '${projectId}' not found`);
    }
    throw error;
  }
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, '\\$&');
}

// Row types for database results (JSONB columns arrive parsed, TIMESTAMPTZ as Date)
interface ProjectRow {
  id: string;
  name: string;
  targets: string[];
  rules: ExtractionRules;
  schedule: string | null;
  status: ProjectStatus;
  max_pages: number;
  rate_limit_ms: number;
  created_at: Date;
  updated_at: Date;
}

interface RunRow {
  id: string;
  project_id: string;
  trigger: RunTrigger;
  status: RunStatus;
  started_at: Date;
  finished_at: Date | null;
  pages_processed: number;
  records_found: number;
  records_new: number;
  records_duplicate: number;
  items_skipped: number;
  errors: number;
  error_message: string | null;
}

interface FetchResultRow {
  id: string;
  project_id: string;
  run_id: string;
  kind: FetchKind;
  url: string;
  http_status: number | null;
  payload: string;
  fetched_at: Date;
}

interface RecordRow {
  id: string;
  project_id: string;
  run_id: string;
  fetch_result_id: string;
  dedup_key: string;
  fields: RecordFields;
  detail_url: string | null;
  first_seen_at: Date;
  last_seen_at: Date;
}

// Mappers
function mapProjectRow(row: ProjectRow): Project {
  return {
    id: row.id,
    name: row.name,
    targets: row.targets,
    rules: row.rules,
    schedule: row.schedule,
    status: row.status,
    maxPages: row.max_pages,
    rateLimitMs: row.rate_limit_ms,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function mapRunRow(row: RunRow): ScrapeRun {
  return {
    id: row.id,
    projectId: row.project_id,
    trigger: row.trigger,
    status: row.status,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    pagesProcessed: row.pages_processed,
    recordsFound: row.records_found,
    recordsNew: row.records_new,
    recordsDuplicate: row.records_duplicate,
    itemsSkipped: row.items_skipped,
    errors: row.errors,
    errorMessage: row.error_message,
  };
}

function mapFetchResultRow(row: FetchResultRow): FetchResult {
  return {
    id: row.id,
    projectId: row.project_id,
    runId: row.run_id,
    kind: row.kind,
    url: row.url,
    status: row.http_status,
    payload: row.payload,
    fetchedAt: row.fetched_at,
  };
}

function mapRecordRow(row: RecordRow): ExtractedRecord {
  return {
    id: row.id,
    projectId: row.project_id,
    runId: row.run_id,
    fetchResultId: row.fetch_result_id,
    dedupKey: row.dedup_key,
    fields: row.fields,
    detailUrl: row.detail_url,
    firstSeenAt: row.first_seen_at,
    lastSeenAt: row.last_seen_at,
  };
}
