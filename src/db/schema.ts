/**
 * PostgreSQL Database Schema
 */

export const SCHEMA = `
-- ═══════════════════════════════════════════════════════════════════════════════
-- Projects Table
-- Scrape project definitions
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS projects (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  targets JSONB NOT NULL,
  rules JSONB NOT NULL,
  schedule TEXT,
  status TEXT NOT NULL DEFAULT 'active' CHECK (status IN ('active', 'paused')),
  max_pages INTEGER NOT NULL,
  rate_limit_ms INTEGER NOT NULL,
  created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Scrape Runs Table
-- One row per fetch-parse-store cycle
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS scrape_runs (
  id TEXT PRIMARY KEY,
  project_id TEXT NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
  trigger TEXT NOT NULL CHECK (trigger IN ('manual', 'schedule', 'cli')),
  status TEXT NOT NULL CHECK (status IN ('running', 'succeeded', 'failed')),
  started_at TIMESTAMPTZ NOT NULL,
  finished_at TIMESTAMPTZ,
  pages_processed INTEGER NOT NULL DEFAULT 0,
  records_found INTEGER NOT NULL DEFAULT 0,
  records_new INTEGER NOT NULL DEFAULT 0,
  records_duplicate INTEGER NOT NULL DEFAULT 0,
  items_skipped INTEGER NOT NULL DEFAULT 0,
  errors INTEGER NOT NULL DEFAULT 0,
  error_message TEXT
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Fetch Results Table
-- Rendered pages, listing and detail
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS fetch_results (
  id TEXT PRIMARY KEY,
  project_id TEXT NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
  run_id TEXT NOT NULL REFERENCES scrape_runs(id) ON DELETE CASCADE,
  kind TEXT NOT NULL CHECK (kind IN ('listing', 'detail')),
  url TEXT NOT NULL,
  http_status INTEGER,
  payload TEXT NOT NULL,
  fetched_at TIMESTAMPTZ NOT NULL
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Records Table
-- Extracted records, one per (project, dedup key)
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE TABLE IF NOT EXISTS records (
  id TEXT PRIMARY KEY,
  seq BIGSERIAL,
  project_id TEXT NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
  run_id TEXT NOT NULL,
  fetch_result_id TEXT NOT NULL REFERENCES fetch_results(id),
  dedup_key TEXT NOT NULL,
  fields JSONB NOT NULL,
  detail_url TEXT,
  first_seen_at TIMESTAMPTZ NOT NULL,
  last_seen_at TIMESTAMPTZ NOT NULL,
  UNIQUE (project_id, dedup_key)
);

-- ═══════════════════════════════════════════════════════════════════════════════
-- Indexes for Performance
-- ═══════════════════════════════════════════════════════════════════════════════
CREATE INDEX IF NOT EXISTS idx_scrape_runs_project ON scrape_runs(project_id, started_at DESC);
CREATE INDEX IF NOT EXISTS idx_fetch_results_run ON fetch_results(run_id);
CREATE INDEX IF NOT EXISTS idx_records_project_seen ON records(project_id, first_seen_at, seq);
`;
