/**
 * Result Store Module
 */

import { config } from '../config/index.js';
import { MemoryStore } from './memory-store.js';
import { PgStore } from './pg-store.js';
import type { ScrapeStore } from './types.js';

/**
 * PostgreSQL when DATABASE_URL is set, otherwise in memory
 */
export function createStore(databaseUrl: string | undefined = config.database.url): ScrapeStore {
  return databaseUrl ? new PgStore(databaseUrl) : new MemoryStore();
}

export { MemoryStore } from './memory-store.js';
export { PgStore } from './pg-store.js';
export {
  MAX_RECORD_LIMIT,
  type ScrapeStore,
  type RecordQuery,
  type RecordPage,
  type SaveRecordsResult,
  type StoreStats,
} from './types.js';
