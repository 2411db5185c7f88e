/**
 * PostgreSQL Database Connection
 */

import pg from 'pg';
import type { PoolClient } from 'pg';
import { logger } from '../utils/logger.js';
import { SCHEMA } from './schema.js';

const { Pool } = pg;

/**
 * Create a connection pool and check that it can connect
 */
export async function createPool(connectionString: string): Promise<pg.Pool> {
  const pool = new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  pool.on('error', (error) => {
    logger.error({ error }, 'Idle database client error');
  });

  // Test connection
  try {
    const client = await pool.connect();
    logger.info('Database connection established');
    client.release();
  } catch (error) {
    logger.fatal({ error }, 'Failed to connect to database');
    await pool.end();
    throw error;
  }

  return pool;
}

/**
 * Initialize database schema
 */
export async function initSchema(pool: pg.Pool): Promise<void> {
  try {
    await pool.query(SCHEMA);
    logger.info('Database schema initialized');
  } catch (error) {
    logger.error({ error }, 'Failed to initialize schema');
    throw error;
  }
}

/**
 * Run `fn` inside a transaction on a dedicated client
 */
export async function withTransaction<T>(
  pool: pg.Pool,
  fn: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}
