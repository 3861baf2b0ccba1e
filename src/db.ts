/**
 * Database Client
 *
 * Uses the Neon PostgreSQL serverless driver. The pool is created on first
 * use so that modules importing `db` can load without a DATABASE_URL (tests,
 * static-only deployments).
 */

import { Pool, neonConfig } from '@neondatabase/serverless';
import ws from 'ws';
import { config } from './config';
import { dbLogger } from './logger';
import { AppError } from './lib/errors';

// Enable WebSocket for Neon serverless
neonConfig.webSocketConstructor = ws;

// ============================================================================
// QUERY INTERFACE
// ============================================================================

export interface QueryResult<T = Record<string, unknown>> {
  rows: T[];
  rowCount: number;
}

export type QueryFn = <T = Record<string, unknown>>(
  sql: string,
  params?: unknown[]
) => Promise<QueryResult<T>>;

let pool: Pool | null = null;

function getPool(): Pool {
  if (pool) return pool;

  if (!config.database.url) {
    throw AppError.internal('DATABASE_URL environment variable is not set');
  }

  pool = new Pool({
    connectionString: config.database.url,
    max: config.database.maxConnections,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
  });

  dbLogger.info('Neon database pool initialized');
  return pool;
}

export const db = {
  /**
   * Execute a SQL query
   */
  query: async <T = Record<string, unknown>>(
    sql: string,
    params?: unknown[]
  ): Promise<QueryResult<T>> => {
    const result = await getPool().query(sql, params);
    return {
      rows: result.rows as T[],
      rowCount: result.rowCount ?? 0,
    };
  },

  /**
   * Execute queries within a transaction
   */
  transaction: async <T>(fn: (query: QueryFn) => Promise<T>): Promise<T> => {
    const client = await getPool().connect();
    try {
      await client.query('BEGIN');

      const txQuery: QueryFn = async <R = Record<string, unknown>>(
        sql: string,
        params?: unknown[]
      ): Promise<QueryResult<R>> => {
        const result = await client.query(sql, params);
        return {
          rows: result.rows as R[],
          rowCount: result.rowCount ?? 0,
        };
      };

      const result = await fn(txQuery);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        dbLogger.error(
          { originalError: error, rollbackError },
          'ROLLBACK failed - original error preserved'
        );
      }
      throw error;
    } finally {
      client.release();
    }
  },

  /**
   * Health check - verify database connection and schema version
   */
  healthCheck: async (): Promise<{
    connected: boolean;
    schemaVersion: string | null;
    latencyMs: number;
  }> => {
    const start = Date.now();
    try {
      const result = await db.query<{ version: string }>(
        'SELECT version FROM schema_versions ORDER BY applied_at DESC LIMIT 1'
      );
      return {
        connected: true,
        schemaVersion: result.rows[0]?.version ?? null,
        latencyMs: Date.now() - start,
      };
    } catch (error) {
      dbLogger.warn({ err: error }, 'Database health check failed');
      return {
        connected: false,
        schemaVersion: null,
        latencyMs: Date.now() - start,
      };
    }
  },

  isConfigured: (): boolean => Boolean(config.database.url),

  /**
   * Close all connections (for graceful shutdown)
   */
  close: async (): Promise<void> => {
    if (!pool) return;
    await pool.end();
    pool = null;
    dbLogger.info('Database pool closed');
  },
};
