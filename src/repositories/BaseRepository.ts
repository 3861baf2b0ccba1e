/**
 * Base Repository Pattern
 *
 * Standard interface for data access, decoupling services from direct
 * database queries. Supports transaction injection via QueryFn.
 */

import { db, type QueryFn } from '../db';

/**
 * Context for repository operations.
 * Pass a transaction-scoped query function to run within a transaction.
 */
export interface RepositoryContext {
  query?: QueryFn;
}

/**
 * Abstract base repository with common operations.
 * Subclasses define the table name and implement domain-specific queries.
 */
export abstract class BaseRepository<T, Row, ID = string> {
  protected abstract readonly tableName: string;

  /**
   * Get the query function — uses transaction query if provided, otherwise default db.query.
   */
  protected getQuery(ctx?: RepositoryContext): QueryFn {
    return ctx?.query ?? db.query;
  }

  /**
   * Map a table row to the domain model.
   */
  protected abstract fromRow(row: Row): T;

  /**
   * Find a single record by primary key.
   */
  async findById(id: ID, ctx?: RepositoryContext): Promise<T | null> {
    const query = this.getQuery(ctx);
    const result = await query<Row>(
      `SELECT * FROM ${this.tableName} WHERE id = $1`,
      [id]
    );
    const row = result.rows[0];
    return row ? this.fromRow(row) : null;
  }

  /**
   * Delete a record by primary key. Returns true if a row was deleted.
   */
  async deleteById(id: ID, ctx?: RepositoryContext): Promise<boolean> {
    const query = this.getQuery(ctx);
    const result = await query(
      `DELETE FROM ${this.tableName} WHERE id = $1`,
      [id]
    );
    return result.rowCount > 0;
  }

  /**
   * Count all records in the table, optionally with a WHERE clause.
   */
  async count(
    where?: string,
    params?: unknown[],
    ctx?: RepositoryContext
  ): Promise<number> {
    const query = this.getQuery(ctx);
    const sql = where
      ? `SELECT COUNT(*)::int as count FROM ${this.tableName} WHERE ${where}`
      : `SELECT COUNT(*)::int as count FROM ${this.tableName}`;
    const result = await query<{ count: number }>(sql, params);
    return result.rows[0]?.count ?? 0;
  }
}
