/**
 * Navigation Rule Repository
 *
 * Data access layer for the navigation_rules table. Rows come back in
 * insertion order so that, among rules sharing an origin and a condition,
 * the first inserted one wins at resolution time.
 */

import { BaseRepository, type RepositoryContext } from './BaseRepository';
import type { NavigationRule, NavigationRuleRow, PersistedNavigationRule } from '../types';

export class NavigationRuleRepository extends BaseRepository<PersistedNavigationRule, NavigationRuleRow, number> {
  protected readonly tableName = 'navigation_rules';

  protected fromRow(row: NavigationRuleRow): PersistedNavigationRule {
    return {
      id: row.id,
      fromLocation: row.from_view_id,
      toLocation: row.to_view_id,
      condition: row.condition,
      createdAt: row.created_at,
    };
  }

  /**
   * All rules whose origin is `fromLocation`, oldest first.
   */
  async findRulesByFromLocation(
    fromLocation: string,
    ctx?: RepositoryContext
  ): Promise<PersistedNavigationRule[]> {
    const query = this.getQuery(ctx);
    const result = await query<NavigationRuleRow>(
      `SELECT id, from_view_id, to_view_id, condition, created_at FROM ${this.tableName} WHERE from_view_id = $1 ORDER BY id ASC`,
      [fromLocation]
    );
    return result.rows.map((row) => this.fromRow(row));
  }

  /**
   * Page through every rule (for administration).
   */
  async findAll(
    limit: number = 100,
    offset: number = 0,
    ctx?: RepositoryContext
  ): Promise<PersistedNavigationRule[]> {
    const query = this.getQuery(ctx);
    const result = await query<NavigationRuleRow>(
      `SELECT id, from_view_id, to_view_id, condition, created_at FROM ${this.tableName} ORDER BY id ASC LIMIT $1 OFFSET $2`,
      [limit, offset]
    );
    return result.rows.map((row) => this.fromRow(row));
  }

  /**
   * Count rules sharing an origin and a condition (duplicate detection).
   */
  async countMatching(
    fromLocation: string,
    condition: string,
    ctx?: RepositoryContext
  ): Promise<number> {
    return this.count('from_view_id = $1 AND condition = $2', [fromLocation, condition], ctx);
  }

  /**
   * Insert a rule. Returns the stored rule with its assigned id.
   */
  async create(rule: NavigationRule, ctx?: RepositoryContext): Promise<PersistedNavigationRule> {
    const query = this.getQuery(ctx);
    const result = await query<NavigationRuleRow>(
      `INSERT INTO ${this.tableName} (from_view_id, to_view_id, condition) VALUES ($1, $2, $3) RETURNING id, from_view_id, to_view_id, condition, created_at`,
      [rule.fromLocation, rule.toLocation, rule.condition]
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error(`INSERT into ${this.tableName} returned no row`);
    }
    return this.fromRow(row);
  }

  /**
   * Replace a rule's fields. Returns the updated rule or null if not found.
   */
  async update(
    id: number,
    rule: NavigationRule,
    ctx?: RepositoryContext
  ): Promise<PersistedNavigationRule | null> {
    const query = this.getQuery(ctx);
    const result = await query<NavigationRuleRow>(
      `UPDATE ${this.tableName} SET from_view_id = $1, to_view_id = $2, condition = $3 WHERE id = $4 RETURNING id, from_view_id, to_view_id, condition, created_at`,
      [rule.fromLocation, rule.toLocation, rule.condition, id]
    );
    const row = result.rows[0];
    return row ? this.fromRow(row) : null;
  }
}

export const navigationRuleRepository = new NavigationRuleRepository();
