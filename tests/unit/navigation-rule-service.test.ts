/**
 * NavigationRuleService Unit Tests
 *
 * Runs the real repository against a mocked database client.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../src/db', () => ({
  db: {
    query: vi.fn(),
    transaction: vi.fn(),
  },
}));

import { db } from '../../src/db';
import { NavigationRuleService } from '../../src/services/NavigationRuleService';
import type { NavigationRuleRow } from '../../src/types';

const createdAt = new Date('2026-02-01T08:30:00.000Z');

function row(id: number, from: string, to: string, condition: string): NavigationRuleRow {
  return { id, from_view_id: from, to_view_id: to, condition, created_at: createdAt };
}

describe('NavigationRuleService', () => {
  const query = vi.mocked(db.query);

  beforeEach(() => {
    query.mockReset();
  });

  describe('createRule', () => {
    it('stores a trimmed rule', async () => {
      query
        .mockResolvedValueOnce({ rows: [{ count: 0 }], rowCount: 1 })
        .mockResolvedValueOnce({ rows: [row(1, 'home', 'admin', 'goAdmin')], rowCount: 1 });

      const result = await NavigationRuleService.createRule({
        fromLocation: ' home ',
        toLocation: 'admin',
        condition: 'goAdmin ',
      });

      expect(result).toEqual({
        success: true,
        data: { id: 1, fromLocation: 'home', toLocation: 'admin', condition: 'goAdmin', createdAt },
      });
      expect(query.mock.calls[1]?.[1]).toEqual(['home', 'admin', 'goAdmin']);
    });

    it('accepts a rule shadowed by an older one', async () => {
      query
        .mockResolvedValueOnce({ rows: [{ count: 1 }], rowCount: 1 })
        .mockResolvedValueOnce({ rows: [row(2, 'home', 'guest', 'goAdmin')], rowCount: 1 });

      const result = await NavigationRuleService.createRule({
        fromLocation: 'home',
        toLocation: 'guest',
        condition: 'goAdmin',
      });

      expect(result.success).toBe(true);
    });

    it('rejects a blank condition without touching the database', async () => {
      const result = await NavigationRuleService.createRule({ fromLocation: 'home', toLocation: 'admin', condition: '' });

      expect(result).toEqual({
        success: false,
        error: {
          code: 'INVALID_INPUT',
          message: 'Navigation rule is invalid: invalid condition',
          details: { fields: ['condition'] },
        },
      });
      expect(query).not.toHaveBeenCalled();
    });

    it('reports database failures', async () => {
      query.mockRejectedValueOnce(new Error('connection terminated'));

      const result = await NavigationRuleService.createRule({
        fromLocation: 'home',
        toLocation: 'admin',
        condition: 'goAdmin',
      });

      expect(result).toEqual({
        success: false,
        error: { code: 'DATABASE_ERROR', message: 'connection terminated' },
      });
    });
  });

  describe('updateRule', () => {
    it('merges the patch over the stored rule', async () => {
      query
        .mockResolvedValueOnce({ rows: [row(3, 'home', 'admin', 'goAdmin')], rowCount: 1 })
        .mockResolvedValueOnce({ rows: [row(3, 'home', 'console', 'goAdmin')], rowCount: 1 });

      const result = await NavigationRuleService.updateRule(3, { toLocation: 'console' });

      expect(result.success).toBe(true);
      expect(query.mock.calls[1]?.[1]).toEqual(['home', 'console', 'goAdmin', 3]);
    });

    it('returns NOT_FOUND for an unknown id', async () => {
      query.mockResolvedValueOnce({ rows: [], rowCount: 0 });

      await expect(NavigationRuleService.updateRule(99, { condition: 'x' })).resolves.toEqual({
        success: false,
        error: { code: 'NOT_FOUND', message: 'Navigation rule 99 not found' },
      });
    });

    it('rejects a patch that blanks a field', async () => {
      const result = await NavigationRuleService.updateRule(3, { toLocation: '  ' });

      expect(result).toMatchObject({ success: false, error: { code: 'INVALID_INPUT' } });
      expect(query).not.toHaveBeenCalled();
    });

    it('rejects a patch that is not an object', async () => {
      await expect(NavigationRuleService.updateRule(3, 'admin')).resolves.toEqual({
        success: false,
        error: { code: 'INVALID_INPUT', message: 'Navigation rule patch is invalid' },
      });
    });
  });

  describe('deleteRule', () => {
    it('deletes an existing rule', async () => {
      query.mockResolvedValueOnce({ rows: [], rowCount: 1 });
      await expect(NavigationRuleService.deleteRule(3)).resolves.toEqual({ success: true, data: { id: 3 } });
    });

    it('returns NOT_FOUND when nothing was deleted', async () => {
      query.mockResolvedValueOnce({ rows: [], rowCount: 0 });
      await expect(NavigationRuleService.deleteRule(3)).resolves.toMatchObject({
        success: false,
        error: { code: 'NOT_FOUND' },
      });
    });
  });

  describe('getRule', () => {
    it('returns a stored rule', async () => {
      query.mockResolvedValueOnce({ rows: [row(5, 'login', 'dashboard', 'success')], rowCount: 1 });
      await expect(NavigationRuleService.getRule(5)).resolves.toEqual({
        success: true,
        data: { id: 5, fromLocation: 'login', toLocation: 'dashboard', condition: 'success', createdAt },
      });
    });
  });

  describe('listRules', () => {
    it('returns a page of rules with the total', async () => {
      query
        .mockResolvedValueOnce({ rows: [row(1, 'login', 'dashboard', 'success')], rowCount: 1 })
        .mockResolvedValueOnce({ rows: [{ count: 12 }], rowCount: 1 });

      const result = await NavigationRuleService.listRules({ limit: 1, offset: 0 });

      expect(result).toEqual({
        success: true,
        data: {
          rules: [{ id: 1, fromLocation: 'login', toLocation: 'dashboard', condition: 'success', createdAt }],
          total: 12,
        },
      });
    });
  });
});
