/**
 * NavigationRuleService
 *
 * Administrative lifecycle of persisted navigation rules. The resolver only
 * ever reads rules; every write goes through here.
 *
 * Rules:
 * - fromLocation, toLocation and condition are trimmed and must be non-empty
 * - several rules may share (fromLocation, condition); the oldest one wins at
 *   resolution time, so a duplicate is accepted but logged
 */

import { InvalidRuleError } from '../lib/errors';
import { navigationRulePatchSchema, parseNavigationRule } from '../lib/validators';
import { navigationLogger } from '../logger';
import { navigationRuleRepository } from '../repositories';
import { ErrorCodes, type NavigationRule, type PersistedNavigationRule, type ServiceResult } from '../types';

const log = navigationLogger.child({ component: 'NavigationRuleService' });

function invalidInput(error: InvalidRuleError): ServiceResult<never> {
  return {
    success: false,
    error: { code: ErrorCodes.INVALID_INPUT, message: error.message, details: { fields: error.fields } },
  };
}

function databaseError(operation: string, error: unknown): ServiceResult<never> {
  log.error({ err: error, operation }, 'Navigation rule store operation failed');
  return {
    success: false,
    error: {
      code: ErrorCodes.DATABASE_ERROR,
      message: error instanceof Error ? error.message : `Failed to ${operation}`,
    },
  };
}

function notFound(id: number): ServiceResult<never> {
  return { success: false, error: { code: ErrorCodes.NOT_FOUND, message: `Navigation rule ${id} not found` } };
}

export const NavigationRuleService = {
  createRule: async (input: unknown): Promise<ServiceResult<PersistedNavigationRule>> => {
    let rule: NavigationRule;
    try {
      rule = parseNavigationRule(input);
    } catch (error) {
      if (error instanceof InvalidRuleError) return invalidInput(error);
      throw error;
    }

    try {
      const duplicates = await navigationRuleRepository.countMatching(rule.fromLocation, rule.condition);
      if (duplicates > 0) {
        log.warn(
          { fromLocation: rule.fromLocation, condition: rule.condition, existing: duplicates },
          'Rule shadowed by an older rule with the same origin and condition'
        );
      }

      const created = await navigationRuleRepository.create(rule);
      log.info({ id: created.id, fromLocation: created.fromLocation, condition: created.condition }, 'Navigation rule created');
      return { success: true, data: created };
    } catch (error) {
      return databaseError('create navigation rule', error);
    }
  },

  updateRule: async (id: number, patch: unknown): Promise<ServiceResult<PersistedNavigationRule>> => {
    const parsedPatch = navigationRulePatchSchema.safeParse(patch);
    if (!parsedPatch.success) {
      return {
        success: false,
        error: { code: ErrorCodes.INVALID_INPUT, message: 'Navigation rule patch is invalid' },
      };
    }

    try {
      const existing = await navigationRuleRepository.findById(id);
      if (!existing) return notFound(id);

      let merged: NavigationRule;
      try {
        merged = parseNavigationRule({
          fromLocation: parsedPatch.data.fromLocation ?? existing.fromLocation,
          toLocation: parsedPatch.data.toLocation ?? existing.toLocation,
          condition: parsedPatch.data.condition ?? existing.condition,
        });
      } catch (error) {
        if (error instanceof InvalidRuleError) return invalidInput(error);
        throw error;
      }

      const updated = await navigationRuleRepository.update(id, merged);
      if (!updated) return notFound(id);

      log.info({ id }, 'Navigation rule updated');
      return { success: true, data: updated };
    } catch (error) {
      return databaseError('update navigation rule', error);
    }
  },

  deleteRule: async (id: number): Promise<ServiceResult<{ id: number }>> => {
    try {
      const deleted = await navigationRuleRepository.deleteById(id);
      if (!deleted) return notFound(id);

      log.info({ id }, 'Navigation rule deleted');
      return { success: true, data: { id } };
    } catch (error) {
      return databaseError('delete navigation rule', error);
    }
  },

  getRule: async (id: number): Promise<ServiceResult<PersistedNavigationRule>> => {
    try {
      const rule = await navigationRuleRepository.findById(id);
      return rule ? { success: true, data: rule } : notFound(id);
    } catch (error) {
      return databaseError('load navigation rule', error);
    }
  },

  listRules: async (
    page: { limit: number; offset: number } = { limit: 100, offset: 0 }
  ): Promise<ServiceResult<{ rules: PersistedNavigationRule[]; total: number }>> => {
    try {
      const [rules, total] = await Promise.all([
        navigationRuleRepository.findAll(page.limit, page.offset),
        navigationRuleRepository.count(),
      ]);
      return { success: true, data: { rules, total } };
    } catch (error) {
      return databaseError('list navigation rules', error);
    }
  },
};
