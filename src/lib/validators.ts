import { z } from 'zod';
import { AppError, type RuleField } from './errors';
import type { NavigationRule } from '../types';

const location = z.string().trim().min(1).max(255);
const condition = z.string().trim().min(1).max(255);

export const navigationRuleSchema = z.object({
  fromLocation: location,
  toLocation: location,
  condition,
});

export const navigationRulePatchSchema = navigationRuleSchema.partial();

export const resolutionRequestSchema = z.object({
  fromLocation: z.string().min(1).max(255),
  actionToken: z.string().max(255).optional(),
  outcome: z.string().min(1).max(255),
});

export const staticRulesFileSchema = z.object({
  rules: z.array(z.unknown()),
});

export const paginationSchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(100),
  offset: z.coerce.number().int().min(0).default(0),
});

export const ruleIdSchema = z.number().int().positive();

const RULE_FIELDS: readonly RuleField[] = ['fromLocation', 'toLocation', 'condition'];

function isRuleField(value: unknown): value is RuleField {
  return typeof value === 'string' && (RULE_FIELDS as readonly string[]).includes(value);
}

/**
 * Fields of an already-typed rule that are blank. A rule with any blank field
 * can never be matched.
 */
export function findBlankRuleFields(rule: NavigationRule): RuleField[] {
  return RULE_FIELDS.filter((field) => typeof rule[field] !== 'string' || rule[field].trim().length === 0);
}

/**
 * Validate an unknown value as a navigation rule. Surrounding whitespace is
 * trimmed. Throws InvalidRuleError naming the offending fields.
 */
export function parseNavigationRule(input: unknown, label: string = 'Navigation rule'): NavigationRule {
  const parsed = navigationRuleSchema.safeParse(input);
  if (parsed.success) {
    return parsed.data;
  }

  const fields = [...new Set(parsed.error.issues.map((issue) => issue.path[0]).filter(isRuleField))];
  const detail = fields.length > 0 ? `invalid ${fields.join(', ')}` : 'not an object';
  throw AppError.invalidRule(`${label} is invalid: ${detail}`, fields);
}
