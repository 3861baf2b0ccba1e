/**
 * Static Rule Source
 *
 * Rules defined declaratively and loaded once at startup. The table is
 * validated as a whole on construction: one blank field anywhere rejects the
 * load with InvalidRuleError.
 *
 * File format:
 *   { "rules": [{ "fromLocation": "login", "toLocation": "dashboard", "condition": "success" }] }
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { AppError } from '../lib/errors';
import { parseNavigationRule, staticRulesFileSchema } from '../lib/validators';
import { navigationLogger } from '../logger';
import type { NavigationRule } from '../types';
import type { RuleSource } from './RuleSource';

export class StaticRuleSource implements RuleSource {
  readonly name: string;
  private readonly table: ReadonlyMap<string, readonly NavigationRule[]>;
  private readonly ruleCount: number;

  constructor(rules: readonly unknown[], name: string = 'static') {
    this.name = name;

    const table = new Map<string, NavigationRule[]>();
    rules.forEach((candidate, index) => {
      const rule = parseNavigationRule(candidate, `Static rule #${index}`);
      const bucket = table.get(rule.fromLocation);
      if (bucket) {
        bucket.push(rule);
      } else {
        table.set(rule.fromLocation, [rule]);
      }
    });

    this.table = table;
    this.ruleCount = rules.length;
  }

  /**
   * Load rules from a JSON file. Relative paths resolve against the working
   * directory.
   */
  static async fromFile(filePath: string, name: string = 'static'): Promise<StaticRuleSource> {
    const absolutePath = resolve(process.cwd(), filePath);

    let raw: string;
    try {
      raw = await readFile(absolutePath, 'utf-8');
    } catch (error) {
      throw AppError.invalidRule(
        `Static rules file ${absolutePath} could not be read: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      throw AppError.invalidRule(
        `Static rules file ${absolutePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const parsed = staticRulesFileSchema.safeParse(document);
    if (!parsed.success) {
      throw AppError.invalidRule(`Static rules file ${absolutePath} must contain a "rules" array`);
    }

    const source = new StaticRuleSource(parsed.data.rules, name);
    navigationLogger.info({ path: absolutePath, rules: source.size, source: name }, 'Static navigation rules loaded');
    return source;
  }

  get size(): number {
    return this.ruleCount;
  }

  async rulesFor(fromLocation: string): Promise<readonly NavigationRule[]> {
    return [...(this.table.get(fromLocation) ?? [])];
  }
}
