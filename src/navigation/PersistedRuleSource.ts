/**
 * Persisted Rule Source
 *
 * Reads rules live from the rule store on every call. Each query is bounded
 * by a timeout and guarded by a circuit breaker; any failure surfaces as
 * SourceUnavailableError. Stored values are trimmed before matching.
 */

import { AppError } from '../lib/errors';
import { CircuitBreaker, type CircuitState } from '../lib/circuit-breaker';
import { withTimeout } from '../lib/timeout';
import { findBlankRuleFields } from '../lib/validators';
import { navigationLogger } from '../logger';
import type { NavigationRule } from '../types';
import type { RuleSource, RuleStore } from './RuleSource';

export interface PersistedRuleSourceOptions {
  name?: string;
  /** Upper bound for a single store query (default: 2000ms) */
  queryTimeoutMs?: number;
  /** Defaults to a breaker named after the source */
  breaker?: CircuitBreaker;
}

export class PersistedRuleSource implements RuleSource {
  readonly name: string;
  private readonly queryTimeoutMs: number;
  private readonly breaker: CircuitBreaker;

  constructor(
    private readonly store: RuleStore,
    options: PersistedRuleSourceOptions = {}
  ) {
    this.name = options.name ?? 'persisted';
    this.queryTimeoutMs = options.queryTimeoutMs ?? 2000;
    this.breaker = options.breaker ?? new CircuitBreaker(this.name);
  }

  async rulesFor(fromLocation: string): Promise<readonly NavigationRule[]> {
    let rows: readonly NavigationRule[];
    try {
      rows = await this.breaker.execute(() =>
        withTimeout(
          this.store.findRulesByFromLocation(fromLocation),
          this.queryTimeoutMs,
          `${this.name} rule query`
        )
      );
    } catch (error) {
      navigationLogger.warn({ err: error, source: this.name, fromLocation }, 'Rule source query failed');
      throw AppError.sourceUnavailable(this.name, error);
    }

    const rules: NavigationRule[] = [];
    for (const row of rows) {
      // Same normalisation as rules loaded from a file or created through the API
      const rule: NavigationRule = {
        fromLocation: row.fromLocation.trim(),
        toLocation: row.toLocation.trim(),
        condition: row.condition.trim(),
      };
      const blank = findBlankRuleFields(rule);
      if (blank.length > 0) {
        navigationLogger.warn(
          { source: this.name, fromLocation, fields: blank },
          'Skipping stored navigation rule with blank fields'
        );
        continue;
      }
      rules.push(rule);
    }
    return rules;
  }

  getCircuitState(): CircuitState {
    return this.breaker.getState();
  }
}
