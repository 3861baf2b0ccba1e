/**
 * Navigation Resolver
 *
 * Decides the next location for (fromLocation, actionToken, outcome) by asking
 * each rule source in priority order and returning the first rule whose
 * condition equals the outcome exactly. Lower-priority sources are not
 * queried once a match is found.
 *
 * Results:
 * - { status: 'resolved', toLocation, source } — a rule matched
 * - { status: 'unresolved' } — every source answered, none matched; the
 *   caller applies its own default
 * - throws SourceUnavailableError — a source failed to answer
 *
 * The resolver holds no mutable state; concurrent resolutions need no
 * coordination.
 */

import { AppError, SourceUnavailableError } from '../lib/errors';
import { navigationLogger } from '../logger';
import type { SourceFailurePolicy } from '../config';
import { UNRESOLVED, type NavigationRule, type ResolutionRequest, type ResolutionResult } from '../types';
import type { RuleSource } from './RuleSource';

export interface NavigationResolverOptions {
  /**
   * 'propagate' (default): the first failing source aborts resolution.
   * 'skip': a failing source is logged and passed over so a lower source may
   * still match; without a match the first failure is raised.
   */
  sourceFailurePolicy?: SourceFailurePolicy;
}

function requireNonEmpty(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw AppError.validation(`${field} must be a non-empty string`);
  }
  return value;
}

function firstMatch(rules: readonly NavigationRule[], outcome: string): NavigationRule | undefined {
  return rules.find((rule) => rule.condition === outcome);
}

export class NavigationResolver {
  private readonly sources: readonly RuleSource[];
  private readonly sourceFailurePolicy: SourceFailurePolicy;

  constructor(sources: readonly RuleSource[], options: NavigationResolverOptions = {}) {
    if (sources.length === 0) {
      throw AppError.validation('NavigationResolver needs at least one rule source');
    }

    const names = new Set<string>();
    for (const source of sources) {
      if (names.has(source.name)) {
        throw AppError.validation(`Duplicate rule source name "${source.name}"`);
      }
      names.add(source.name);
    }

    this.sources = [...sources];
    this.sourceFailurePolicy = options.sourceFailurePolicy ?? 'propagate';
  }

  /** Source names, highest priority first. */
  get sourceNames(): string[] {
    return this.sources.map((source) => source.name);
  }

  async resolve(
    fromLocation: string,
    actionToken: string | undefined,
    outcome: string
  ): Promise<ResolutionResult> {
    return this.resolveRequest({ fromLocation, actionToken, outcome });
  }

  async resolveRequest(request: ResolutionRequest): Promise<ResolutionResult> {
    const fromLocation = requireNonEmpty(request.fromLocation, 'fromLocation');
    const outcome = requireNonEmpty(request.outcome, 'outcome');
    const log = navigationLogger.child({ fromLocation, outcome, actionToken: request.actionToken });

    const failures: SourceUnavailableError[] = [];

    for (const source of this.sources) {
      let rules: readonly NavigationRule[];
      try {
        rules = await source.rulesFor(fromLocation);
      } catch (error) {
        const failure =
          error instanceof SourceUnavailableError ? error : AppError.sourceUnavailable(source.name, error);

        if (this.sourceFailurePolicy === 'propagate') {
          log.error({ err: failure, source: source.name }, 'Navigation aborted: rule source unavailable');
          throw failure;
        }

        log.warn({ err: failure, source: source.name }, 'Rule source unavailable, trying next source');
        failures.push(failure);
        continue;
      }

      const match = firstMatch(rules, outcome);
      if (match) {
        log.debug({ source: source.name, toLocation: match.toLocation }, 'Navigation resolved');
        return { status: 'resolved', toLocation: match.toLocation, source: source.name };
      }
    }

    const [firstFailure] = failures;
    if (firstFailure) {
      log.error(
        { failed: failures.map((failure) => failure.sourceName) },
        'Navigation aborted: no match and a rule source was unavailable'
      );
      throw firstFailure;
    }

    log.debug('Navigation unresolved');
    return UNRESOLVED;
  }
}
