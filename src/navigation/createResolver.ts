/**
 * Composition root for the resolver chain.
 *
 * Builds one rule source per entry of `navigation.sourceOrder` (highest
 * priority first) and hands them to a NavigationResolver.
 */

import { config, isRuleSourceKind, type Config, type RuleSourceKind } from '../config';
import { AppError } from '../lib/errors';
import { CircuitBreaker } from '../lib/circuit-breaker';
import { navigationRuleRepository } from '../repositories';
import { navigationLogger } from '../logger';
import { NavigationResolver } from './NavigationResolver';
import { PersistedRuleSource } from './PersistedRuleSource';
import { StaticRuleSource } from './StaticRuleSource';
import type { RuleSource, RuleStore } from './RuleSource';

export type NavigationSettings = Config['navigation'];

export interface ResolverDependencies {
  /** Defaults to the navigation_rules repository */
  store?: RuleStore;
  /** Defaults to loading `settings.staticRulesPath` */
  staticSource?: StaticRuleSource;
}

export interface NavigationRuntime {
  resolver: NavigationResolver;
  persistedSource: PersistedRuleSource | null;
  staticSource: StaticRuleSource | null;
}

export function parseSourceOrder(order: readonly string[]): RuleSourceKind[] {
  if (order.length === 0) {
    throw AppError.validation('Navigation source order is empty');
  }

  const kinds: RuleSourceKind[] = [];
  for (const name of order) {
    if (!isRuleSourceKind(name)) {
      throw AppError.validation(`Unknown navigation rule source "${name}"`);
    }
    if (kinds.includes(name)) {
      throw AppError.validation(`Navigation rule source "${name}" listed more than once`);
    }
    kinds.push(name);
  }
  return kinds;
}

export async function createNavigationRuntime(
  settings: NavigationSettings = config.navigation,
  deps: ResolverDependencies = {}
): Promise<NavigationRuntime> {
  const order = parseSourceOrder(settings.sourceOrder);

  let persistedSource: PersistedRuleSource | null = null;
  let staticSource: StaticRuleSource | null = null;
  const sources: RuleSource[] = [];

  for (const kind of order) {
    if (kind === 'persisted') {
      persistedSource = new PersistedRuleSource(deps.store ?? navigationRuleRepository, {
        name: 'persisted',
        queryTimeoutMs: settings.queryTimeoutMs,
        breaker: new CircuitBreaker('navigation-store', {
          failureThreshold: settings.circuitBreaker.failureThreshold,
          resetTimeoutMs: settings.circuitBreaker.resetTimeoutMs,
          halfOpenMaxRequests: settings.circuitBreaker.halfOpenMaxRequests,
        }),
      });
      sources.push(persistedSource);
    } else {
      staticSource = deps.staticSource ?? (await StaticRuleSource.fromFile(settings.staticRulesPath));
      sources.push(staticSource);
    }
  }

  const resolver = new NavigationResolver(sources, {
    sourceFailurePolicy: settings.sourceFailurePolicy,
  });

  navigationLogger.info(
    { order: resolver.sourceNames, sourceFailurePolicy: settings.sourceFailurePolicy },
    'Navigation resolver ready'
  );

  return { resolver, persistedSource, staticSource };
}
