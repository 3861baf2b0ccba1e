import type { NavigationRule } from '../types';

/**
 * A provider of navigation rules queryable by origin location.
 *
 * `rulesFor` returns a fresh, finite array on every call, in the source's own
 * order (insertion order for both built-in sources). A source that cannot
 * answer rejects; it never reports a failure as an empty list.
 */
export interface RuleSource {
  readonly name: string;
  rulesFor(fromLocation: string): Promise<readonly NavigationRule[]>;
}

/**
 * The persistence collaborator behind a PersistedRuleSource.
 * NavigationRuleRepository satisfies it.
 */
export interface RuleStore {
  findRulesByFromLocation(fromLocation: string): Promise<readonly NavigationRule[]>;
}
