export type { RuleSource, RuleStore } from './RuleSource';
export { StaticRuleSource } from './StaticRuleSource';
export { PersistedRuleSource, type PersistedRuleSourceOptions } from './PersistedRuleSource';
export { NavigationResolver, type NavigationResolverOptions } from './NavigationResolver';
export {
  createNavigationRuntime,
  parseSourceOrder,
  type NavigationRuntime,
  type NavigationSettings,
  type ResolverDependencies,
} from './createResolver';
