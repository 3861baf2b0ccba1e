/**
 * Repository Layer
 *
 * All repositories accept an optional RepositoryContext for transaction support.
 *
 * Usage:
 *   import { navigationRuleRepository } from './repositories';
 *
 *   const rules = await navigationRuleRepository.findRulesByFromLocation('home');
 *
 *   await db.transaction(async (query) => {
 *     await navigationRuleRepository.deleteById(7, { query });
 *     await navigationRuleRepository.create(rule, { query });
 *   });
 */

export { BaseRepository, type RepositoryContext } from './BaseRepository';
export { NavigationRuleRepository, navigationRuleRepository } from './NavigationRuleRepository';
