import type { RuleSource, RuleStore } from '../../src/navigation';
import type { NavigationRule } from '../../src/types';

export function rule(fromLocation: string, toLocation: string, condition: string): NavigationRule {
  return { fromLocation, toLocation, condition };
}

/** In-memory rule store; counts queries per origin. */
export class InMemoryRuleStore implements RuleStore {
  readonly calls: string[] = [];

  constructor(private readonly rules: NavigationRule[] = []) {}

  async findRulesByFromLocation(fromLocation: string): Promise<NavigationRule[]> {
    this.calls.push(fromLocation);
    return this.rules.filter((r) => r.fromLocation === fromLocation);
  }
}

export class FailingRuleStore implements RuleStore {
  calls = 0;

  constructor(private readonly error: Error = new Error('connection refused')) {}

  async findRulesByFromLocation(): Promise<NavigationRule[]> {
    this.calls++;
    throw this.error;
  }
}

/** Never answers; only a timeout ends the query. */
export class HangingRuleStore implements RuleStore {
  findRulesByFromLocation(): Promise<NavigationRule[]> {
    return new Promise<NavigationRule[]>(() => undefined);
  }
}

export class FixedRuleSource implements RuleSource {
  calls = 0;

  constructor(
    readonly name: string,
    private readonly rules: NavigationRule[]
  ) {}

  async rulesFor(fromLocation: string): Promise<readonly NavigationRule[]> {
    this.calls++;
    return this.rules.filter((r) => r.fromLocation === fromLocation);
  }
}

export class BrokenRuleSource implements RuleSource {
  calls = 0;

  constructor(
    readonly name: string,
    private readonly error: Error = new Error('store offline')
  ) {}

  async rulesFor(): Promise<readonly NavigationRule[]> {
    this.calls++;
    throw this.error;
  }
}
