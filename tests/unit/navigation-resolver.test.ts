/**
 * NavigationResolver Unit Tests
 *
 * First-match-wins over a priority-ordered chain of rule sources.
 */
import { describe, it, expect } from 'vitest';
import { NavigationResolver, PersistedRuleSource, StaticRuleSource } from '../../src/navigation';
import { SourceUnavailableError, ValidationError } from '../../src/lib/errors';
import {
  BrokenRuleSource,
  FailingRuleStore,
  FixedRuleSource,
  HangingRuleStore,
  InMemoryRuleStore,
  rule,
} from '../helpers/fakes';

describe('NavigationResolver.resolve', () => {
  it('returns the destination of the matching rule', async () => {
    const resolver = new NavigationResolver([
      new StaticRuleSource([rule('login', 'dashboard', 'success')]),
    ]);

    await expect(resolver.resolve('login', undefined, 'success')).resolves.toEqual({
      status: 'resolved',
      toLocation: 'dashboard',
      source: 'static',
    });
  });

  it('returns unresolved when no condition matches the outcome', async () => {
    const resolver = new NavigationResolver([
      new StaticRuleSource([rule('login', 'dashboard', 'success')]),
    ]);

    await expect(resolver.resolve('login', undefined, 'failure')).resolves.toEqual({ status: 'unresolved' });
  });

  it('returns unresolved for an origin with no rules', async () => {
    const resolver = new NavigationResolver([
      new StaticRuleSource([rule('login', 'dashboard', 'success')]),
    ]);

    await expect(resolver.resolve('settings', 'save', 'success')).resolves.toEqual({ status: 'unresolved' });
  });

  it('matches conditions case-sensitively and without wildcards', async () => {
    const resolver = new NavigationResolver([
      new StaticRuleSource([rule('login', 'dashboard', 'Success'), rule('login', 'anywhere', '*')]),
    ]);

    await expect(resolver.resolve('login', undefined, 'success')).resolves.toEqual({ status: 'unresolved' });
  });

  it('ignores the action token when matching', async () => {
    const resolver = new NavigationResolver([
      new StaticRuleSource([rule('login', 'dashboard', 'success')]),
    ]);

    const withToken = await resolver.resolve('login', '#{loginBean.submit}', 'success');
    const withoutToken = await resolver.resolve('login', undefined, 'success');
    expect(withToken).toEqual(withoutToken);
  });

  it('picks the first matching rule within a source', async () => {
    const resolver = new NavigationResolver([
      new StaticRuleSource([
        rule('cart', 'checkout', 'next'),
        rule('cart', 'payment', 'next'),
      ]),
    ]);

    await expect(resolver.resolve('cart', undefined, 'next')).resolves.toMatchObject({ toLocation: 'checkout' });
  });

  it('finds a rule from a lower-priority source when higher ones have no match', async () => {
    const persisted = new PersistedRuleSource(new InMemoryRuleStore([rule('home', 'admin', 'goAdmin')]));
    const statics = new StaticRuleSource([rule('home', 'profile', 'goProfile')]);
    const resolver = new NavigationResolver([persisted, statics]);

    await expect(resolver.resolve('home', undefined, 'goProfile')).resolves.toEqual({
      status: 'resolved',
      toLocation: 'profile',
      source: 'static',
    });
  });

  it('rejects an empty fromLocation', async () => {
    const resolver = new NavigationResolver([new StaticRuleSource([])]);
    await expect(resolver.resolve('', undefined, 'success')).rejects.toBeInstanceOf(ValidationError);
  });

  it('rejects an empty outcome', async () => {
    const resolver = new NavigationResolver([new StaticRuleSource([])]);
    await expect(resolver.resolve('login', undefined, '')).rejects.toThrow('outcome must be a non-empty string');
  });
});

describe('NavigationResolver priority', () => {
  const persistedRules = [rule('home', 'admin', 'goAdmin')];
  const staticRules = [rule('home', 'guest', 'goAdmin')];

  it('dynamic-first order takes the persisted rule', async () => {
    const resolver = new NavigationResolver([
      new PersistedRuleSource(new InMemoryRuleStore(persistedRules)),
      new StaticRuleSource(staticRules),
    ]);

    await expect(resolver.resolve('home', undefined, 'goAdmin')).resolves.toEqual({
      status: 'resolved',
      toLocation: 'admin',
      source: 'persisted',
    });
  });

  it('static-first order takes the static rule', async () => {
    const resolver = new NavigationResolver([
      new StaticRuleSource(staticRules),
      new PersistedRuleSource(new InMemoryRuleStore(persistedRules)),
    ]);

    await expect(resolver.resolve('home', undefined, 'goAdmin')).resolves.toEqual({
      status: 'resolved',
      toLocation: 'guest',
      source: 'static',
    });
  });

  it('does not query lower-priority sources after a match', async () => {
    const first = new FixedRuleSource('first', [rule('home', 'admin', 'goAdmin')]);
    const second = new FixedRuleSource('second', [rule('home', 'guest', 'goAdmin')]);
    const resolver = new NavigationResolver([first, second]);

    await resolver.resolve('home', undefined, 'goAdmin');

    expect(first.calls).toBe(1);
    expect(second.calls).toBe(0);
  });

  it('gives the same answer on repeated calls', async () => {
    const resolver = new NavigationResolver([
      new PersistedRuleSource(new InMemoryRuleStore(persistedRules)),
      new StaticRuleSource(staticRules),
    ]);

    const results = await Promise.all([
      resolver.resolve('home', undefined, 'goAdmin'),
      resolver.resolve('home', undefined, 'goAdmin'),
      resolver.resolve('home', undefined, 'goAdmin'),
    ]);

    expect(results.map((r) => (r.status === 'resolved' ? r.toLocation : null))).toEqual(['admin', 'admin', 'admin']);
  });
});

describe('NavigationResolver source failures', () => {
  it('raises SourceUnavailableError when the store times out', async () => {
    const resolver = new NavigationResolver([
      new PersistedRuleSource(new HangingRuleStore(), { queryTimeoutMs: 10 }),
      new StaticRuleSource([rule('login', 'dashboard', 'success')]),
    ]);

    const error = await resolver.resolve('login', undefined, 'success').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceUnavailableError);
    expect(error).toMatchObject({ sourceName: 'persisted', code: 'SOURCE_UNAVAILABLE' });
  });

  it('wraps errors from custom sources into SourceUnavailableError', async () => {
    const resolver = new NavigationResolver([new BrokenRuleSource('remote')]);

    await expect(resolver.resolve('login', undefined, 'success')).rejects.toMatchObject({
      name: 'SourceUnavailableError',
      sourceName: 'remote',
      message: 'Rule source "remote" is unavailable: store offline',
    });
  });

  it('propagates by default without consulting lower-priority sources', async () => {
    const broken = new BrokenRuleSource('remote');
    const fallback = new FixedRuleSource('fallback', [rule('login', 'dashboard', 'success')]);
    const resolver = new NavigationResolver([broken, fallback]);

    await expect(resolver.resolve('login', undefined, 'success')).rejects.toBeInstanceOf(SourceUnavailableError);
    expect(fallback.calls).toBe(0);
  });

  it('falls through to the next source under the skip policy', async () => {
    const resolver = new NavigationResolver(
      [new BrokenRuleSource('remote'), new FixedRuleSource('fallback', [rule('login', 'dashboard', 'success')])],
      { sourceFailurePolicy: 'skip' }
    );

    await expect(resolver.resolve('login', undefined, 'success')).resolves.toEqual({
      status: 'resolved',
      toLocation: 'dashboard',
      source: 'fallback',
    });
  });

  it('raises the failure under the skip policy when the healthy sources have no match', async () => {
    const resolver = new NavigationResolver(
      [
        new PersistedRuleSource(new FailingRuleStore()),
        new StaticRuleSource([rule('home', 'guest', 'other')]),
      ],
      { sourceFailurePolicy: 'skip' }
    );

    const error = await resolver.resolve('home', undefined, 'goAdmin').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceUnavailableError);
    expect(error).toMatchObject({
      sourceName: 'persisted',
      message: 'Rule source "persisted" is unavailable: connection refused',
    });
  });

  it('reports the first failed source when a later one also fails', async () => {
    const resolver = new NavigationResolver(
      [new FixedRuleSource('fallback', []), new BrokenRuleSource('remote'), new BrokenRuleSource('backup')],
      { sourceFailurePolicy: 'skip' }
    );

    await expect(resolver.resolve('login', undefined, 'success')).rejects.toMatchObject({ sourceName: 'remote' });
  });

  it('still fails under the skip policy when no source answered', async () => {
    const resolver = new NavigationResolver(
      [new BrokenRuleSource('a'), new BrokenRuleSource('b')],
      { sourceFailurePolicy: 'skip' }
    );

    await expect(resolver.resolve('login', undefined, 'success')).rejects.toMatchObject({ sourceName: 'a' });
  });
});

describe('NavigationResolver construction', () => {
  it('requires at least one source', () => {
    expect(() => new NavigationResolver([])).toThrow('NavigationResolver needs at least one rule source');
  });

  it('rejects duplicate source names', () => {
    expect(
      () => new NavigationResolver([new StaticRuleSource([]), new StaticRuleSource([])])
    ).toThrow('Duplicate rule source name "static"');
  });

  it('reports source names in priority order', () => {
    const resolver = new NavigationResolver([
      new StaticRuleSource([]),
      new PersistedRuleSource(new InMemoryRuleStore()),
    ]);
    expect(resolver.sourceNames).toEqual(['static', 'persisted']);
  });
});
