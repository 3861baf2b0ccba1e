/**
 * Navigation Rules Service Configuration
 *
 * Centralized configuration for the resolver, its rule sources and the HTTP
 * surface. Values come from the environment; `dotenv` loads a local `.env`
 * file when one is present.
 */

import 'dotenv/config';

export const RULE_SOURCE_KINDS = ['persisted', 'static'] as const;
export type RuleSourceKind = (typeof RULE_SOURCE_KINDS)[number];

export type SourceFailurePolicy = 'propagate' | 'skip';

function parseList(value: string | undefined, fallback: string): string[] {
  return (value || fallback)
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

function parseInteger(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function parseFailurePolicy(value: string | undefined): SourceFailurePolicy {
  return value === 'skip' ? 'skip' : 'propagate';
}

export const config = {
  // Database (Neon PostgreSQL)
  database: {
    url: process.env.DATABASE_URL || '',
    maxConnections: parseInteger(process.env.DATABASE_MAX_CONNECTIONS, 10),
  },

  // Resolver chain
  navigation: {
    // Highest priority first. Unknown names are rejected by validateConfig().
    sourceOrder: parseList(process.env.NAVIGATION_SOURCE_ORDER, 'persisted,static'),
    staticRulesPath: process.env.NAVIGATION_RULES_FILE || 'config/navigation-rules.json',
    queryTimeoutMs: parseInteger(process.env.NAVIGATION_QUERY_TIMEOUT_MS, 2000),
    sourceFailurePolicy: parseFailurePolicy(process.env.NAVIGATION_SOURCE_FAILURE_POLICY),
    circuitBreaker: {
      failureThreshold: parseInteger(process.env.NAVIGATION_BREAKER_THRESHOLD, 5),
      resetTimeoutMs: parseInteger(process.env.NAVIGATION_BREAKER_RESET_MS, 30_000),
      halfOpenMaxRequests: parseInteger(process.env.NAVIGATION_BREAKER_HALF_OPEN_REQUESTS, 1),
    },
  },

  // Rule administration (x-admin-token header). Empty disables admin procedures.
  admin: {
    apiToken: process.env.ADMIN_API_TOKEN || '',
  },

  sentry: {
    dsn: process.env.SENTRY_DSN || '',
    environment: process.env.SENTRY_ENVIRONMENT || process.env.NODE_ENV || 'development',
    tracesSampleRate: process.env.NODE_ENV === 'production' ? 0.1 : 1.0,
  },

  app: {
    env: process.env.NODE_ENV || 'development',
    isDevelopment: process.env.NODE_ENV === 'development',
    isProduction: process.env.NODE_ENV === 'production',
    isTest: process.env.NODE_ENV === 'test' || process.env.VITEST === 'true',
    port: parseInteger(process.env.PORT, 3000),
    allowedOrigins: parseList(process.env.ALLOWED_ORIGINS, ''),
  },
} as const;

export type Config = typeof config;

export function isRuleSourceKind(value: string): value is RuleSourceKind {
  return (RULE_SOURCE_KINDS as readonly string[]).includes(value);
}

/**
 * Collect configuration problems. Returns an empty list when the
 * configuration is usable.
 */
export function collectConfigErrors(cfg: Config = config): string[] {
  const errors: string[] = [];

  if (cfg.app.isProduction && !cfg.database.url) {
    errors.push('DATABASE_URL is required');
  }

  if (cfg.navigation.sourceOrder.length === 0) {
    errors.push('NAVIGATION_SOURCE_ORDER must name at least one rule source');
  }

  const seen = new Set<string>();
  for (const name of cfg.navigation.sourceOrder) {
    if (!isRuleSourceKind(name)) {
      errors.push(`NAVIGATION_SOURCE_ORDER contains unknown source "${name}"`);
    } else if (seen.has(name)) {
      errors.push(`NAVIGATION_SOURCE_ORDER lists "${name}" more than once`);
    }
    seen.add(name);
  }

  return errors;
}

export function validateConfig(cfg: Config = config): void {
  const errors = collectConfigErrors(cfg);

  if (errors.length > 0) {
    console.error('❌ Configuration validation failed:');
    errors.forEach((error) => console.error(`  - ${error}`));
    throw new Error('Invalid configuration');
  }
}
