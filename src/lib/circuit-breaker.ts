/**
 * Circuit Breaker
 *
 * Stops hammering a failing rule store.
 *
 * States:
 * - CLOSED: Normal operation, calls pass through
 * - OPEN: Store is failing, calls fail immediately
 * - HALF_OPEN: Reset window elapsed, a limited number of probe calls pass
 *
 * Usage:
 *   const breaker = new CircuitBreaker('navigation-store', { failureThreshold: 5 });
 *   const rows = await breaker.execute(() => repository.findRulesByFromLocation(view));
 */

import { logger } from '../logger';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerOptions {
  /** Consecutive failures before the circuit opens (default: 5) */
  failureThreshold?: number;
  /** Time to wait before probing again (ms, default: 30_000) */
  resetTimeoutMs?: number;
  /** Probe calls allowed while HALF_OPEN (default: 1) */
  halfOpenMaxRequests?: number;
  onStateChange?: (name: string, from: CircuitState, to: CircuitState) => void;
  now?: () => number;
}

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failureCount = 0;
  private lastFailureTime = 0;
  private halfOpenRequests = 0;

  private readonly failureThreshold: number;
  private readonly resetTimeoutMs: number;
  private readonly halfOpenMaxRequests: number;
  private readonly onStateChange?: (name: string, from: CircuitState, to: CircuitState) => void;
  private readonly now: () => number;
  private readonly log;

  constructor(
    private readonly name: string,
    options: CircuitBreakerOptions = {}
  ) {
    this.failureThreshold = options.failureThreshold ?? 5;
    this.resetTimeoutMs = options.resetTimeoutMs ?? 30_000;
    this.halfOpenMaxRequests = options.halfOpenMaxRequests ?? 1;
    this.onStateChange = options.onStateChange;
    this.now = options.now ?? Date.now;
    this.log = logger.child({ module: `circuit-breaker:${name}` });
  }

  /**
   * Run `fn` through the breaker. Throws CircuitOpenError without calling
   * `fn` while the circuit is open.
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === 'OPEN') {
      const elapsed = this.now() - this.lastFailureTime;
      if (elapsed >= this.resetTimeoutMs) {
        this.transition('HALF_OPEN');
      } else {
        throw new CircuitOpenError(this.name, this.resetTimeoutMs - elapsed);
      }
    }

    if (this.state === 'HALF_OPEN' && this.halfOpenRequests >= this.halfOpenMaxRequests) {
      throw new CircuitOpenError(this.name, this.resetTimeoutMs);
    }

    try {
      if (this.state === 'HALF_OPEN') {
        this.halfOpenRequests++;
      }

      const result = await fn();
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getFailureCount(): number {
    return this.failureCount;
  }

  reset(): void {
    this.transition('CLOSED');
    this.failureCount = 0;
    this.halfOpenRequests = 0;
  }

  private onSuccess(): void {
    if (this.state === 'HALF_OPEN') {
      this.log.info({ service: this.name }, 'Store recovered, closing circuit');
      this.transition('CLOSED');
    }
    this.failureCount = 0;
    this.halfOpenRequests = 0;
  }

  private onFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.now();

    if (this.state === 'HALF_OPEN') {
      this.log.warn({ service: this.name }, 'Store still failing, reopening circuit');
      this.transition('OPEN');
      this.halfOpenRequests = 0;
    } else if (this.failureCount >= this.failureThreshold) {
      this.log.error(
        { service: this.name, failures: this.failureCount },
        `Circuit opened after ${this.failureCount} failures`
      );
      this.transition('OPEN');
    }
  }

  private transition(to: CircuitState): void {
    if (this.state === to) return;
    const from = this.state;
    this.state = to;
    this.onStateChange?.(this.name, from, to);
    this.log.info({ from, to }, `Circuit state: ${from} → ${to}`);
  }
}

export class CircuitOpenError extends Error {
  readonly retryAfterMs: number;

  constructor(serviceName: string, retryAfterMs: number) {
    super(`Circuit breaker open for ${serviceName}. Retry after ${Math.ceil(retryAfterMs / 1000)}s.`);
    this.name = 'CircuitOpenError';
    this.retryAfterMs = retryAfterMs;
  }
}
