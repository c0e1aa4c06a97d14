/**
 * Breaker Registry
 *
 * Process-wide circuit breakers keyed by dependency name. One instance is
 * built at startup and injected into every call site, so a failing provider
 * fails fast for all tenants at once.
 */

import { CircuitBreaker } from './circuit-breaker';
import { BreakerOptions, BreakerState, CircuitBreakerState, Clock, DependencyName } from './types';
import { logger } from '../observability/logger';
import { circuitBreakerState } from '../observability/metrics';

const STATE_GAUGE: Record<BreakerState, number> = { closed: 0, half_open: 1, open: 2 };

export const DEFAULT_BREAKER_OPTIONS: BreakerOptions = {
  failureThreshold: 5,
  cooldownMs: 60_000,
};

export class BreakerRegistry {
  private readonly breakers = new Map<DependencyName, CircuitBreaker>();
  private readonly log = logger.child({ component: 'breaker-registry' });

  constructor(
    dependencies: DependencyName[] = [],
    private readonly options: BreakerOptions = DEFAULT_BREAKER_OPTIONS,
    private readonly clock: Clock = Date.now,
  ) {
    for (const name of dependencies) this.get(name);
  }

  /** Breaker for `dependency`, created on first use. */
  get(dependency: DependencyName): CircuitBreaker {
    let breaker = this.breakers.get(dependency);
    if (!breaker) {
      breaker = new CircuitBreaker(dependency, this.options, this.clock, (dep, from, to) => {
        circuitBreakerState.set({ dependency: dep }, STATE_GAUGE[to]);
        const level = to === 'open' ? 'warn' : 'info';
        this.log[level]({ dependency: dep, from, to }, 'Circuit breaker transition');
      });
      circuitBreakerState.set({ dependency }, STATE_GAUGE.closed);
      this.breakers.set(dependency, breaker);
    }
    return breaker;
  }

  snapshots(): CircuitBreakerState[] {
    return Array.from(this.breakers.values()).map((b) => b.snapshot());
  }

  /** Health summary for the /ready endpoint */
  getHealthSummary(): Record<string, { state: BreakerState; failures: number }> {
    const summary: Record<string, { state: BreakerState; failures: number }> = {};
    for (const snap of this.snapshots()) {
      summary[snap.dependency] = { state: snap.state, failures: snap.consecutiveFailures };
    }
    return summary;
  }

  anyOpen(): boolean {
    return this.snapshots().some((s) => s.state === 'open');
  }
}
