import { BreakerOptions, BreakerState, CircuitBreakerState, Clock, DependencyName } from './types';

export type TransitionListener = (dependency: DependencyName, from: BreakerState, to: BreakerState) => void;

/**
 * Consecutive-failure circuit breaker for one dependency.
 *
 * closed → open at `failureThreshold` consecutive failures; open → half_open
 * once `cooldownMs` has elapsed; half_open admits exactly one trial call,
 * which closes the circuit on success and re-opens it on failure. Every
 * method is synchronous, so state changes never interleave on the event loop.
 */
export class CircuitBreaker {
  private state: BreakerState = 'closed';
  private consecutiveFailures = 0;
  private lastTransitionAt: number;
  private trialInFlight = false;

  constructor(
    readonly dependency: DependencyName,
    private readonly options: BreakerOptions,
    private readonly clock: Clock = Date.now,
    private readonly onTransition?: TransitionListener,
  ) {
    this.lastTransitionAt = clock();
  }

  /**
   * Ask permission to call the dependency. Returns false when the call must
   * fail fast. A `true` in half_open claims the single trial slot.
   */
  tryAcquire(): boolean {
    if (this.state === 'closed') return true;

    if (this.state === 'open') {
      if (this.clock() - this.lastTransitionAt < this.options.cooldownMs) return false;
      this.transition('half_open');
    }

    if (this.trialInFlight) return false;
    this.trialInFlight = true;
    return true;
  }

  recordSuccess(): void {
    this.consecutiveFailures = 0;
    this.trialInFlight = false;
    if (this.state !== 'closed') this.transition('closed');
  }

  recordFailure(): void {
    this.consecutiveFailures++;
    if (this.state === 'half_open') {
      this.trialInFlight = false;
      this.transition('open');
    } else if (this.state === 'closed' && this.consecutiveFailures >= this.options.failureThreshold) {
      this.transition('open');
    }
  }

  getState(): BreakerState {
    // Report half_open as soon as the cooldown elapsed, even before a caller probes
    if (this.state === 'open' && this.clock() - this.lastTransitionAt >= this.options.cooldownMs) {
      return 'half_open';
    }
    return this.state;
  }

  snapshot(): CircuitBreakerState {
    return {
      dependency: this.dependency,
      state: this.getState(),
      consecutiveFailures: this.consecutiveFailures,
      lastTransitionAt: this.lastTransitionAt,
    };
  }

  private transition(to: BreakerState): void {
    const from = this.state;
    this.state = to;
    this.lastTransitionAt = this.clock();
    this.onTransition?.(this.dependency, from, to);
  }
}
