/**
 * Resilience Types
 */

/** External dependencies guarded by a circuit breaker. */
export type DependencyName = 'embedding' | 'vector_store' | 'generation' | 'notification' | (string & {});

export type BreakerState = 'closed' | 'open' | 'half_open';

/** Per-dependency breaker snapshot. Never persisted. */
export interface CircuitBreakerState {
  dependency: DependencyName;
  state: BreakerState;
  consecutiveFailures: number;
  lastTransitionAt: number;
}

export interface BreakerOptions {
  /** Consecutive failures that open the circuit */
  failureThreshold: number;
  /** Time spent open before a half-open trial is admitted */
  cooldownMs: number;
}

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  /** Fractional spread, 0.2 = ±20% */
  jitter: number;
}

export interface CallOptions {
  /** Per-attempt timeout; a timeout counts as a transient failure */
  timeoutMs?: number;
}

export type CallOutcome = 'success' | 'failure' | 'retry' | 'fast_fail';

export type Clock = () => number;
