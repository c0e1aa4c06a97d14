/**
 * Resilience Layer
 *
 * Wraps every external call with classification-aware retry and the
 * dependency's circuit breaker. Transient errors never leave this layer:
 * they are retried, and once attempts run out they become
 * DependencyUnavailableError.
 */

import { BreakerRegistry } from './breaker-registry';
import { classifyError, DependencyUnavailableError, EngineError } from './errors';
import { backoffDelay, DEFAULT_RETRY_POLICY, realSleep, Sleep, withTimeout } from './retry';
import { CallOptions, CallOutcome, DependencyName, RetryPolicy } from './types';
import { logger } from '../observability/logger';
import { dependencyCalls } from '../observability/metrics';

export type OutcomeListener = (dependency: DependencyName, outcome: CallOutcome, error?: EngineError) => void;

export interface ResilienceLayerOptions {
  policy?: RetryPolicy;
  sleep?: Sleep;
  random?: () => number;
  onOutcome?: OutcomeListener;
}

export class ResilienceLayer {
  private readonly policy: RetryPolicy;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly onOutcome?: OutcomeListener;
  private readonly log = logger.child({ component: 'resilience' });

  constructor(
    readonly breakers: BreakerRegistry,
    options: ResilienceLayerOptions = {},
  ) {
    this.policy = options.policy ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep ?? realSleep;
    this.random = options.random ?? Math.random;
    this.onOutcome = options.onOutcome;
  }

  async execute<T>(
    dependency: DependencyName,
    fn: (signal: AbortSignal) => Promise<T>,
    options: CallOptions = {},
  ): Promise<T> {
    const breaker = this.breakers.get(dependency);
    let lastError: EngineError | undefined;

    for (let attempt = 1; attempt <= this.policy.maxAttempts; attempt++) {
      if (!breaker.tryAcquire()) {
        const err = new DependencyUnavailableError(dependency, 'circuit_open', lastError);
        this.record(dependency, 'fast_fail', err);
        throw err;
      }

      try {
        const result = await withTimeout(dependency, fn, options.timeoutMs);
        breaker.recordSuccess();
        this.record(dependency, 'success');
        if (attempt > 1) {
          this.log.info({ dependency, attempt }, 'Dependency call succeeded after retry');
        }
        return result;
      } catch (raw) {
        const err = classifyError(raw, dependency);
        breaker.recordFailure();
        this.record(dependency, 'failure', err);

        if (err.kind !== 'transient') throw err;
        lastError = err;

        if (attempt < this.policy.maxAttempts) {
          const delayMs = backoffDelay(attempt, this.policy, this.random);
          this.log.warn({ dependency, attempt, delayMs, err: err.message }, 'Transient failure, retrying');
          this.record(dependency, 'retry', err);
          await this.sleep(delayMs);
        }
      }
    }

    const exhausted = new DependencyUnavailableError(dependency, 'retries_exhausted', lastError);
    this.log.error({ dependency, attempts: this.policy.maxAttempts, err: lastError?.message }, 'Retries exhausted');
    throw exhausted;
  }

  private record(dependency: DependencyName, outcome: CallOutcome, error?: EngineError): void {
    dependencyCalls.inc({ dependency, outcome });
    this.onOutcome?.(dependency, outcome, error);
  }
}
