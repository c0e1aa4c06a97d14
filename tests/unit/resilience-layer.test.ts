import { ResilienceLayer } from '../../src/resilience/resilience-layer';
import { BreakerRegistry } from '../../src/resilience/breaker-registry';
import { backoffDelay, withTimeout } from '../../src/resilience/retry';
import {
  classifyError,
  DependencyUnavailableError,
  PermanentError,
  PolicyViolationError,
  TransientError,
} from '../../src/resilience/errors';
import { CallOutcome } from '../../src/resilience/types';
import { HttpError } from '../helpers/fakes';

describe('backoffDelay', () => {
  const policy = { maxAttempts: 3, baseDelayMs: 1000, multiplier: 2, jitter: 0.2 };

  it('should grow exponentially without jitter at the midpoint', () => {
    expect(backoffDelay(1, policy, () => 0.5)).toBe(1000);
    expect(backoffDelay(2, policy, () => 0.5)).toBe(2000);
    expect(backoffDelay(3, policy, () => 0.5)).toBe(4000);
  });

  it('should stay within the jitter band', () => {
    expect(backoffDelay(1, policy, () => 0)).toBe(800);
    expect(backoffDelay(2, policy, () => 0.999)).toBe(2399);
  });
});

describe('withTimeout', () => {
  it('should reject with a transient error and abort the signal', async () => {
    let aborted = false;
    const call = withTimeout('generation', (signal) => new Promise<string>((resolve) => {
      signal.addEventListener('abort', () => {
        aborted = true;
      });
      setTimeout(() => resolve('late'), 50);
    }), 10);

    await expect(call).rejects.toBeInstanceOf(TransientError);
    expect(aborted).toBe(true);
  });

  it('should pass through a result that arrives in time', async () => {
    await expect(withTimeout('generation', async () => 'ok', 1000)).resolves.toBe('ok');
  });
});

describe('classifyError', () => {
  it('should treat 5xx, 408 and 429 as transient', () => {
    expect(classifyError(new HttpError(503)).kind).toBe('transient');
    expect(classifyError(new HttpError(408)).kind).toBe('transient');
    expect(classifyError(new HttpError(429)).kind).toBe('transient');
  });

  it('should treat other 4xx as permanent', () => {
    expect(classifyError(new HttpError(400)).kind).toBe('permanent');
    expect(classifyError(new HttpError(401)).kind).toBe('permanent');
  });

  it('should treat network error codes as transient', () => {
    const err = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
    expect(classifyError(err, 'embedding')).toBeInstanceOf(TransientError);
    expect(classifyError(err, 'embedding').dependency).toBe('embedding');
  });

  it('should treat parse failures as permanent', () => {
    expect(classifyError(new SyntaxError('Unexpected token')).kind).toBe('permanent');
  });

  it('should keep already-classified errors unchanged', () => {
    const err = new PolicyViolationError('unsafe');
    expect(classifyError(err)).toBe(err);
  });

  it('should treat unknown failures as transient', () => {
    expect(classifyError(new Error('mystery')).kind).toBe('transient');
    expect(classifyError('boom').kind).toBe('transient');
  });
});

describe('ResilienceLayer', () => {
  let delays: number[];
  let outcomes: CallOutcome[];
  let breakers: BreakerRegistry;
  let layer: ResilienceLayer;

  beforeEach(() => {
    delays = [];
    outcomes = [];
    breakers = new BreakerRegistry([], { failureThreshold: 5, cooldownMs: 60_000 });
    layer = new ResilienceLayer(breakers, {
      policy: { maxAttempts: 3, baseDelayMs: 100, multiplier: 2, jitter: 0 },
      sleep: async (ms) => {
        delays.push(ms);
      },
      onOutcome: (_dep, outcome) => outcomes.push(outcome),
    });
  });

  it('should return the result of a successful call', async () => {
    await expect(layer.execute('embedding', async () => [1, 2, 3])).resolves.toEqual([1, 2, 3]);
    expect(outcomes).toEqual(['success']);
  });

  it('should retry transient failures with exponential backoff', async () => {
    let calls = 0;
    const result = await layer.execute('embedding', async () => {
      calls++;
      if (calls < 3) throw new HttpError(503);
      return 'ok';
    });

    expect(result).toBe('ok');
    expect(calls).toBe(3);
    expect(delays).toEqual([100, 200]);
    expect(outcomes).toEqual(['failure', 'retry', 'failure', 'retry', 'success']);
  });

  it('should not retry permanent failures', async () => {
    let calls = 0;
    const call = layer.execute('generation', async () => {
      calls++;
      throw new HttpError(400);
    });

    await expect(call).rejects.toBeInstanceOf(PermanentError);
    expect(calls).toBe(1);
    expect(delays).toEqual([]);
  });

  it('should raise DependencyUnavailable once retries are exhausted', async () => {
    const call = layer.execute('vector_store', async () => {
      throw new HttpError(502);
    });

    await expect(call).rejects.toMatchObject({
      kind: 'dependency_unavailable',
      reason: 'retries_exhausted',
      dependency: 'vector_store',
    });
    expect(breakers.get('vector_store').snapshot().consecutiveFailures).toBe(3);
  });

  it('should fail fast without calling the dependency while the breaker is open', async () => {
    const failing = async () => {
      throw new HttpError(500);
    };
    await expect(layer.execute('generation', failing)).rejects.toBeInstanceOf(DependencyUnavailableError);
    await expect(layer.execute('generation', failing)).rejects.toBeInstanceOf(DependencyUnavailableError);
    expect(breakers.get('generation').getState()).toBe('open');

    let called = false;
    const call = layer.execute('generation', async () => {
      called = true;
      return 'ok';
    });
    await expect(call).rejects.toMatchObject({ reason: 'circuit_open' });
    expect(called).toBe(false);
    expect(outcomes[outcomes.length - 1]).toBe('fast_fail');
  });

  it('should count permanent failures toward the breaker', async () => {
    for (let i = 0; i < 5; i++) {
      await expect(layer.execute('embedding', async () => {
        throw new HttpError(401);
      })).rejects.toBeInstanceOf(PermanentError);
    }
    expect(breakers.get('embedding').getState()).toBe('open');
  });

  it('should keep breakers independent per dependency', async () => {
    for (let i = 0; i < 5; i++) {
      await expect(layer.execute('embedding', async () => {
        throw new HttpError(401);
      })).rejects.toBeInstanceOf(PermanentError);
    }
    await expect(layer.execute('generation', async () => 'fine')).resolves.toBe('fine');
  });

  it('should time out slow calls as transient failures', async () => {
    let calls = 0;
    const call = layer.execute(
      'generation',
      () => {
        calls++;
        return new Promise<string>(() => undefined);
      },
      { timeoutMs: 5 },
    );

    await expect(call).rejects.toMatchObject({ reason: 'retries_exhausted' });
    expect(calls).toBe(3);
  });
});
