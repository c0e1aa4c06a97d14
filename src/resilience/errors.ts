/**
 * Error taxonomy shared by every external call.
 *
 * Transient errors are absorbed by the resilience layer; everything that
 * escapes it is permanent, a policy violation, or "dependency unavailable".
 */

export type ErrorKind = 'transient' | 'permanent' | 'policy_violation' | 'dependency_unavailable';

export abstract class EngineError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(
    message: string,
    readonly dependency?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TransientError extends EngineError {
  readonly kind = 'transient';
}

export class PermanentError extends EngineError {
  readonly kind = 'permanent';
}

export class PolicyViolationError extends EngineError {
  readonly kind = 'policy_violation';
}

export type UnavailableReason = 'circuit_open' | 'retries_exhausted';

export class DependencyUnavailableError extends EngineError {
  readonly kind = 'dependency_unavailable';

  constructor(
    dependency: string,
    readonly reason: UnavailableReason,
    cause?: unknown,
  ) {
    super(`Dependency "${dependency}" unavailable (${reason})`, dependency, { cause });
  }
}

const TRANSIENT_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EAI_AGAIN', 'EPIPE', 'ENOTFOUND', 'UND_ERR_SOCKET']);
const TRANSIENT_STATUSES = new Set([408, 425, 429]);

function readStatus(err: object): number | undefined {
  if ('status' in err && typeof err.status === 'number') return err.status;
  if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode;
  return undefined;
}

function readCode(err: object): string | undefined {
  if ('code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

/**
 * Map anything thrown by a provider SDK, fetch, or Redis into the taxonomy.
 * Unknown failures are treated as transient.
 */
export function classifyError(err: unknown, dependency?: string): EngineError {
  if (err instanceof EngineError) return err;

  const message = err instanceof Error ? err.message : String(err);
  if (typeof err !== 'object' || err === null) {
    return new TransientError(message, dependency, { cause: err });
  }

  const status = readStatus(err);
  if (status !== undefined) {
    if (status >= 500 || TRANSIENT_STATUSES.has(status)) {
      return new TransientError(message, dependency, { cause: err });
    }
    if (status >= 400) {
      return new PermanentError(message, dependency, { cause: err });
    }
  }

  const code = readCode(err);
  if (code && TRANSIENT_CODES.has(code)) {
    return new TransientError(message, dependency, { cause: err });
  }

  if (err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError')) {
    return new TransientError(message, dependency, { cause: err });
  }

  if (err instanceof SyntaxError) {
    return new PermanentError(message, dependency, { cause: err });
  }

  return new TransientError(message, dependency, { cause: err });
}
