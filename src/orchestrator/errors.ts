import type { FailureClassification } from './fallback-policy';
import type { StageName } from './states';

/** One failed backend attempt inside a stage invocation */
export interface BackendAttempt {
  backend: string;
  classification: FailureClassification;
}

/**
 * Every backend was tried for a stage and each one failed with a retryable
 * error. Distinct from a single fatal failure: the backend list, not the
 * request, is what needs attention.
 */
export class FallbackExhaustedError extends Error {
  public readonly code = 'FALLBACK_EXHAUSTED';

  constructor(
    public readonly stage: StageName,
    public readonly attempts: BackendAttempt[],
    lastError: unknown,
  ) {
    const last = attempts[attempts.length - 1];
    const detail = last ? `; last error from ${last.backend}: ${last.classification.message}` : '';
    super(`All ${attempts.length} backend(s) failed for ${stage}${detail}`, { cause: lastError });
    this.name = 'FallbackExhaustedError';
  }
}

/** Raised if the engine is ever asked to run Fix past the iteration bound */
export class IterationLimitError extends Error {
  public readonly code = 'ITERATION_LIMIT';

  constructor(iterationCount: number, maxIterations: number) {
    super(`Fix would exceed the iteration bound (${iterationCount}/${maxIterations})`);
    this.name = 'IterationLimitError';
  }
}

export class SessionNotFoundError extends Error {
  public readonly code = 'SESSION_NOT_FOUND';

  constructor(sessionId: string) {
    super(`No readable checkpoint found for session: ${sessionId}`);
    this.name = 'SessionNotFoundError';
  }
}

/** Best-effort error code for checkpoints and reports */
export function errorCode(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return error instanceof Error ? error.name : 'UNKNOWN_ERROR';
}
