import { BackendError } from '../llm/errors';
import type { BackendErrorCode } from '../llm/errors';

/** Whether another backend is worth trying after this failure */
export type FailureSeverity = 'retryable' | 'fatal';

/** Structured classification of a failed backend attempt */
export interface FailureClassification {
  severity: FailureSeverity;
  code: string;
  message: string;
  details?: string;
}

const RETRYABLE_CODES: ReadonlySet<BackendErrorCode> = new Set<BackendErrorCode>([
  'RATE_LIMITED',
  'QUOTA_EXCEEDED',
  'UNAVAILABLE',
  'TIMEOUT',
  'ENDPOINT_NOT_FOUND',
  'CAPABILITY_UNSUPPORTED',
  'MALFORMED_RESPONSE',
]);

/**
 * ModelFallbackPolicy owns the ordered backend list for a session and decides
 * which failures justify moving on to the next backend.
 *
 * Classification strategy:
 *  - BackendError carries a structured code from the client; that code decides.
 *  - Anything else (a collaborator that cannot supply codes) falls back to
 *    message patterns. This is the only place error text is inspected.
 */
export class ModelFallbackPolicy {
  private static readonly RETRYABLE_PATTERNS = [
    '429',
    'rate limit',
    'too many requests',
    'streaming',
    'tools are not supported',
    'no endpoints found',
    'not supported',
    'overloaded',
    'econnreset',
    'etimedout',
    'socket hang up',
    'status 502',
    'status 503',
  ];

  private readonly models: readonly string[];

  constructor(models: readonly string[]) {
    if (models.length === 0) {
      throw new Error('ModelFallbackPolicy requires at least one backend');
    }
    this.models = Object.freeze([...models]);
  }

  /** Backends in priority order; every stage invocation starts from the first */
  backends(): readonly string[] {
    return this.models;
  }

  classify(error: unknown): FailureClassification {
    const message = error instanceof Error ? error.message : String(error);
    const details = error instanceof Error ? error.stack : undefined;

    if (error instanceof BackendError) {
      const severity: FailureSeverity = RETRYABLE_CODES.has(error.code) ? 'retryable' : 'fatal';
      return { severity, code: `BACKEND_${error.code}`, message, details };
    }

    if (ModelFallbackPolicy.matchesRetryablePattern(message)) {
      return { severity: 'retryable', code: 'PATTERN_RETRYABLE', message, details };
    }

    return { severity: 'fatal', code: 'UNCLASSIFIED_FATAL', message, details };
  }

  private static matchesRetryablePattern(message: string): boolean {
    const lower = message.toLowerCase();
    return ModelFallbackPolicy.RETRYABLE_PATTERNS.some((p) => lower.includes(p));
  }
}
