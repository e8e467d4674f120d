/**
 * Structured failure codes a backend call can end with.
 *
 * Request-level codes describe the backend (quota, capability, availability);
 * content-level codes describe what came back.
 */
export type BackendErrorCode =
  | 'RATE_LIMITED'
  | 'QUOTA_EXCEEDED'
  | 'UNAVAILABLE'
  | 'TIMEOUT'
  | 'ENDPOINT_NOT_FOUND'
  | 'CAPABILITY_UNSUPPORTED'
  | 'AUTHENTICATION'
  | 'INVALID_REQUEST'
  | 'MALFORMED_RESPONSE'
  | 'EMPTY_RESPONSE'
  | 'UNKNOWN';

export interface BackendErrorOptions {
  backend?: string;
  status?: number;
  retryAfterMs?: number;
  cause?: unknown;
}

export class BackendError extends Error {
  public readonly backend?: string;
  public readonly status?: number;
  public readonly retryAfterMs?: number;

  constructor(
    message: string,
    public readonly code: BackendErrorCode,
    options: BackendErrorOptions = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'BackendError';
    this.backend = options.backend;
    this.status = options.status;
    this.retryAfterMs = options.retryAfterMs;
  }

  /** Copy of this error attributed to a specific backend; the subclass is kept */
  withBackend(backend: string): BackendError {
    return this.attributed(new BackendError(this.message, this.code, { backend, status: this.status, retryAfterMs: this.retryAfterMs, cause: this.cause }));
  }

  protected attributed<T extends BackendError>(copy: T): T {
    copy.stack = this.stack;
    return copy;
  }
}

type AttributionOptions = Pick<BackendErrorOptions, 'backend' | 'cause'>;

export class BackendRateLimitError extends BackendError {
  constructor(message = 'Rate limit exceeded', retryAfterMs?: number, status = 429, options: AttributionOptions = {}) {
    super(message, 'RATE_LIMITED', { ...options, status, retryAfterMs });
    this.name = 'BackendRateLimitError';
  }

  withBackend(backend: string): BackendRateLimitError {
    return this.attributed(new BackendRateLimitError(this.message, this.retryAfterMs, this.status, { backend, cause: this.cause }));
  }
}

export class BackendAuthenticationError extends BackendError {
  constructor(message = 'Authentication failed', status = 401, options: AttributionOptions = {}) {
    super(message, 'AUTHENTICATION', { ...options, status });
    this.name = 'BackendAuthenticationError';
  }

  withBackend(backend: string): BackendAuthenticationError {
    return this.attributed(new BackendAuthenticationError(this.message, this.status, { backend, cause: this.cause }));
  }
}
