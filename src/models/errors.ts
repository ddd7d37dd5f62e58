export type CompletionErrorKind =
  | 'EmptyCredential'
  | 'AuthenticationFailed'
  | 'RateLimited'
  | 'ProviderError';

/**
 * Rejected input that never reaches the completion provider: blank job title,
 * blank answer, out-of-range question count, or an operation the current
 * phase does not allow.
 */
export class ValidationError extends Error {
  readonly kind = 'ValidationError';

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Failure of a single completion request. `details` carries whatever the
 * caller needs to repeat the action, e.g. the answer that was rolled back.
 */
export class CompletionError extends Error {
  readonly kind: CompletionErrorKind;
  details?: Record<string, unknown>;

  constructor(kind: CompletionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CompletionError';
    this.kind = kind;
  }

  /** Rate limits and transient provider failures can be resubmitted as-is. */
  get retriable(): boolean {
    return this.kind === 'RateLimited' || this.kind === 'ProviderError';
  }

  withDetails(details: Record<string, unknown>): this {
    this.details = { ...this.details, ...details };
    return this;
  }
}

export class StoreWriteFailed extends Error {
  readonly kind = 'StoreWriteFailed';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreWriteFailed';
  }
}
