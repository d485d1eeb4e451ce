/**
 * Error taxonomy shared by the pipeline.
 *
 * Transient errors are retried; validation errors drop one record; capital-safety
 * errors block the whole cycle; ambiguous execution errors must be reconciled
 * against the exchange before any terminal state is recorded.
 */

export class TransientError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TransientError';
  }
}

export class TimeoutError extends TransientError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly recordId: string | null,
    public readonly issues: ValidationIssue[] = []
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export type CapitalSafetyReason =
  | 'unreachable'
  | 'degraded'
  | 'insufficient_balance'
  | 'balance_unavailable'
  | 'spending_limit';

export class CapitalSafetyError extends Error {
  constructor(
    message: string,
    public readonly reason: CapitalSafetyReason,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'CapitalSafetyError';
  }
}

export class AmbiguousExecutionError extends Error {
  constructor(
    message: string,
    public readonly clientRequestId: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AmbiguousExecutionError';
  }
}

/** The exchange answered and refused; retrying the same request will not help. */
export class ExchangeRejectionError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly response?: unknown
  ) {
    super(message);
    this.name = 'ExchangeRejectionError';
  }
}

export class RegistryPersistError extends Error {
  constructor(
    message: string,
    public readonly eventId: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RegistryPersistError';
  }
}

export class IllegalTransitionError extends Error {
  constructor(
    public readonly from: string,
    public readonly to: string
  ) {
    super(`Illegal execution transition ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * HTTP statuses worth retrying: rate limiting and upstream trouble.
 * Everything else in the 4xx range is a definitive answer.
 */
export function isRetryableStatus(status: number | undefined): boolean {
  if (status === undefined) return true;
  return status === 408 || status === 429 || status >= 500;
}
