import { TimeoutError, TransientError } from './errors.js';

export interface RetryPolicy {
  /** Total attempts, including the first one. */
  attempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  /** Adds up to one extra delay's worth of random jitter when true. */
  jitter: boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 4,
  initialDelayMs: 400,
  maxDelayMs: 8_000,
  jitter: true,
};

export interface RetryOptions {
  policy: RetryPolicy;
  operation: string;
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isTransient(err: unknown): boolean {
  return err instanceof TransientError;
}

export function backoffDelay(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random
): number {
  const base = Math.min(policy.maxDelayMs, policy.initialDelayMs * 2 ** Math.max(0, attempt - 1));
  if (!policy.jitter) return base;
  return Math.min(policy.maxDelayMs, base + random() * base);
}

/**
 * Run `fn` until it succeeds or the policy runs out of attempts.
 * Non-retryable errors are rethrown immediately; the last retryable error is
 * rethrown once attempts are exhausted.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const attempts = Math.max(1, Math.trunc(options.policy.attempts));
  const isRetryable = options.isRetryable ?? isTransient;
  const wait = options.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (!isRetryable(err) || attempt >= attempts) {
        throw err;
      }
      const delayMs = backoffDelay(options.policy, attempt, options.random);
      options.onRetry?.({ attempt, delayMs, error: err });
      await wait(delayMs);
    }
  }

  throw lastError;
}

/**
 * Race a promise against a timer. The underlying work is not cancelled; callers
 * that time out a capital-affecting call must reconcile its outcome.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return work;
  }
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
