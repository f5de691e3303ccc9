import { CancelledError, isTransientError } from './http-errors';

export interface RetryPolicy {
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  retries: 3,
  baseDelayMs: 2000,
  maxDelayMs: 30000,
};

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: SleepFn = (ms, signal) =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export function backoffDelay(policy: RetryPolicy, retryNumber: number): number {
  return Math.min(
    policy.maxDelayMs,
    policy.baseDelayMs * 2 ** Math.max(0, retryNumber - 1),
  );
}

export interface RetryOptions {
  policy: RetryPolicy;
  signal?: AbortSignal;
  sleepFn?: SleepFn;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (error: unknown, retryNumber: number, delayMs: number) => void;
}

export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(attempts: number, lastError: unknown) {
    const detail =
      lastError instanceof Error ? lastError.message : String(lastError);
    super(`Gave up after ${attempts} attempts: ${detail}`);
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Run `operation` until it succeeds, a non-retryable error occurs, or the
 * policy's retries are used up. Resolves with the value and the number of
 * attempts made. Non-retryable errors propagate unchanged.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<{ value: T; attempts: number }> {
  const { policy, signal } = options;
  const wait = options.sleepFn ?? sleep;
  const isRetryable = options.isRetryable ?? isTransientError;
  const maxAttempts = policy.retries + 1;

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) {
      throw new CancelledError();
    }
    try {
      const value = await operation(attempt);
      return { value, attempts: attempt };
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError();
      }
      if (!isRetryable(error)) {
        throw error;
      }
      if (attempt >= maxAttempts) {
        throw new RetryExhaustedError(attempt, error);
      }
      const delayMs = backoffDelay(policy, attempt);
      options.onRetry?.(error, attempt, delayMs);
      await wait(delayMs, signal);
    }
  }
}
