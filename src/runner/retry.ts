import type { RetryPolicy } from '../parser/config-schema.ts';
import { TIMEOUTS } from '../utils/constants.ts';
import { CancelledError } from './errors.ts';

export interface RetryOptions {
  /** Return false to fail immediately without further attempts */
  shouldRetry?: (error: Error) => boolean;
  /** Server-requested delay that overrides the computed backoff */
  retryAfterMs?: (error: Error) => number | undefined;
  signal?: AbortSignal;
}

/**
 * Calculate backoff delay in milliseconds
 */
export function calculateBackoff(
  attempt: number,
  backoff: 'linear' | 'exponential',
  baseDelay: number = TIMEOUTS.DEFAULT_RETRY_BASE_DELAY_MS
): number {
  if (backoff === 'exponential') {
    return baseDelay * 2 ** attempt;
  }
  return baseDelay * (attempt + 1);
}

/**
 * Sleep for a given duration. Rejects with CancelledError when the signal fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new CancelledError());
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve, reject) => {
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
}

/**
 * Execute a function with retry logic
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  retry?: Partial<RetryPolicy>,
  onRetry?: (attempt: number, error: Error) => void,
  options: RetryOptions = {}
): Promise<T> {
  const maxRetries = retry?.count ?? 0;
  const backoffType = retry?.backoff ?? 'linear';
  const baseDelay = retry?.baseDelay ?? TIMEOUTS.DEFAULT_RETRY_BASE_DELAY_MS;

  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (options.signal?.aborted) throw new CancelledError();
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt >= maxRetries) break;
      if (lastError instanceof CancelledError) break;
      if (options.shouldRetry && !options.shouldRetry(lastError)) break;

      const delay =
        options.retryAfterMs?.(lastError) ?? calculateBackoff(attempt, backoffType, baseDelay);
      onRetry?.(attempt + 1, lastError);
      await sleep(delay, options.signal);
    }
  }

  throw lastError ?? new Error('Operation failed with no error details');
}
