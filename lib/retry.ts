import { ApiError, isApiError } from './errors';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  signal?: AbortSignal;
  /** Decides whether a failed attempt is worth another try. */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

// Client errors that a retry cannot fix
const NON_RETRYABLE_STATUSES = new Set([400, 401, 403, 404, 409, 422]);

export function isRetryableError(error: unknown): boolean {
  if (!isApiError(error)) return false;
  if (error.status === 0 || error.status === 429) return true;
  if (NON_RETRYABLE_STATUSES.has(error.status)) return false;
  return error.status >= 500;
}

export function retryDelay(error: unknown, attempt: number, baseDelayMs: number): number {
  if (error instanceof ApiError && error.status === 429 && error.retryAfterMs !== undefined) {
    return error.retryAfterMs;
  }
  return baseDelayMs * 2 ** (attempt - 1);
}

function abortError(): Error {
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs `operation` until it succeeds, the error is not retryable, or
 * `maxAttempts` is used up. Attempts are numbered from 1.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isRetryableError;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= options.maxAttempts || options.signal?.aborted || !shouldRetry(error, attempt)) {
        throw error;
      }
      const delayMs = retryDelay(error, attempt, options.baseDelayMs);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs, options.signal);
    }
  }
}
