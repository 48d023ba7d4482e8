export class ApiError extends Error {
  /** HTTP status, or 0 when the request never got a response. */
  readonly status: number;
  readonly body?: string;
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    status: number,
    details: { body?: string; retryAfterMs?: number; cause?: unknown } = {}
  ) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'ApiError';
    this.status = status;
    this.body = details.body;
    this.retryAfterMs = details.retryAfterMs;
  }
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

export function isNotFoundError(error: unknown): boolean {
  return isApiError(error) && error.status === 404;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export function errorMessage(error: unknown, fallback = 'Unknown error'): string {
  if (error instanceof Error && error.message) return error.message;
  if (typeof error === 'string' && error) return error;
  return fallback;
}

export type StatusMessages = Partial<Record<number, string>>;

/**
 * Replaces the raw message of an HTTP failure with a user-facing one.
 * Network failures and non-HTTP errors pass through unchanged.
 */
export function withFriendlyMessage(error: unknown, messages: StatusMessages): unknown {
  if (!isApiError(error) || error.status < 400) return error;

  const message =
    messages[error.status] ??
    (error.status >= 500 ? 'Server error. Please try again later' : `Network error: HTTP ${error.status}`);

  return new ApiError(message, error.status, {
    body: error.body,
    retryAfterMs: error.retryAfterMs,
    cause: error,
  });
}
