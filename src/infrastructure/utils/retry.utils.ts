export interface RetryPolicy {
  /** Total attempts, including the first one. */
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
}

const RETRYABLE_CODES = new Set([
  "ECONNRESET",
  "ETIMEDOUT",
  "ECONNREFUSED",
  "EPIPE",
  "EAI_AGAIN",
  "ENOTFOUND",
  "EHOSTUNREACH",
]);

/**
 * Transient failures worth another attempt: throttling, 5xx, timeouts and
 * dropped connections. 4xx and filesystem errors such as ENOENT fail at once.
 */
export function isRetryableError(e: unknown): boolean {
  if (typeof e !== "object" || e === null) return false;
  if ("$retryable" in e && e.$retryable) return true;
  if (
    "$metadata" in e &&
    typeof e.$metadata === "object" &&
    e.$metadata !== null &&
    "httpStatusCode" in e.$metadata &&
    typeof e.$metadata.httpStatusCode === "number"
  ) {
    const code = e.$metadata.httpStatusCode;
    if (code === 429 || (code >= 500 && code < 600)) return true;
  }
  if ("name" in e && (e.name === "TimeoutError" || e.name === "AbortError")) {
    return true;
  }
  if ("code" in e && typeof e.code === "string") {
    return RETRYABLE_CODES.has(e.code);
  }
  return false;
}

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.backoffBaseMs * attempt, policy.backoffMaxMs);
}

export interface RetryOptions {
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  isRetryable?: (error: unknown) => boolean;
}

/**
 * Runs `fn` until it resolves, a non-retryable error is thrown or
 * `policy.maxAttempts` is reached. The last error is rethrown as is.
 * Delay before attempt n+1 is `backoffBaseMs * n`, capped at `backoffMaxMs`.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<T> {
  const retryable = options.isRetryable ?? isRetryableError;
  const maxAttempts = Math.max(1, policy.maxAttempts);
  let attempt = 0;
  while (true) {
    attempt += 1;
    try {
      return await fn(attempt);
    } catch (e) {
      if (attempt >= maxAttempts || !retryable(e)) throw e;
      const delay = backoffDelay(policy, attempt);
      options.onRetry?.(e, attempt, delay);
      if (delay > 0) {
        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }
  }
}
