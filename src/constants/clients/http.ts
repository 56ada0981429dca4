/**
 * HTTP client constants — defaults and configuration
 */

/**
 * Default per-attempt request timeout in milliseconds (30 seconds)
 */
export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

export const DEFAULT_JSON_HEADERS: Record<string, string> = {
  Accept: "application/json",
};

/**
 * Maximum length of error body snippet to include in error messages
 */
export const ERROR_BODY_SNIPPET_MAX_LENGTH = 200;

/**
 * Retry configuration defaults
 */

/**
 * Default maximum number of attempts (including initial request)
 */
export const DEFAULT_MAX_ATTEMPTS = 5;

/**
 * Backoff before the first retry; doubles on every further retry
 * 1s, 2s, 4s, 8s, ...
 */
export const DEFAULT_BASE_DELAY_MS = 1_000;

/**
 * Upper bound for a single backoff delay
 */
export const DEFAULT_MAX_DELAY_MS = 30_000;

/**
 * HTTP status codes that warrant a retry (rate limit + server errors).
 * Any other 5xx is retryable as well, see isStatusRetryable.
 */
export const RETRYABLE_STATUS_CODES = [429, 500, 502, 503, 504];
