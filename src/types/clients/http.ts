/**
 * HTTP client type definitions
 */

export type HttpMethod = "GET";

export type QueryValue = string | number | boolean;

/**
 * Query parameters; array values are sent as repeated same-named params
 */
export type QueryParams = Record<string, QueryValue | QueryValue[]>;

/**
 * Sleep function used between retries (injectable for tests)
 */
export type SleepFn = (ms: number) => Promise<void>;

/**
 * Retry configuration for HTTP requests
 */
export interface HttpRetryConfig {
  /** Maximum number of attempts (including initial request). Default from constants. */
  maxAttempts?: number;
  /** Delay before the first retry; doubles on every further retry. */
  baseDelayMs?: number;
  /** Maximum delay in ms between retries. */
  maxDelayMs?: number;
  sleep?: SleepFn;
}

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  query?: QueryParams;
  timeoutMs?: number;
  retry?: HttpRetryConfig;
}

/**
 * Request function signature shared by the real client and test mocks.
 * Resolves with the parsed JSON body, or undefined when the body is empty
 * or not valid JSON.
 */
export type HttpRequestFn = (req: HttpRequest) => Promise<unknown>;

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  /** Attempts made before giving up (1 for an immediate failure) */
  attempts?: number;
}

/**
 * Retry bookkeeping for a single logical request
 */
export interface RetryState {
  attempt: number;
  backoffMs: number;
}
