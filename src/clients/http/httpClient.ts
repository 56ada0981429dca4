/**
 * HTTP client wrapper — JSON GET client using native fetch
 * Supports timeouts, repeated query params and bounded exponential backoff
 */

import type { HttpRequest, QueryParams, RetryState } from "@/types";
import { FatalHttpError, TransientHttpError } from "./httpError";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_JSON_HEADERS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_DELAY_MS,
  RETRYABLE_STATUS_CODES,
} from "@/constants/clients/http";
import { sleep as defaultSleep } from "@/utils/time/sleep";
import * as logger from "@/logger";

/**
 * Build URL with query parameters (arrays become repeated params)
 */
export function buildUrl(baseUrl: string, query?: QueryParams): string {
  if (!query || Object.keys(query).length === 0) {
    return baseUrl;
  }

  const url = new URL(baseUrl);
  Object.entries(query).forEach(([key, value]) => {
    if (Array.isArray(value)) {
      value.forEach((item) => url.searchParams.append(key, String(item)));
    } else {
      url.searchParams.append(key, String(value));
    }
  });

  return url.toString();
}

/**
 * Extract a snippet of the error response body for debugging
 */
async function extractBodySnippet(response: Response): Promise<string | undefined> {
  try {
    const text = await response.text();
    if (!text) {
      return undefined;
    }
    return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
      ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
      : text;
  } catch {
    return undefined;
  }
}

/**
 * 429 and every 5xx are transient
 */
export function isStatusRetryable(status: number): boolean {
  return RETRYABLE_STATUS_CODES.includes(status) || (status >= 500 && status < 600);
}

/**
 * Transient HTTP statuses, timeouts (AbortError) and network failures (TypeError)
 */
function isErrorRetryable(error: unknown): boolean {
  if (error instanceof TransientHttpError) {
    return true;
  }
  if (error instanceof FatalHttpError) {
    return false;
  }
  if (error instanceof Error) {
    return error.name === "AbortError" || error.name === "TypeError";
  }
  return false;
}

/**
 * Backoff after a failed attempt: doubles each time, capped
 */
export function nextRetryState(state: RetryState, maxDelayMs: number): RetryState {
  return {
    attempt: state.attempt + 1,
    backoffMs: Math.min(state.backoffMs * 2, maxDelayMs),
  };
}

/**
 * Perform a single HTTP request attempt (no retries)
 */
async function performRequest(
  req: HttpRequest,
  url: string,
  timeoutMs: number,
  attempt: number,
): Promise<unknown> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    // Defaults first, caller headers override
    const headers: Record<string, string> = {
      ...DEFAULT_JSON_HEADERS,
      ...req.headers,
    };

    const response = await fetch(url, {
      method: req.method,
      headers,
      signal: controller.signal,
    });

    if (!response.ok) {
      const details = {
        status: response.status,
        statusText: response.statusText,
        url,
        bodySnippet: await extractBodySnippet(response),
        attempts: attempt,
      };
      throw isStatusRetryable(response.status)
        ? new TransientHttpError(details)
        : new FatalHttpError(details);
    }

    const text = await response.text();
    if (!text) {
      return undefined;
    }

    try {
      return JSON.parse(text);
    } catch (parseError) {
      logger.warn("JSON parse failed", {
        method: req.method,
        url,
        status: response.status,
        contentType: response.headers.get("content-type") ?? "none",
        error: parseError instanceof Error ? parseError.message : String(parseError),
      });
      // Callers treat an undefined body as malformed
      return undefined;
    }
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Perform a GET request with timeout, retries and error handling
 *
 * Retries on:
 * - HTTP 429 (Too Many Requests) and 5xx
 * - Timeouts and network errors (no response received)
 *
 * Backoff starts at baseDelayMs and doubles per retry up to maxDelayMs.
 * No sleep follows the final attempt.
 *
 * @returns Parsed JSON body, or undefined for an empty/non-JSON body
 * @throws {FatalHttpError} On a non-retryable status, or when retries are exhausted
 * @throws {Error} On network errors or timeouts after retries are exhausted
 */
export async function httpRequest(req: HttpRequest): Promise<unknown> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const url = buildUrl(req.url, req.query);

  const maxAttempts = Math.max(1, req.retry?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const maxDelayMs = req.retry?.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  const sleep = req.retry?.sleep ?? defaultSleep;

  let state: RetryState = {
    attempt: 1,
    backoffMs: Math.min(req.retry?.baseDelayMs ?? DEFAULT_BASE_DELAY_MS, maxDelayMs),
  };
  let lastError: unknown;

  while (state.attempt <= maxAttempts) {
    try {
      return await performRequest(req, url, timeoutMs, state.attempt);
    } catch (error) {
      lastError = error;

      if (!isErrorRetryable(error)) {
        throw error;
      }

      if (state.attempt >= maxAttempts) {
        break;
      }

      logger.debug("Retrying HTTP request", {
        method: req.method,
        url: req.url,
        attempt: state.attempt,
        maxAttempts,
        delayMs: state.backoffMs,
        reason: error instanceof TransientHttpError
          ? `status ${error.status}`
          : error instanceof Error
            ? error.name
            : String(error),
      });

      await sleep(state.backoffMs);
      state = nextRetryState(state, maxDelayMs);
    }
  }

  // Retries exhausted: a transient status escalates to the fatal kind
  if (lastError instanceof TransientHttpError) {
    throw new FatalHttpError({ ...lastError.details(), attempts: maxAttempts });
  }
  throw lastError;
}
