/**
 * HTTP error classes — structured errors for HTTP failures
 *
 * TransientHttpError (429/5xx) is retried inside httpRequest and never
 * escapes it; callers only ever see FatalHttpError.
 */

import type { HttpErrorDetails } from "@/types";

/**
 * Base class: status, URL and an optional response body snippet
 */
export class HttpError extends Error {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  public readonly bodySnippet?: string;
  public readonly attempts: number;

  constructor(details: HttpErrorDetails) {
    super(
      `HTTP ${details.status} ${details.statusText} - ${details.url}${
        details.bodySnippet ? ` - ${details.bodySnippet}` : ""
      }`,
    );
    this.name = "HttpError";
    this.status = details.status;
    this.statusText = details.statusText;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;
    this.attempts = details.attempts ?? 1;

    // Maintain proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  details(): HttpErrorDetails {
    return {
      status: this.status,
      statusText: this.statusText,
      url: this.url,
      bodySnippet: this.bodySnippet,
      attempts: this.attempts,
    };
  }
}

/**
 * Retryable failure (429 or 5xx) for a single attempt
 */
export class TransientHttpError extends HttpError {
  constructor(details: HttpErrorDetails) {
    super(details);
    this.name = "TransientHttpError";
  }
}

/**
 * Non-retryable status, or retries exhausted
 */
export class FatalHttpError extends HttpError {
  constructor(details: HttpErrorDetails) {
    super(details);
    this.name = "FatalHttpError";
  }
}
