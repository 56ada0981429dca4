/**
 * HTTP client public API
 */

export { httpRequest, buildUrl, isStatusRetryable, nextRetryState } from "./httpClient";
export { HttpError, TransientHttpError, FatalHttpError } from "./httpError";
export type {
  HttpRequest,
  HttpRequestFn,
  HttpMethod,
  HttpErrorDetails,
  HttpRetryConfig,
  QueryParams,
  RetryState,
  SleepFn,
} from "@/types";
