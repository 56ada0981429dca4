/**
 * HhClient — API client for the hh.ru public vacancies API
 *
 * One call = one logical request (with retries). Pagination and pacing
 * live in the fetch engine, not here.
 */

import type {
  HhVacancyDetail,
  HhVacancyPage,
  HttpRequestFn,
  HttpRetryConfig,
  QueryParams,
  SearchCriteria,
} from "@/types";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import { HH_BASE_URL, HH_VACANCIES_PATH } from "@/constants/clients/hh";
import { DEFAULT_HTTP_TIMEOUT_MS } from "@/constants/clients/http";
import { ConfigurationError } from "@/config/configurationError";
import { parseVacancyDetail, parseVacancyPage } from "./responseParsing";
import * as logger from "@/logger";

export interface HhClientConfig {
  /**
   * Identifying User-Agent; the API rejects anonymous clients
   */
  userAgent: string;

  /**
   * API base URL. Defaults to HH_BASE_URL
   */
  baseUrl?: string;

  /**
   * Per-attempt timeout in milliseconds
   */
  timeoutMs?: number;

  /**
   * Retry policy passed to every request (attempts, backoff, sleep)
   */
  retry?: HttpRetryConfig;

  /**
   * Optional HTTP request function (for testing/mocking)
   * Defaults to production httpRequest implementation
   */
  httpRequest?: HttpRequestFn;
}

/**
 * Validate an absolute http(s) base URL and strip trailing slashes
 */
function normalizeBaseUrl(value: string): string {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new ConfigurationError(
      `API base URL must be a valid absolute http/https URL. Received: ${value}`,
    );
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigurationError(
      `API base URL must use http or https scheme. Received: ${value}`,
    );
  }
  return value.replace(/\/+$/, "");
}

export class HhClient {
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly retry?: HttpRetryConfig;
  private readonly httpRequest: HttpRequestFn;

  constructor(config: HhClientConfig) {
    const userAgent = config.userAgent.trim();
    if (!userAgent) {
      throw new ConfigurationError(
        "User-Agent is required by the hh.ru API. Set --user-agent or HH_USER_AGENT.",
      );
    }

    this.userAgent = userAgent;
    this.baseUrl = normalizeBaseUrl(config.baseUrl ?? HH_BASE_URL);
    this.timeoutMs = config.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.retry = config.retry;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;

    logger.debug("HhClient initialized", { baseUrl: this.baseUrl });
  }

  get vacanciesUrl(): string {
    return `${this.baseUrl}${HH_VACANCIES_PATH}`;
  }

  /**
   * Build list query parameters; absent or empty criteria are omitted
   */
  buildSearchQuery(criteria: SearchCriteria, page: number): QueryParams {
    const params: QueryParams = {};

    if (criteria.text) {
      params.text = criteria.text;
    }
    params.area = criteria.area;
    params.per_page = criteria.pageSize;
    params.page = page;

    if (criteria.dateFrom) {
      params.date_from = criteria.dateFrom;
    }
    if (criteria.dateTo) {
      params.date_to = criteria.dateTo;
    }
    if (criteria.employment && criteria.employment.length > 0) {
      params.employment = [...criteria.employment];
    }
    if (criteria.schedule && criteria.schedule.length > 0) {
      params.schedule = [...criteria.schedule];
    }

    return params;
  }

  /**
   * Fetch one page of search results
   *
   * @throws {FatalHttpError} On a non-retryable status or exhausted retries
   * @throws {MalformedResponseError} If the body lacks an items array
   */
  async searchVacancies(criteria: SearchCriteria, page: number): Promise<HhVacancyPage> {
    const url = this.vacanciesUrl;
    const body = await this.httpRequest({
      method: "GET",
      url,
      headers: { "User-Agent": this.userAgent },
      query: this.buildSearchQuery(criteria, page),
      timeoutMs: this.timeoutMs,
      retry: this.retry,
    });

    return parseVacancyPage(body, url);
  }

  /**
   * Fetch the extended fields of a single vacancy
   *
   * @throws {FatalHttpError} On a non-retryable status (e.g. 404) or exhausted retries
   * @throws {MalformedResponseError} If the body is not an object
   */
  async getVacancy(id: string): Promise<HhVacancyDetail> {
    const url = `${this.vacanciesUrl}/${encodeURIComponent(id)}`;
    const body = await this.httpRequest({
      method: "GET",
      url,
      headers: { "User-Agent": this.userAgent },
      timeoutMs: this.timeoutMs,
      retry: this.retry,
    });

    return parseVacancyDetail(body, url);
  }
}
