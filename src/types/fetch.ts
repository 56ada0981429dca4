/**
 * Fetch engine type definitions
 *
 * Shapes shared by the window planner, pagination driver, detail enricher
 * and orchestrator.
 */

import type { HhVacancyDetail, HhVacancyItem } from "./clients/hh";

/**
 * Calendar date in YYYY-MM-DD form
 */
export type IsoDate = string;

/**
 * One element of a date-range partition. Either bound may be absent for an
 * open (unfiltered) query.
 */
export type DateWindow = {
  start?: IsoDate;
  end?: IsoDate;
};

/**
 * Criteria for one pagination run (one area × one window)
 */
export type SearchCriteria = {
  readonly text?: string;
  readonly area: string;
  readonly dateFrom?: IsoDate;
  readonly dateTo?: IsoDate;
  readonly employment?: readonly string[];
  readonly schedule?: readonly string[];
  readonly pageSize: number;
};

export type RawRecord = HhVacancyItem;

export type RawDetail = HhVacancyDetail;

/**
 * Pagination state machine
 *
 * - INIT: nothing fetched yet, page 0
 * - PAGING: page count known, next page to fetch
 * - DONE: terminal
 */
export type PaginationDoneReason = "exhausted" | "max_pages" | "malformed";

export type PaginationState =
  | { status: "INIT"; page: 0 }
  | { status: "PAGING"; page: number; totalPages: number }
  | { status: "DONE"; page: number; reason: PaginationDoneReason };

/**
 * Options that shape a pagination run but are not search criteria
 */
export type PaginationOptions = {
  /** Highest 0-based page index to fetch (inclusive); undefined = no cap */
  maxPages?: number;
  /** Delay between successive page requests */
  delayMs: number;
};

/**
 * Fixed-schema tabular row. Column order is FLAT_ROW_COLUMNS.
 */
export type FlatRow = {
  readonly id: string | null;
  readonly name: string | null;
  readonly alternate_url: string | null;
  readonly employer_id: string | null;
  readonly employer_name: string | null;
  readonly area_id: string | null;
  readonly area_name: string | null;
  readonly salary_from: number | null;
  readonly salary_to: number | null;
  readonly salary_currency: string | null;
  readonly salary_gross: boolean | null;
  readonly published_at: string | null;
  readonly schedule: string | null;
  readonly employment: string | null;
  readonly requirement: string | null;
  readonly responsibility: string | null;
  readonly detail_description_html: string | null;
  readonly detail_key_skills: string | null;
  readonly detail_professional_roles: string | null;
};

export type FlatRowColumn = keyof FlatRow;

/**
 * Fetch configuration as supplied by the CLI layer (unvalidated)
 */
export type FetchConfigInput = {
  text?: string;
  /** Area ids, or a comma-separated list */
  areas: string | string[];
  pageSize?: number;
  maxPages?: number;
  dateFrom?: string;
  dateTo?: string;
  lastDays?: number;
  windowDays?: number;
  employment?: string[];
  schedule?: string[];
  delayMs?: number;
  details?: boolean;
};

/**
 * Validated fetch configuration
 */
export type FetchConfig = {
  text?: string;
  areas: string[];
  pageSize: number;
  maxPages?: number;
  dateFrom?: IsoDate;
  dateTo?: IsoDate;
  windowDays: number;
  employment: string[];
  schedule: string[];
  delayMs: number;
  details: boolean;
};

/**
 * Counters accumulated while a fetch stream is consumed
 */
export type FetchRunCounters = {
  windows_planned: number;
  searches_completed: number;
  pages_fetched: number;
  rows_emitted: number;
  details_fetched: number;
  details_failed: number;
};

export type FetchAccumulator = {
  counters: FetchRunCounters;
};
