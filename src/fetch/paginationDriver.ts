/**
 * Pagination driver — pages through GET /vacancies for one (area, window)
 *
 * INIT ──fetch──▶ PAGING ──fetch──▶ … ──▶ DONE
 *   │                                     ▲
 *   └──── page cap / last page / malformed┘
 *
 * Transitions are pure functions so termination rules can be tested without
 * any I/O; streamVacancies wires them to the client.
 */

import type {
  FetchAccumulator,
  HhVacancyPage,
  PaginationOptions,
  PaginationState,
  RawRecord,
  SearchCriteria,
  SleepFn,
} from "@/types";
import type { HhClient } from "@/clients/hh";
import { MalformedResponseError } from "@/clients/hh";
import { sleep as defaultSleep } from "@/utils/time/sleep";
import * as logger from "@/logger";

type ActivePaginationState = Exclude<PaginationState, { status: "DONE" }>;

export function initialPaginationState(): PaginationState {
  return { status: "INIT", page: 0 };
}

/**
 * Stop before fetching once the page index passes the cap.
 * The cap is inclusive: maxPages = 0 still fetches page 0.
 */
export function applyPageCap(state: PaginationState, maxPages?: number): PaginationState {
  if (state.status === "DONE") {
    return state;
  }
  if (maxPages !== undefined && state.page > maxPages) {
    return { status: "DONE", page: state.page, reason: "max_pages" };
  }
  return state;
}

/**
 * Advance after a page was received. The page count is captured from the
 * first response only; later responses cannot extend or shrink the run.
 */
export function advanceAfterPage(
  state: ActivePaginationState,
  reportedPages: number,
): PaginationState {
  const totalPages = state.status === "INIT" ? reportedPages : state.totalPages;
  const page = state.page + 1;

  if (page >= totalPages) {
    return { status: "DONE", page, reason: "exhausted" };
  }
  return { status: "PAGING", page, totalPages };
}

export function markMalformed(state: ActivePaginationState): PaginationState {
  return { status: "DONE", page: state.page, reason: "malformed" };
}

export type PaginationDeps = {
  client: Pick<HhClient, "searchVacancies">;
  sleep?: SleepFn;
  accumulator?: FetchAccumulator;
};

/**
 * Lazily yield every vacancy for the criteria, page by page, in API order
 *
 * @throws {FatalHttpError} When a page request fails for good; the caller's run aborts
 */
export async function* streamVacancies(
  criteria: SearchCriteria,
  options: PaginationOptions,
  deps: PaginationDeps,
): AsyncGenerator<RawRecord> {
  const sleep = deps.sleep ?? defaultSleep;
  const log = logger.withContext({
    area: criteria.area,
    dateFrom: criteria.dateFrom,
    dateTo: criteria.dateTo,
  });

  let state = applyPageCap(initialPaginationState(), options.maxPages);
  let pagesFetched = 0;

  while (state.status !== "DONE") {
    const current = state;
    let response: HhVacancyPage;
    try {
      response = await deps.client.searchVacancies(criteria, current.page);
    } catch (error) {
      if (error instanceof MalformedResponseError) {
        log.warn("Malformed vacancy page, treating as no results", {
          page: current.page,
          error: error.message,
        });
        state = markMalformed(current);
        break;
      }
      throw error;
    }

    pagesFetched++;
    if (deps.accumulator) {
      deps.accumulator.counters.pages_fetched++;
    }

    for (const item of response.items) {
      yield item;
    }

    // Cap before pacing so the last allowed page is not followed by a delay
    state = applyPageCap(advanceAfterPage(current, response.pages), options.maxPages);
    if (state.status !== "DONE") {
      await sleep(options.delayMs);
    }
  }

  log.debug("Pagination finished", {
    reason: state.status === "DONE" ? state.reason : undefined,
    pagesFetched,
  });
}
