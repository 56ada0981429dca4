/**
 * Fetch orchestrator — windows × areas × pages, with optional detail enrichment
 *
 * Produces FlatRows lazily and strictly sequentially:
 * windows ascending → areas in supplied order → pages ascending → items in
 * API order. Records are not deduplicated.
 */

import type {
  DateWindow,
  FetchAccumulator,
  FetchConfig,
  FetchConfigInput,
  FlatRow,
  SearchCriteria,
  SleepFn,
} from "@/types";
import type { HhClient } from "@/clients/hh";
import { flattenVacancy, getVacancyId } from "@/clients/hh";
import { resolveFetchConfig } from "@/config/fetchConfig";
import { MIN_DETAIL_DELAY_MS } from "@/constants/fetch";
import { sleep as defaultSleep } from "@/utils/time/sleep";
import { planWindows } from "./windowPlanner";
import { streamVacancies } from "./paginationDriver";
import { DetailEnricher } from "./detailEnricher";
import * as logger from "@/logger";

export type FetchDeps = {
  client: Pick<HhClient, "searchVacancies" | "getVacancy">;
  sleep?: SleepFn;
  /** Mutable counters, updated as the stream is consumed */
  accumulator?: FetchAccumulator;
  /** Clock for the last-N-days shorthand */
  now?: () => Date;
};

/**
 * Create a fresh accumulator with zeroed counters
 */
export function createFetchAccumulator(): FetchAccumulator {
  return {
    counters: {
      windows_planned: 0,
      searches_completed: 0,
      pages_fetched: 0,
      rows_emitted: 0,
      details_fetched: 0,
      details_failed: 0,
    },
  };
}

/**
 * Criteria for one (window, area) pair; static filters come from config
 */
export function buildSearchCriteria(
  config: FetchConfig,
  window: DateWindow,
  area: string,
): SearchCriteria {
  return {
    text: config.text,
    area,
    dateFrom: window.start,
    dateTo: window.end,
    employment: config.employment,
    schedule: config.schedule,
    pageSize: config.pageSize,
  };
}

/**
 * Pause owed after a detail request, paid before the next request of any
 * kind. Nothing is paid after the last request of a run.
 */
function createDetailPacer(sleep: SleepFn) {
  let pendingMs = 0;

  return {
    defer(ms: number): void {
      pendingMs = Math.max(pendingMs, ms);
    },
    async settle(): Promise<void> {
      if (pendingMs > 0) {
        const ms = pendingMs;
        pendingMs = 0;
        await sleep(ms);
      }
    },
  };
}

async function* generateRows(
  config: FetchConfig,
  windows: DateWindow[],
  deps: FetchDeps,
  acc: FetchAccumulator,
): AsyncGenerator<FlatRow> {
  const sleep = deps.sleep ?? defaultSleep;
  const detailDelayMs = Math.max(MIN_DETAIL_DELAY_MS, config.delayMs);
  const pacer = createDetailPacer(sleep);
  const client: FetchDeps["client"] = {
    searchVacancies: async (criteria, page) => {
      await pacer.settle();
      return deps.client.searchVacancies(criteria, page);
    },
    getVacancy: async (id) => {
      await pacer.settle();
      return deps.client.getVacancy(id);
    },
  };
  const enricher = config.details ? new DetailEnricher(client) : undefined;

  for (const window of windows) {
    for (const area of config.areas) {
      const criteria = buildSearchCriteria(config, window, area);
      let windowRows = 0;

      const records = streamVacancies(
        criteria,
        { maxPages: config.maxPages, delayMs: config.delayMs },
        { client, sleep, accumulator: acc },
      );

      for await (const record of records) {
        const id = enricher ? getVacancyId(record) : undefined;
        let row: FlatRow;

        if (enricher && id !== undefined) {
          const detail = await enricher.fetchDetail(id);
          if (detail) {
            acc.counters.details_fetched++;
          } else {
            acc.counters.details_failed++;
          }
          row = flattenVacancy(record, detail);
          pacer.defer(detailDelayMs);
        } else {
          row = flattenVacancy(record);
        }

        acc.counters.rows_emitted++;
        windowRows++;
        yield row;
      }

      acc.counters.searches_completed++;
      logger.info("Search finished", {
        area,
        dateFrom: window.start,
        dateTo: window.end,
        rows: windowRows,
      });
    }
  }

  logger.info("Fetch complete", { ...acc.counters });
}

/**
 * Validate the configuration, plan windows and return the lazy row stream
 *
 * Validation is synchronous: a ConfigurationError is thrown from this call,
 * before any request is made.
 *
 * @throws {ConfigurationError} On invalid configuration
 */
export function createFetchStream(
  input: FetchConfigInput,
  deps: FetchDeps,
): AsyncGenerator<FlatRow> {
  const config = resolveFetchConfig(input, deps.now?.() ?? new Date());
  const windows = planWindows(config.dateFrom, config.dateTo, config.windowDays);
  const acc = deps.accumulator ?? createFetchAccumulator();
  acc.counters.windows_planned = windows.length;

  logger.debug("Fetch planned", {
    windows: windows.length,
    areas: config.areas,
    details: config.details,
    maxPages: config.maxPages,
  });

  return generateRows(config, windows, deps, acc);
}
