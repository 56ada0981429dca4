/**
 * Fetch configuration — defaults, normalization and validation
 *
 * Everything here runs before the first request, so a bad configuration
 * never produces partial output.
 */

import type { FetchConfig, FetchConfigInput, IsoDate } from "@/types";
import {
  HH_DEFAULT_PAGE_SIZE,
  HH_MAX_PAGE_SIZE,
  HH_MIN_PAGE_SIZE,
} from "@/constants/clients/hh";
import { DEFAULT_REQUEST_DELAY_MS, DEFAULT_WINDOW_DAYS } from "@/constants/fetch";
import { addDays, formatIsoDate, parseIsoDate } from "@/utils/time/isoDate";
import { ConfigurationError } from "./configurationError";

const assertIntegerInRange = (name: string, value: number, min: number, max: number): void => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigurationError(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

const normalizeOptionalString = (value: string | undefined): string | undefined => {
  if (typeof value !== "string") return undefined;
  const normalized = value.trim();
  return normalized === "" ? undefined : normalized;
};

/**
 * Split a comma-separated list (or join several), trimming blanks
 */
export function parseList(value: string | readonly string[] | undefined): string[] {
  if (value === undefined) return [];
  const parts = typeof value === "string" ? value.split(",") : value.flatMap((v) => v.split(","));
  return parts.map((part) => part.trim()).filter((part) => part !== "");
}

function normalizeDate(name: string, value: string | undefined): IsoDate | undefined {
  const normalized = normalizeOptionalString(value);
  if (normalized === undefined) return undefined;

  const parsed = parseIsoDate(normalized);
  if (!parsed) {
    throw new ConfigurationError(`${name} must be a date in YYYY-MM-DD format. Received: ${normalized}`);
  }
  return formatIsoDate(parsed);
}

/**
 * Resolve the date range from explicit bounds or the last-N-days shorthand
 * (mutually exclusive). The shorthand covers N calendar days ending today (UTC).
 */
function resolveDateRange(
  input: FetchConfigInput,
  now: Date,
): { dateFrom?: IsoDate; dateTo?: IsoDate } {
  const dateFrom = normalizeDate("dateFrom", input.dateFrom);
  const dateTo = normalizeDate("dateTo", input.dateTo);

  if (input.lastDays !== undefined) {
    if (dateFrom !== undefined || dateTo !== undefined) {
      throw new ConfigurationError(
        "Use either lastDays or explicit dateFrom/dateTo, not both",
      );
    }
    assertIntegerInRange("lastDays", input.lastDays, 1, Number.MAX_SAFE_INTEGER);

    const today = parseIsoDate(formatIsoDate(now));
    if (!today) {
      throw new ConfigurationError(`Invalid current date: ${String(now)}`);
    }
    return {
      dateFrom: formatIsoDate(addDays(today, -(input.lastDays - 1))),
      dateTo: formatIsoDate(today),
    };
  }

  if (dateFrom !== undefined && dateTo !== undefined && dateFrom > dateTo) {
    throw new ConfigurationError(`dateFrom (${dateFrom}) must not be after dateTo (${dateTo})`);
  }

  return { dateFrom, dateTo };
}

/**
 * Apply defaults and validate fetch configuration
 *
 * @param now - Clock for the last-N-days shorthand
 * @throws {ConfigurationError} On contradictory, missing or out-of-range values
 */
export function resolveFetchConfig(input: FetchConfigInput, now: Date = new Date()): FetchConfig {
  const areas = parseList(input.areas);
  if (areas.length === 0) {
    throw new ConfigurationError("No valid areas provided");
  }

  const pageSize = input.pageSize ?? HH_DEFAULT_PAGE_SIZE;
  assertIntegerInRange("pageSize", pageSize, HH_MIN_PAGE_SIZE, HH_MAX_PAGE_SIZE);

  if (input.maxPages !== undefined) {
    assertIntegerInRange("maxPages", input.maxPages, 0, Number.MAX_SAFE_INTEGER);
  }

  const windowDays = input.windowDays ?? DEFAULT_WINDOW_DAYS;
  if (Number.isNaN(windowDays)) {
    throw new ConfigurationError("windowDays must be a number");
  }

  const delayMs = input.delayMs ?? DEFAULT_REQUEST_DELAY_MS;
  if (!Number.isFinite(delayMs) || delayMs < 0) {
    throw new ConfigurationError(`delayMs=${String(delayMs)} must be a non-negative number`);
  }

  const { dateFrom, dateTo } = resolveDateRange(input, now);

  return {
    text: normalizeOptionalString(input.text),
    areas,
    pageSize,
    maxPages: input.maxPages,
    dateFrom,
    dateTo,
    windowDays,
    employment: parseList(input.employment),
    schedule: parseList(input.schedule),
    delayMs,
    details: input.details ?? false,
  };
}
