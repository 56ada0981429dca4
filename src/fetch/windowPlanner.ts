/**
 * Window planner — split a date range into fixed-width, contiguous windows
 *
 * Narrow windows keep each query's result set under the depth the API lets
 * us page through.
 */

import type { DateWindow, IsoDate } from "@/types";
import { ConfigurationError } from "@/config/configurationError";
import { addDays, formatIsoDate, parseIsoDate } from "@/utils/time/isoDate";

/**
 * Window width in whole days, at least 1
 */
export function clampWindowSize(windowSizeDays: number): number {
  if (!Number.isFinite(windowSizeDays) || windowSizeDays < 1) {
    return 1;
  }
  return Math.floor(windowSizeDays);
}

function requireDate(name: string, value: IsoDate): Date {
  const parsed = parseIsoDate(value);
  if (!parsed) {
    throw new ConfigurationError(`${name} must be a date in YYYY-MM-DD format. Received: ${value}`);
  }
  return parsed;
}

/**
 * Plan the query windows for a date range
 *
 * - Either bound missing: one open window carrying the bounds unchanged
 * - Both present: ascending windows of `windowSizeDays` days (the last may be
 *   shorter) that exactly cover [start, end]
 * - start after end: no windows
 */
export function planWindows(
  start: IsoDate | undefined,
  end: IsoDate | undefined,
  windowSizeDays: number,
): DateWindow[] {
  if (!start || !end) {
    const window: DateWindow = {};
    if (start) window.start = start;
    if (end) window.end = end;
    return [window];
  }

  const from = requireDate("start", start);
  const to = requireDate("end", end);
  const size = clampWindowSize(windowSizeDays);

  const windows: DateWindow[] = [];
  let cursor = from;
  while (cursor.getTime() <= to.getTime()) {
    const candidateEnd = addDays(cursor, size - 1);
    const windowEnd = candidateEnd.getTime() > to.getTime() ? to : candidateEnd;
    windows.push({ start: formatIsoDate(cursor), end: formatIsoDate(windowEnd) });
    cursor = addDays(windowEnd, 1);
  }

  return windows;
}
