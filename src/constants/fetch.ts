/**
 * Fetch engine constants
 */

import type { FlatRowColumn } from "@/types";

/**
 * Default comma-separated area list (1 = Moscow)
 */
export const DEFAULT_AREAS = "1";

/**
 * Default window width for explicit date ranges
 */
export const DEFAULT_WINDOW_DAYS = 1;

/**
 * Delay between successive page requests (milliseconds)
 */
export const DEFAULT_REQUEST_DELAY_MS = 500;

/**
 * Lower bound for the pause after each detail request
 */
export const MIN_DETAIL_DELAY_MS = 250;

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Separator for multi-valued detail fields (key skills, roles)
 */
export const DETAIL_LIST_SEPARATOR = ", ";

/**
 * Output column order
 */
export const FLAT_ROW_COLUMNS: readonly FlatRowColumn[] = [
  "id",
  "name",
  "alternate_url",
  "employer_id",
  "employer_name",
  "area_id",
  "area_name",
  "salary_from",
  "salary_to",
  "salary_currency",
  "salary_gross",
  "published_at",
  "schedule",
  "employment",
  "requirement",
  "responsibility",
  "detail_description_html",
  "detail_key_skills",
  "detail_professional_roles",
];
