/**
 * Structural validation of hh.ru responses
 *
 * Only the presence and shape of the fields the fetch engine relies on are
 * checked; business semantics are left to the API.
 */

import type { HhVacancyDetail, HhVacancyPage, JsonObject } from "@/types";
import * as logger from "@/logger";

/**
 * Response body does not have the expected structure
 */
export class MalformedResponseError extends Error {
  public readonly url: string;

  constructor(message: string, url: string) {
    super(`${message} - ${url}`);
    this.name = "MalformedResponseError";
    this.url = url;
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read the API-reported page count. Missing, negative or non-numeric
 * values count as 0 (no results).
 */
export function parsePageCount(value: unknown): number {
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.max(0, Math.trunc(value));
  }
  if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    return Number.parseInt(value.trim(), 10);
  }
  return 0;
}

/**
 * Validate a GET /vacancies body
 *
 * @throws {MalformedResponseError} If the body is not an object or `items` is not an array
 */
export function parseVacancyPage(body: unknown, url: string): HhVacancyPage {
  if (!isJsonObject(body)) {
    throw new MalformedResponseError("Vacancy list body is not a JSON object", url);
  }
  if (!Array.isArray(body.items)) {
    throw new MalformedResponseError("Vacancy list body has no items array", url);
  }

  const items: JsonObject[] = [];
  body.items.forEach((item: unknown, index: number) => {
    if (isJsonObject(item)) {
      items.push(item);
    } else {
      logger.warn("Skipping non-object vacancy item", { url, index });
    }
  });

  return { items, pages: parsePageCount(body.pages) };
}

/**
 * Validate a GET /vacancies/{id} body
 *
 * @throws {MalformedResponseError} If the body is not an object
 */
export function parseVacancyDetail(body: unknown, url: string): HhVacancyDetail {
  if (!isJsonObject(body)) {
    throw new MalformedResponseError("Vacancy detail body is not a JSON object", url);
  }
  return body;
}
