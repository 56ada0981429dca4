/**
 * hh.ru payload mappers — flatten a vacancy (plus optional detail) into a FlatRow
 */

import type { FlatRow, JsonObject, RawDetail, RawRecord } from "@/types";
import { DETAIL_LIST_SEPARATOR } from "@/constants/fetch";
import { isJsonObject } from "./responseParsing";

function readObject(source: JsonObject | undefined, key: string): JsonObject | undefined {
  const value = source?.[key];
  return isJsonObject(value) ? value : undefined;
}

/**
 * Strings pass through; numeric ids are stringified
 */
function readString(source: JsonObject | undefined, key: string): string | null {
  const value = source?.[key];
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}

function readNumber(source: JsonObject | undefined, key: string): number | null {
  const value = source?.[key];
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function readBoolean(source: JsonObject | undefined, key: string): boolean | null {
  const value = source?.[key];
  return typeof value === "boolean" ? value : null;
}

/**
 * Join the `name` of each element of a [{name}] list
 */
function joinNames(source: JsonObject | undefined, key: string): string | null {
  const value = source?.[key];
  if (!Array.isArray(value)) return null;

  const names: string[] = [];
  for (const entry of value) {
    const name = isJsonObject(entry) ? readString(entry, "name") : null;
    if (name) names.push(name);
  }
  return names.join(DETAIL_LIST_SEPARATOR);
}

/**
 * Map a vacancy list item to a FlatRow
 *
 * @param item - One element of GET /vacancies `items`
 * @param detail - GET /vacancies/{id} body; absent leaves every detail_* column null
 */
export function flattenVacancy(item: RawRecord, detail?: RawDetail): FlatRow {
  const employer = readObject(item, "employer");
  const area = readObject(item, "area");
  const salary = readObject(item, "salary");
  const snippet = readObject(item, "snippet");

  return {
    id: readString(item, "id"),
    name: readString(item, "name"),
    alternate_url: readString(item, "alternate_url"),
    employer_id: readString(employer, "id"),
    employer_name: readString(employer, "name"),
    area_id: readString(area, "id"),
    area_name: readString(area, "name"),
    salary_from: readNumber(salary, "from"),
    salary_to: readNumber(salary, "to"),
    salary_currency: readString(salary, "currency"),
    salary_gross: readBoolean(salary, "gross"),
    published_at: readString(item, "published_at"),
    schedule: readString(readObject(item, "schedule"), "name"),
    employment: readString(readObject(item, "employment"), "name"),
    requirement: readString(snippet, "requirement"),
    responsibility: readString(snippet, "responsibility"),
    detail_description_html: readString(detail, "description"),
    detail_key_skills: joinNames(detail, "key_skills"),
    detail_professional_roles: joinNames(detail, "professional_roles"),
  };
}

/**
 * Vacancy id used for detail lookups, if the record carries one
 */
export function getVacancyId(item: RawRecord): string | undefined {
  const id = readString(item, "id");
  return id && id.trim() !== "" ? id : undefined;
}
