/**
 * hh.ru raw API payload types
 *
 * Vacancy list items and details are kept as opaque JSON objects; the
 * flattener reads the fields it needs with type guards:
 *
 *   item:   id, name, url, alternate_url, employer{id,name}, area{id,name},
 *           salary{from,to,currency,gross}, published_at, schedule{name},
 *           employment{name}, snippet{requirement,responsibility}
 *   detail: description, key_skills[{name}], professional_roles[{name}]
 */

export type JsonObject = Record<string, unknown>;

export type HhVacancyItem = JsonObject;

export type HhVacancyDetail = JsonObject;

/**
 * GET /vacancies response after structural validation
 */
export type HhVacancyPage = {
  items: HhVacancyItem[];
  /** Page count reported by the API; 0 when missing or invalid */
  pages: number;
};
