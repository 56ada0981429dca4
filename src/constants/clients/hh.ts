/**
 * hh.ru client constants — base URL, endpoint paths, pagination bounds
 */

export const HH_BASE_URL = "https://api.hh.ru";

/**
 * List/search endpoint path; detail is `${HH_VACANCIES_PATH}/{id}`
 */
export const HH_VACANCIES_PATH = "/vacancies";

/**
 * Items per page accepted by the API
 */
export const HH_MIN_PAGE_SIZE = 1;
export const HH_MAX_PAGE_SIZE = 100;
export const HH_DEFAULT_PAGE_SIZE = 100;

/**
 * The API rejects requests without a User-Agent; include a contact address
 */
export const HH_DEFAULT_USER_AGENT =
  "HhVacancyFetcher/1.0 (+contact: your-email@example.com)";
