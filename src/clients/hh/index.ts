export { HhClient } from "./hhClient";
export type { HhClientConfig } from "./hhClient";
export { flattenVacancy, getVacancyId } from "./mappers";
export {
  MalformedResponseError,
  isJsonObject,
  parsePageCount,
  parseVacancyDetail,
  parseVacancyPage,
} from "./responseParsing";
