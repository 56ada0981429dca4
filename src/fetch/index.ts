/**
 * Fetch engine public API
 */

export { planWindows, clampWindowSize } from "./windowPlanner";
export {
  streamVacancies,
  initialPaginationState,
  applyPageCap,
  advanceAfterPage,
  markMalformed,
} from "./paginationDriver";
export type { PaginationDeps } from "./paginationDriver";
export { DetailEnricher } from "./detailEnricher";
export {
  createFetchStream,
  createFetchAccumulator,
  buildSearchCriteria,
} from "./fetchOrchestrator";
export type { FetchDeps } from "./fetchOrchestrator";
