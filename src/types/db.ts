/**
 * Database row types
 */

import type { FetchRunCounters } from "./fetch";
import type { RunStatus } from "./output";

export type FetchRunInput = {
  query_text: string | null;
  areas: string;
  date_from: string | null;
  date_to: string | null;
};

export type FetchRunUpdate = Partial<FetchRunCounters> & {
  finished_at?: string;
  status?: RunStatus;
};

export type FetchRun = FetchRunInput &
  FetchRunCounters & {
    id: number;
    started_at: string;
    finished_at: string | null;
    status: RunStatus | null;
  };
