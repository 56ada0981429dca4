/**
 * Output sink type definitions
 */

import type { FetchRunCounters, FlatRow } from "./fetch";

export type OutputFormat = "csv" | "sqlite";

export type RunStatus = "success" | "failure";

/**
 * Destination for flattened rows. Rows arrive one at a time in stream order.
 */
export interface RowSink {
  readonly path: string;
  write(row: FlatRow): Promise<void>;
  /** Flush and release the destination; called exactly once */
  close(status: RunStatus, counters?: FetchRunCounters): Promise<void>;
}
