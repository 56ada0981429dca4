/**
 * SQLite sink — appends rows to the vacancies table and records the run
 *
 * Rows are buffered and inserted in batched transactions; the fetch_runs row
 * is finalized with counters and status on close.
 */

import type { FetchConfig, FetchRunCounters, FlatRow, RowSink, RunStatus } from "@/types";
import {
  closeDb,
  createFetchRun,
  finishFetchRun,
  insertVacancies,
  openDb,
  runMigrations,
} from "@/db";
import { SQLITE_INSERT_BATCH_SIZE } from "@/constants/output";

export type SqliteRunInfo = Pick<FetchConfig, "text" | "areas" | "dateFrom" | "dateTo">;

export class SqliteSink implements RowSink {
  readonly runId: number;
  private buffer: FlatRow[] = [];
  private closed = false;

  constructor(
    readonly path: string,
    run: SqliteRunInfo,
    private readonly batchSize = SQLITE_INSERT_BATCH_SIZE,
  ) {
    const db = openDb(path);
    runMigrations(db);
    this.runId = createFetchRun({
      query_text: run.text ?? null,
      areas: run.areas.join(","),
      date_from: run.dateFrom ?? null,
      date_to: run.dateTo ?? null,
    });
  }

  async write(row: FlatRow): Promise<void> {
    this.buffer.push(row);
    if (this.buffer.length >= this.batchSize) {
      this.flush();
    }
  }

  private flush(): void {
    insertVacancies(this.runId, this.buffer);
    this.buffer = [];
  }

  async close(status: RunStatus, counters?: FetchRunCounters): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    try {
      // Rows already received are kept even when the run failed
      this.flush();
      finishFetchRun(this.runId, {
        ...counters,
        status,
        finished_at: new Date().toISOString(),
      });
    } finally {
      closeDb();
    }
  }
}
