/**
 * Fetch runs repository
 *
 * Data access layer for fetch_runs table.
 */

import type { FetchRun, FetchRunInput, FetchRunUpdate } from "@/types";
import { getDb } from "../connection";

/**
 * Create a new fetch run
 * Returns the run id
 */
export function createFetchRun(input: FetchRunInput): number {
  const db = getDb();

  const result = db
    .prepare(
      `
    INSERT INTO fetch_runs (query_text, areas, date_from, date_to)
    VALUES (?, ?, ?, ?)
  `,
    )
    .run(input.query_text, input.areas, input.date_from, input.date_to);

  return Number(result.lastInsertRowid);
}

const UPDATABLE_COLUMNS = [
  "finished_at",
  "status",
  "windows_planned",
  "searches_completed",
  "pages_fetched",
  "rows_emitted",
  "details_fetched",
  "details_failed",
] as const;

/**
 * Update/finish a fetch run
 */
export function finishFetchRun(runId: number, update: FetchRunUpdate): void {
  const db = getDb();

  const fields: string[] = [];
  const values: Array<string | number> = [];

  for (const column of UPDATABLE_COLUMNS) {
    const value = update[column];
    if (value !== undefined) {
      fields.push(`${column} = ?`);
      values.push(value);
    }
  }

  if (fields.length === 0) {
    return;
  }

  values.push(runId);
  db.prepare(`UPDATE fetch_runs SET ${fields.join(", ")} WHERE id = ?`).run(...values);
}

export function getFetchRunById(runId: number): FetchRun | undefined {
  const db = getDb();
  return db.prepare("SELECT * FROM fetch_runs WHERE id = ?").get(runId) as
    | FetchRun
    | undefined;
}
