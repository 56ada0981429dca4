/**
 * Vacancies repository
 *
 * Data access layer for vacancies table. Rows are appended as received;
 * repeated vacancy ids are kept.
 */

import type { FlatRow } from "@/types";
import { FLAT_ROW_COLUMNS } from "@/constants/fetch";
import { getDb } from "../connection";

type SqliteValue = string | number | null;

function toSqliteValue(value: FlatRow[keyof FlatRow]): SqliteValue {
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  return value;
}

/**
 * Insert a batch of rows in one transaction
 *
 * @returns Number of rows inserted
 */
export function insertVacancies(runId: number, rows: readonly FlatRow[]): number {
  if (rows.length === 0) {
    return 0;
  }

  const db = getDb();
  const columns = ["run_id", ...FLAT_ROW_COLUMNS];
  const statement = db.prepare(
    `INSERT INTO vacancies (${columns.join(", ")}) VALUES (${columns.map(() => "?").join(", ")})`,
  );

  const insertAll = db.transaction((batch: readonly FlatRow[]) => {
    for (const row of batch) {
      statement.run(runId, ...FLAT_ROW_COLUMNS.map((column) => toSqliteValue(row[column])));
    }
  });
  insertAll(rows);

  return rows.length;
}

export function countVacanciesByRun(runId: number): number {
  const db = getDb();
  const result = db
    .prepare("SELECT COUNT(*) AS count FROM vacancies WHERE run_id = ?")
    .get(runId) as { count: number };
  return result.count;
}

/**
 * Stored rows of one run, in insertion order (salary_gross as 0/1)
 */
export function listVacanciesByRun(runId: number): Array<Record<string, unknown>> {
  const db = getDb();
  return db
    .prepare(
      `SELECT ${FLAT_ROW_COLUMNS.join(", ")} FROM vacancies WHERE run_id = ? ORDER BY row_id`,
    )
    .all(runId) as Array<Record<string, unknown>>;
}
