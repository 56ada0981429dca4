/**
 * Integration tests for the SQLite sink
 *
 * Real better-sqlite3 database in a temp directory; migrations are read from
 * the repository's migrations/ folder.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { SqliteSink } from "@/output";
import {
  closeDb,
  countVacanciesByRun,
  getFetchRunById,
  listVacanciesByRun,
  openDb,
  runMigrations,
} from "@/db";
import { flattenVacancy } from "@/clients/hh";
import { createFetchAccumulator } from "@/fetch";
import { createTempDir, type TempDir } from "../../helpers/testDb";
import { makeDetail, makeVacancy } from "../../helpers/vacancyFixtures";

describe("SqliteSink", () => {
  let tmp: TempDir;

  beforeEach(() => {
    tmp = createTempDir();
  });

  afterEach(() => {
    tmp.cleanup();
  });

  it("should store rows in order and finalize the run", async () => {
    const path = tmp.file("vacancies.db");
    const sink = new SqliteSink(
      path,
      { text: "analyst", areas: ["1", "2"], dateFrom: "2025-09-01", dateTo: "2025-09-03" },
      2,
    );
    const counters = {
      ...createFetchAccumulator().counters,
      windows_planned: 3,
      rows_emitted: 3,
    };

    await sink.write(flattenVacancy(makeVacancy("1"), makeDetail("1")));
    await sink.write(flattenVacancy(makeVacancy("2")));
    await sink.write(flattenVacancy(makeVacancy("1")));
    await sink.close("success", counters);

    openDb(path);
    expect(countVacanciesByRun(sink.runId)).toBe(3);

    const stored = listVacanciesByRun(sink.runId);
    expect(stored.map((row) => row.id)).toEqual(["1", "2", "1"]);
    expect(stored[0]).toMatchObject({
      employer_name: "Employer 1",
      salary_from: 100000,
      salary_gross: 0,
      detail_key_skills: "SQL, Python",
    });
    expect(stored[1].detail_key_skills).toBeNull();

    const run = getFetchRunById(sink.runId);
    expect(run).toMatchObject({
      status: "success",
      query_text: "analyst",
      areas: "1,2",
      date_from: "2025-09-01",
      date_to: "2025-09-03",
      windows_planned: 3,
      rows_emitted: 3,
    });
    expect(run?.finished_at).not.toBeNull();
  });

  it("should keep received rows and record failure", async () => {
    const path = tmp.file("failed.db");
    const sink = new SqliteSink(path, { areas: ["1"] });

    await sink.write(flattenVacancy(makeVacancy("10")));
    await sink.close("failure");
    await sink.close("success");

    openDb(path);
    expect(countVacanciesByRun(sink.runId)).toBe(1);
    expect(getFetchRunById(sink.runId)).toMatchObject({ status: "failure", query_text: null });
  });

  it("should append a new run to an existing database", async () => {
    const path = tmp.file("shared.db");

    const first = new SqliteSink(path, { areas: ["1"] });
    await first.write(flattenVacancy(makeVacancy("1")));
    await first.close("success");

    const second = new SqliteSink(path, { areas: ["2"] });
    await second.write(flattenVacancy(makeVacancy("2")));
    await second.write(flattenVacancy(makeVacancy("3")));
    await second.close("success");

    expect(second.runId).toBe(first.runId + 1);

    const db = openDb(path);
    expect(countVacanciesByRun(first.runId)).toBe(1);
    expect(countVacanciesByRun(second.runId)).toBe(2);
    // Migrations are recorded once
    expect(runMigrations(db)).toEqual([]);
    closeDb();
  });
});
