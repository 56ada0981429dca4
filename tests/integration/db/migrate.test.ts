/**
 * Integration tests for the migration runner
 *
 * In-memory database; migrations come from the repository's migrations/ folder.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { closeDb, openDb, runMigrations } from "@/db";
import { createTempDir, type TempDir } from "../../helpers/testDb";

describe("runMigrations", () => {
  let tmp: TempDir | undefined;

  afterEach(() => {
    vi.restoreAllMocks();
    closeDb();
    tmp?.cleanup();
    tmp = undefined;
  });

  it("should find migrations regardless of the working directory", () => {
    tmp = createTempDir();
    vi.spyOn(process, "cwd").mockReturnValue(tmp.dir);
    const db = openDb(":memory:");

    expect(runMigrations(db)).toEqual(["0001_init.sql"]);

    const tables = db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name IN ('fetch_runs', 'vacancies') ORDER BY name")
      .all() as { name: string }[];
    expect(tables.map((t) => t.name)).toEqual(["fetch_runs", "vacancies"]);
  });

  it("should apply each migration only once", () => {
    const db = openDb(":memory:");

    expect(runMigrations(db)).toEqual(["0001_init.sql"]);
    expect(runMigrations(db)).toEqual([]);
  });
});
