/**
 * E2E (offline): CLI entry point with mocked HTTP writing real output files
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { existsSync, readFileSync } from "fs";
import { executeCli, runCli } from "@/cli/runCli";
import { countVacanciesByRun, getFetchRunById, openDb } from "@/db";
import { EXIT_CONFIG_ERROR, EXIT_FAILURE, EXIT_OK } from "@/constants/cli";
import { createMockHttp, type MockHttp } from "../helpers/mockHttp";
import { createTempDir, type TempDir } from "../helpers/testDb";
import { makeDetail, makePage } from "../helpers/vacancyFixtures";

const BASE_URL = "https://api.test";
const ENV = { HH_API_BASE_URL: BASE_URL, HH_USER_AGENT: "test-agent/1.0" };

describe("runCli (offline)", () => {
  let tmp: TempDir;
  let mock: MockHttp;
  let sleeps: number[];
  let logSpy: MockInstance<typeof console.log>;

  const deps = () => ({
    httpRequest: mock.request,
    sleep: async (ms: number) => {
      sleeps.push(ms);
    },
  });

  beforeEach(() => {
    tmp = createTempDir();
    mock = createMockHttp();
    sleeps = [];
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    tmp.cleanup();
  });

  it("should write CSV and report the saved row count", async () => {
    mock.on("GET", `${BASE_URL}/vacancies`, makePage(["201", "202"], 1));
    const out = tmp.file("vacancies.csv");

    const result = await runCli(["--areas", "1", "--delay", "0", "--out", out], ENV, deps());

    expect(result).toEqual({
      path: out,
      rows: 2,
      counters: {
        windows_planned: 1,
        searches_completed: 1,
        pages_fetched: 1,
        rows_emitted: 2,
        details_fetched: 0,
        details_failed: 0,
      },
    });
    expect(logSpy).toHaveBeenCalledWith(`Saved 2 rows to ${out}`);

    const lines = readFileSync(out, "utf-8").split("\r\n");
    expect(lines).toHaveLength(4);
    expect(lines[0].startsWith("id,name,alternate_url,")).toBe(true);
    expect(lines[1].startsWith("201,Vacancy 201,")).toBe(true);
    expect(lines[2].startsWith("202,Vacancy 202,")).toBe(true);
    expect(lines[3]).toBe("");

    const [request] = mock.getRecordedRequests();
    expect(request.headers).toEqual({ "User-Agent": "test-agent/1.0" });
    expect(request.query).toEqual({ area: "1", per_page: 100, page: 0 });
  });

  it("should write SQLite output with detail fields", async () => {
    mock.on("GET", `${BASE_URL}/vacancies`, makePage(["301"], 1));
    mock.on("GET", `${BASE_URL}/vacancies/301`, makeDetail("301"));
    const out = tmp.file("vacancies.db");

    const result = await runCli(
      ["--text", "analyst", "--details", "--delay", "0", "--format", "sqlite", "--out", out],
      ENV,
      deps(),
    );

    expect(result?.rows).toBe(1);
    // Nothing is requested after the only detail, so no pause is taken
    expect(sleeps).toEqual([]);

    openDb(out);
    expect(countVacanciesByRun(1)).toBe(1);
    expect(getFetchRunById(1)).toMatchObject({
      status: "success",
      query_text: "analyst",
      areas: "1",
      rows_emitted: 1,
      details_fetched: 1,
    });
  });

  it("should print usage for --help without making requests", async () => {
    const result = await runCli(["--help"], ENV, deps());

    expect(result).toBeUndefined();
    expect(mock.getRecordedRequests()).toEqual([]);
    expect(String(logSpy.mock.calls[0][0])).toContain("Usage: hh-fetch [options]");
  });
});

describe("executeCli exit codes", () => {
  let tmp: TempDir;

  beforeEach(() => {
    tmp = createTempDir();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    tmp.cleanup();
  });

  it("should return 0 on success", async () => {
    const mock = createMockHttp();
    mock.on("GET", `${BASE_URL}/vacancies`, makePage([], 0));

    const code = await executeCli(["--out", tmp.file("ok.csv")], ENV, { httpRequest: mock.request });

    expect(code).toBe(EXIT_OK);
  });

  it("should return 2 on invalid configuration before any request or file", async () => {
    const mock = createMockHttp();
    const out = tmp.file("never.csv");

    const code = await executeCli(
      ["--last-days", "3", "--date-from", "2025-09-01", "--out", out],
      ENV,
      { httpRequest: mock.request },
    );

    expect(code).toBe(EXIT_CONFIG_ERROR);
    expect(mock.getRecordedRequests()).toEqual([]);
    expect(existsSync(out)).toBe(false);
  });

  it("should return 1 when the API refuses the request", async () => {
    const mock = createMockHttp();
    mock.onStatus("GET", `${BASE_URL}/vacancies`, 403, "forbidden");

    const code = await executeCli(["--out", tmp.file("failed.csv")], ENV, {
      httpRequest: mock.request,
    });

    expect(code).toBe(EXIT_FAILURE);
  });
});
