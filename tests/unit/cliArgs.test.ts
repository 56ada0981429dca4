/**
 * Unit tests for CLI flag and environment parsing
 */

import { describe, it, expect } from "vitest";
import { parseCliArgs } from "@/cli/args";
import { ConfigurationError } from "@/config/configurationError";
import { HH_BASE_URL, HH_DEFAULT_USER_AGENT } from "@/constants/clients/hh";

describe("parseCliArgs", () => {
  it("should fall back to defaults with no flags", () => {
    const options = parseCliArgs([], {});

    expect(options.help).toBe(false);
    expect(options.userAgent).toBe(HH_DEFAULT_USER_AGENT);
    expect(options.baseUrl).toBe(HH_BASE_URL);
    expect(options.format).toBe("csv");
    expect(options.out).toBeUndefined();
    expect(options.timeoutMs).toBeUndefined();
    expect(options.fetch).toEqual({
      text: undefined,
      areas: "1",
      pageSize: undefined,
      maxPages: undefined,
      dateFrom: undefined,
      dateTo: undefined,
      lastDays: undefined,
      windowDays: undefined,
      employment: undefined,
      schedule: undefined,
      delayMs: undefined,
      details: false,
    });
  });

  it("should parse every fetch flag", () => {
    const options = parseCliArgs(
      [
        "--text", "data analyst",
        "--areas", "1,2",
        "--per-page", "50",
        "--max-pages", "3",
        "--date-from", "2025-09-01",
        "--date-to", "2025-09-07",
        "--window-days", "3",
        "--employment", "full",
        "--employment", "part",
        "--schedule", "remote",
        "--delay", "1.5",
        "--details",
        "--out", "out/vacancies.db",
        "--format", "sqlite",
      ],
      {},
    );

    expect(options.fetch).toEqual({
      text: "data analyst",
      areas: "1,2",
      pageSize: 50,
      maxPages: 3,
      dateFrom: "2025-09-01",
      dateTo: "2025-09-07",
      lastDays: undefined,
      windowDays: 3,
      employment: ["full", "part"],
      schedule: ["remote"],
      delayMs: 1500,
      details: true,
    });
    expect(options.out).toBe("out/vacancies.db");
    expect(options.format).toBe("sqlite");
  });

  it("should let flags override the environment", () => {
    const env = {
      HH_USER_AGENT: "env-agent/1.0",
      HH_API_BASE_URL: "https://api.test",
      HH_TIMEOUT_MS: "5000",
    };

    expect(parseCliArgs([], env).userAgent).toBe("env-agent/1.0");
    expect(parseCliArgs(["--user-agent", "flag-agent/2.0"], env).userAgent).toBe("flag-agent/2.0");
    expect(parseCliArgs([], env).baseUrl).toBe("https://api.test");
    expect(parseCliArgs([], env).timeoutMs).toBe(5000);
  });

  it("should recognize help", () => {
    expect(parseCliArgs(["-h"], {}).help).toBe(true);
    expect(parseCliArgs(["--help"], {}).help).toBe(true);
  });

  it("should reject malformed values as configuration errors", () => {
    expect(() => parseCliArgs(["--per-page", "ten"], {})).toThrow(ConfigurationError);
    expect(() => parseCliArgs(["--delay=-1"], {})).toThrow(ConfigurationError);
    expect(() => parseCliArgs(["--format", "parquet"], {})).toThrow(
      "--format must be csv or sqlite. Received: parquet",
    );
    expect(() => parseCliArgs([], { HH_TIMEOUT_MS: "0" })).toThrow(ConfigurationError);
  });

  it("should reject unknown flags and stray positionals", () => {
    expect(() => parseCliArgs(["--unknown"], {})).toThrow(ConfigurationError);
    expect(() => parseCliArgs(["extra"], {})).toThrow(ConfigurationError);
  });
});
