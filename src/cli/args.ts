/**
 * Command-line and environment parsing
 *
 * Flags override environment variables; environment variables override
 * built-in defaults.
 */

import { parseArgs } from "util";
import type { FetchConfigInput, OutputFormat } from "@/types";
import { ConfigurationError } from "@/config/configurationError";
import { HH_BASE_URL, HH_DEFAULT_USER_AGENT } from "@/constants/clients/hh";
import { DEFAULT_AREAS } from "@/constants/fetch";

export type CliOptions = {
  help: boolean;
  fetch: FetchConfigInput;
  userAgent: string;
  baseUrl: string;
  timeoutMs?: number;
  out?: string;
  format: OutputFormat;
};

export const USAGE = `Usage: hh-fetch [options]

Fetch vacancies from the hh.ru API and save them as CSV or SQLite.

Options:
  --text <query>          Search text
  --areas <ids>           Comma-separated area ids (default: ${DEFAULT_AREAS})
  --per-page <n>          Items per page, 1..100 (default: 100)
  --max-pages <n>         Highest 0-based page to fetch per area and window
  --date-from <date>      YYYY-MM-DD lower bound
  --date-to <date>        YYYY-MM-DD upper bound
  --last-days <n>         Last N days including today (excludes --date-from/--date-to)
  --window-days <n>       Split the date range into windows of N days (default: 1)
  --employment <tag>      Employment filter, repeatable or comma-separated
  --schedule <tag>        Schedule filter, repeatable or comma-separated
  --delay <seconds>       Delay between requests (default: 0.5)
  --details               Fetch /vacancies/{id} for each record
  --user-agent <ua>       User-Agent header (env HH_USER_AGENT)
  --out <path>            Output file (default: output/hh_vacancies_<timestamp>.<ext>)
  --format <csv|sqlite>   Output format (default: csv)
  -h, --help              Show this help

Environment:
  HH_API_BASE_URL, HH_USER_AGENT, HH_TIMEOUT_MS, LOG_LEVEL
`;

function parseInteger(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const normalized = raw.trim();
  if (!/^-?\d+$/.test(normalized)) {
    throw new ConfigurationError(`${name} must be an integer. Received: ${raw}`);
  }
  return Number.parseInt(normalized, 10);
}

function parseSeconds(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new ConfigurationError(`${name} must be a non-negative number of seconds. Received: ${raw}`);
  }
  return Math.round(seconds * 1000);
}

function parseFormat(raw: string | undefined): OutputFormat {
  if (raw === undefined || raw === "csv") return "csv";
  if (raw === "sqlite") return "sqlite";
  throw new ConfigurationError(`--format must be csv or sqlite. Received: ${raw}`);
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: false,
      options: {
        text: { type: "string" },
        areas: { type: "string" },
        "per-page": { type: "string" },
        "max-pages": { type: "string" },
        "date-from": { type: "string" },
        "date-to": { type: "string" },
        "last-days": { type: "string" },
        "window-days": { type: "string" },
        employment: { type: "string", multiple: true },
        schedule: { type: "string", multiple: true },
        delay: { type: "string" },
        details: { type: "boolean" },
        "user-agent": { type: "string" },
        out: { type: "string" },
        format: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (error) {
    throw new ConfigurationError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Parse CLI flags and environment into fetch, client and output options
 *
 * @throws {ConfigurationError} On unknown flags or malformed values
 */
export function parseCliArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliOptions {
  const { values } = readArgs(argv);

  const timeoutMs = parseInteger("HH_TIMEOUT_MS", env.HH_TIMEOUT_MS);
  if (timeoutMs !== undefined && timeoutMs < 1) {
    throw new ConfigurationError(`HH_TIMEOUT_MS must be >= 1. Received: ${timeoutMs}`);
  }

  return {
    help: values.help ?? false,
    fetch: {
      text: values.text,
      areas: values.areas ?? DEFAULT_AREAS,
      pageSize: parseInteger("--per-page", values["per-page"]),
      maxPages: parseInteger("--max-pages", values["max-pages"]),
      dateFrom: values["date-from"],
      dateTo: values["date-to"],
      lastDays: parseInteger("--last-days", values["last-days"]),
      windowDays: parseInteger("--window-days", values["window-days"]),
      employment: values.employment,
      schedule: values.schedule,
      delayMs: parseSeconds("--delay", values.delay),
      details: values.details ?? false,
    },
    userAgent: values["user-agent"] ?? env.HH_USER_AGENT ?? HH_DEFAULT_USER_AGENT,
    baseUrl: env.HH_API_BASE_URL?.trim() || HH_BASE_URL,
    timeoutMs,
    out: values.out,
    format: parseFormat(values.format),
  };
}
