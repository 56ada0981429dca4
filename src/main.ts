/**
 * CLI entrypoint — fetch hh.ru vacancies and save them to disk
 *
 * Usage:
 *   npm run fetch -- --text "Product Manager" --areas 1,2 --delay 0.5
 *   npm run fetch -- --text "Data Scientist" --date-from 2025-09-01 --date-to 2025-09-24 --details
 *   npm run fetch -- --text "Analyst" --last-days 7 --format sqlite
 *
 * Environment variables (optional, also read from .env):
 *   - HH_API_BASE_URL: API base URL (defaults to https://api.hh.ru)
 *   - HH_USER_AGENT: User-Agent with a contact address
 *   - HH_TIMEOUT_MS: Per-attempt request timeout
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 */

import "dotenv/config";
import { executeCli } from "./cli/runCli";

executeCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  },
);
