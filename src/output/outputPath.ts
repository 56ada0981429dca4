/**
 * Output path derivation
 */

import { mkdirSync } from "fs";
import { dirname, join } from "path";
import type { OutputFormat } from "@/types";
import {
  DEFAULT_OUTPUT_DIR,
  OUTPUT_EXTENSIONS,
  OUTPUT_FILE_PREFIX,
} from "@/constants/output";

const pad = (value: number): string => String(value).padStart(2, "0");

/**
 * Local-time timestamp as YYYYMMDD_HHMMSS
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Resolve the output file path and make sure its directory exists
 *
 * @param out - Explicit path; default is output/hh_vacancies_<timestamp>.<ext>
 */
export function resolveOutputPath(
  out: string | undefined,
  format: OutputFormat,
  now: Date = new Date(),
): string {
  const path =
    out && out.trim() !== ""
      ? out
      : join(
          DEFAULT_OUTPUT_DIR,
          `${OUTPUT_FILE_PREFIX}_${formatTimestamp(now)}.${OUTPUT_EXTENSIONS[format]}`,
        );

  mkdirSync(dirname(path) || ".", { recursive: true });
  return path;
}
