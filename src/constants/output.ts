/**
 * Output constants — default locations and batching
 */

import type { OutputFormat } from "@/types";

export const DEFAULT_OUTPUT_DIR = "output";

export const OUTPUT_FILE_PREFIX = "hh_vacancies";

export const OUTPUT_EXTENSIONS: Record<OutputFormat, string> = {
  csv: "csv",
  sqlite: "db",
};

/**
 * Rows buffered per SQLite transaction
 */
export const SQLITE_INSERT_BATCH_SIZE = 200;
