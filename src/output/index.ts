/**
 * Output sinks public API
 */

import type { FetchConfig, OutputFormat, RowSink } from "@/types";
import { CsvSink } from "./csvSink";
import { SqliteSink } from "./sqliteSink";

export { CsvSink } from "./csvSink";
export { SqliteSink } from "./sqliteSink";
export { resolveOutputPath, formatTimestamp } from "./outputPath";

export function createRowSink(
  format: OutputFormat,
  path: string,
  config: FetchConfig,
): RowSink {
  return format === "sqlite" ? new SqliteSink(path, config) : new CsvSink(path);
}
