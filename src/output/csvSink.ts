/**
 * CSV sink — streams rows to a UTF-8 CSV file with a header row
 *
 * Stream failures (open, write, flush) are recorded as soon as they happen
 * and surface from the next write() or from close().
 */

import { createWriteStream, type WriteStream } from "fs";
import { once } from "events";
import type { FlatRow, RowSink } from "@/types";
import { FLAT_ROW_COLUMNS } from "@/constants/fetch";
import { formatCsvLine } from "@/utils/csv/csvFormat";

export class CsvSink implements RowSink {
  private readonly stream: WriteStream;
  private failure: Error | undefined;
  private closed = false;

  constructor(readonly path: string) {
    this.stream = createWriteStream(path, { encoding: "utf-8" });
    this.stream.on("error", (error) => {
      if (!this.failure) {
        this.failure = error;
      }
    });
    this.stream.write(formatCsvLine(FLAT_ROW_COLUMNS));
  }

  private assertWritable(): void {
    if (this.failure) {
      throw this.failure;
    }
    if (this.stream.destroyed) {
      throw new Error(`CSV output stream is no longer writable: ${this.path}`);
    }
  }

  async write(row: FlatRow): Promise<void> {
    this.assertWritable();

    const line = formatCsvLine(FLAT_ROW_COLUMNS.map((column) => row[column]));
    if (!this.stream.write(line)) {
      // Rejects if the stream emits "error" before "drain"
      await once(this.stream, "drain");
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    if (this.failure) {
      throw this.failure;
    }

    await new Promise<void>((resolve, reject) => {
      this.stream.end((error?: Error | null) => {
        if (error) {
          if (!this.failure) {
            this.failure = error;
          }
          reject(error);
        } else {
          resolve();
        }
      });
    });

    if (this.failure) {
      throw this.failure;
    }
  }
}
