/**
 * CSV field formatting (RFC 4180)
 *
 * Fields containing a comma, quote, CR or LF are wrapped in quotes with
 * embedded quotes doubled. Null and undefined become empty fields; booleans
 * are written as True/False.
 */

export type CsvValue = string | number | boolean | null | undefined;

const NEEDS_QUOTING = /[",\r\n]/;

export function formatCsvValue(value: CsvValue): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "boolean") {
    return value ? "True" : "False";
  }

  const text = String(value);
  if (!NEEDS_QUOTING.test(text)) {
    return text;
  }
  return `"${text.replace(/"/g, '""')}"`;
}

/**
 * Format one record as a CSV line terminated by CRLF
 */
export function formatCsvLine(values: readonly CsvValue[]): string {
  return values.map(formatCsvValue).join(",") + "\r\n";
}
