/**
 * CSV writer (RFC 4180 style). Fields containing a comma, quote or line
 * break are quoted, with embedded quotes doubled. Rows end in CRLF.
 */
import type { FlatValue } from "./types.ts";

const LINE_END = "\r\n";

export function escapeField(value: FlatValue | undefined): string {
  if (value === undefined || value === null) return "";
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function stringifyCSV(
  header: string[],
  rows: Array<Record<string, FlatValue>>
): string {
  const lines = [header.map(escapeField).join(",")];
  for (const row of rows) {
    lines.push(header.map((column) => escapeField(row[column])).join(","));
  }
  return lines.join(LINE_END) + LINE_END;
}
