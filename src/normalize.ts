import { isJobRecord } from "./utils/records.ts";
import type { FlatRecord, FlatValue, JobRecord } from "./utils/types.ts";

export const SCRAPED_AT = "scraped_at";

/** Shallow copy of `record` with `scraped_at` set to `now`. */
export function stampRecord(record: JobRecord, now: Date = new Date()): JobRecord {
  return { ...record, [SCRAPED_AT]: now.toISOString() };
}

/**
 * Flattens nested objects into `parent<sep>child` keys and renders arrays
 * as JSON text, so every value fits in one CSV cell.
 */
export function flattenRecord(
  record: JobRecord,
  separator: string = "_"
): FlatRecord {
  return Object.fromEntries(flattenEntries(record, separator, ""));
}

// Built from entries so "__proto__" keys stay own fields
function flattenEntries(
  record: JobRecord,
  separator: string,
  parentKey: string
): Array<[string, FlatValue]> {
  const entries: Array<[string, FlatValue]> = [];

  for (const [key, value] of Object.entries(record)) {
    const newKey = parentKey ? `${parentKey}${separator}${key}` : key;

    if (Array.isArray(value)) {
      entries.push([newKey, JSON.stringify(value)]);
    } else if (isJobRecord(value)) {
      entries.push(...flattenEntries(value, separator, newKey));
    } else {
      entries.push([newKey, value]);
    }
  }

  return entries;
}
