import type { JobRecord, JobValue } from "./types.ts";

/** JSON objects parsed from an API body; arrays and null excluded. */
export function isJobRecord(value: unknown): value is JobRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Loose truthiness for JSON values: null, false, 0, "", [] and {} count as
 * absent.
 */
export function isPresent(value: JobValue | undefined): boolean {
  if (value === undefined || value === null) return false;
  if (Array.isArray(value)) return value.length > 0;
  if (isJobRecord(value)) return Object.keys(value).length > 0;
  return Boolean(value);
}

/** Numeric value of a field, or null when it can't be read as a number. */
export function toNumber(value: JobValue | undefined): number | null {
  if (typeof value === "number") return Number.isNaN(value) ? null : value;
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  if (!trimmed) return null;
  const parsed = Number(trimmed);
  return Number.isNaN(parsed) ? null : parsed;
}
