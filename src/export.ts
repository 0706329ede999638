import { writeFileSync, mkdirSync, existsSync } from "fs";
import { join } from "path";
import { flattenRecord } from "./normalize.ts";
import { stringifyCSV } from "./utils/csv.ts";
import { logger } from "./utils/logger.ts";
import type { ExportFormat, JobRecord } from "./utils/types.ts";

export interface SaveOptions {
  format: ExportFormat;
  outputDir: string;
  basename?: string;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `raw_jobs_YYYYMMDD_HHMMSS` in local time. */
export function defaultBasename(now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `raw_jobs_${date}_${time}`;
}

export function toJSON(jobs: JobRecord[]): string {
  return JSON.stringify(jobs, null, 2) + "\n";
}

/** One row per job; columns are the sorted union of every flattened key. */
export function toCSV(jobs: JobRecord[]): string {
  const flattened = jobs.map((job) => flattenRecord(job));
  const columns = new Set<string>();
  for (const job of flattened) {
    for (const key of Object.keys(job)) columns.add(key);
  }
  return stringifyCSV([...columns].sort(), flattened);
}

/** Writes the requested export files and returns their paths. */
export function saveJobs(jobs: JobRecord[], options: SaveOptions): string[] {
  if (jobs.length === 0) {
    logger.warn("No jobs to save.");
    return [];
  }

  if (!existsSync(options.outputDir)) {
    mkdirSync(options.outputDir, { recursive: true });
  }

  const base = join(options.outputDir, options.basename ?? defaultBasename());
  const written: string[] = [];

  if (options.format === "json" || options.format === "both") {
    const path = `${base}.json`;
    writeFileSync(path, toJSON(jobs), "utf-8");
    logger.info(`Saved ${jobs.length} raw jobs to ${path}`);
    written.push(path);
  }

  if (options.format === "csv" || options.format === "both") {
    const path = `${base}.csv`;
    writeFileSync(path, toCSV(jobs), "utf-8");
    logger.info(`Saved ${jobs.length} raw jobs to ${path}`);
    written.push(path);
  }

  return written;
}
