import { readFileSync, writeFileSync, existsSync, mkdirSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { logger } from "./logger.ts";
import type { StatsSummary, StopReason } from "./types.ts";

const __dirname = dirname(fileURLToPath(import.meta.url));
export const HISTORY_PATH = join(__dirname, "../../data/run-history.json");
const MAX_AGE_MONTHS = 18;

// ── Run record schema ────────────────────────────────────────────────

export interface RunRecord {
  timestamp: string;
  durationMs: number;
  query: string;
  pagesFetched: number;
  stopReason: StopReason;
  totalJobs: number;
  enriched: number;
  detailFailures: number;
  stats: StatsSummary;
}

// ── Core operations ──────────────────────────────────────────────────

export function getRunHistory(path: string = HISTORY_PATH): RunRecord[] {
  if (!existsSync(path)) return [];
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
    return Array.isArray(parsed) ? parsed : [];
  } catch (err) {
    logger.warn(`Ignoring unreadable run history at ${path}`, err);
    return [];
  }
}

export function appendRunHistory(record: RunRecord, path: string = HISTORY_PATH): void {
  const history = getRunHistory(path);
  history.push(record);

  // Prune records older than 18 months
  const cutoff = new Date();
  cutoff.setMonth(cutoff.getMonth() - MAX_AGE_MONTHS);
  const pruned = history.filter((r) => new Date(r.timestamp) >= cutoff);

  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  writeFileSync(path, JSON.stringify(pruned, null, 2) + "\n");
}
