import { logger } from "./utils/logger.ts";
import type { JobSearchApi } from "./client.ts";
import type { Governor } from "./utils/rate-limiter.ts";
import type { FetchFailure, JobRecord } from "./utils/types.ts";

export interface EnrichmentResult {
  record: JobRecord;
  enriched: boolean;
  failure?: FetchFailure;
}

/** Detail fields overwrite search-result fields of the same name. */
export function mergeDetail(entry: JobRecord, detail: JobRecord): JobRecord {
  return { ...entry, ...detail };
}

function jobIdOf(entry: JobRecord): string | null {
  const id = entry.job_id;
  if (typeof id === "string" && id.trim()) return id;
  if (typeof id === "number") return String(id);
  return null;
}

/**
 * Fetches the detail record for one search entry and merges it in.
 * Falls back to the entry as-is when it has no id, the lookup fails, or
 * the API has no detail for it.
 */
export async function enrichEntry(
  api: JobSearchApi,
  entry: JobRecord,
  governor: Governor
): Promise<EnrichmentResult> {
  const jobId = jobIdOf(entry);
  if (!jobId) {
    logger.debug("Entry has no job_id, skipping detail lookup");
    return { record: entry, enriched: false };
  }

  await governor.acquire();
  const title = typeof entry.job_title === "string" ? entry.job_title : "Unknown";
  logger.info(`  Getting details for ${jobId}: ${title}`);

  const result = await api.jobDetails(jobId);
  if (!result.ok) {
    logger.warn(`  Detail lookup failed for ${jobId}: ${result.error.message}`);
    return { record: entry, enriched: false, failure: result.error };
  }

  const detail = result.value;
  if (!detail || Object.keys(detail).length === 0) {
    logger.debug(`  No detail record for ${jobId}`);
    return { record: entry, enriched: false };
  }

  return { record: mergeDetail(entry, detail), enriched: true };
}
