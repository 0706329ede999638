import { paginateSearch } from "./paginate.ts";
import { enrichEntry } from "./enrich.ts";
import { stampRecord } from "./normalize.ts";
import { logger } from "./utils/logger.ts";
import type { JobSearchApi } from "./client.ts";
import type { Governor } from "./utils/rate-limiter.ts";
import type { JobRecord, PaginationOutcome, SearchOptions } from "./utils/types.ts";

export interface ScrapeGovernors {
  pages: Governor;
  details: Governor;
}

export interface ScrapeResult {
  jobs: JobRecord[];
  outcome: PaginationOutcome;
  enriched: number;
  detailFailures: number;
}

/**
 * Pulls search entries page by page, enriches each one in turn (when
 * `getJobDetails` is set) and stamps it. Always resolves with whatever was
 * collected, even when pagination stopped on an error.
 */
export async function scrapeJobs(
  api: JobSearchApi,
  query: string,
  options: SearchOptions,
  governors: ScrapeGovernors,
  clock: () => Date = () => new Date()
): Promise<ScrapeResult> {
  const jobs: JobRecord[] = [];
  let enriched = 0;
  let detailFailures = 0;

  const { getJobDetails, ...searchOptions } = options;
  const pages = paginateSearch(api, query, searchOptions, governors.pages);

  let next = await pages.next();
  while (!next.done) {
    const entry = next.value;

    if (getJobDetails) {
      const result = await enrichEntry(api, entry, governors.details);
      if (result.enriched) enriched++;
      if (result.failure) detailFailures++;
      jobs.push(stampRecord(result.record, clock()));
    } else {
      jobs.push(stampRecord(entry, clock()));
    }

    next = await pages.next();
  }

  const outcome = next.value;
  logger.info(
    `Scrape finished: ${jobs.length} jobs from ${outcome.pagesFetched} pages (${outcome.stopReason})`
  );
  if (getJobDetails) {
    logger.info(`Details merged for ${enriched} jobs, ${detailFailures} lookups failed`);
  }

  return { jobs, outcome, enriched, detailFailures };
}
