import { logger } from "./utils/logger.ts";
import type { JobSearchApi } from "./client.ts";
import type { Governor } from "./utils/rate-limiter.ts";
import type { JobRecord, PaginationOutcome, SearchOptions } from "./utils/types.ts";

export function describeFailure(outcome: PaginationOutcome): string {
  const { failure } = outcome;
  if (!failure) return outcome.stopReason;
  switch (failure.kind) {
    case "api-status":
      return `API returned status ${failure.status}: ${failure.message}`;
    case "http-status":
      return `HTTP error ${failure.status}`;
    case "parse":
      return `Unparseable response: ${failure.message}`;
    case "transport":
      return `Request failed: ${failure.message}`;
  }
}

/**
 * Yields search-result entries page by page. Stops at the first empty page
 * or failed request; the generator's return value says why. Never throws
 * for API or network errors.
 */
export async function* paginateSearch(
  api: JobSearchApi,
  query: string,
  options: Omit<SearchOptions, "getJobDetails">,
  governor: Governor
): AsyncGenerator<JobRecord, PaginationOutcome, undefined> {
  const lastPage = options.startPage + options.numPages;
  let pagesFetched = 0;

  for (let page = options.startPage; page < lastPage; page++) {
    await governor.acquire();
    logger.info(`Scraping page ${page}...`);

    const result = await api.search({
      query,
      page,
      datePosted: options.datePosted,
      country: options.country,
      employmentTypes: options.employmentTypes,
      radius: options.radius,
      jobRequirements: options.jobRequirements,
    });

    if (!result.ok) {
      const outcome: PaginationOutcome = { pagesFetched, stopReason: "failure", failure: result.error };
      logger.error(`Error fetching page ${page}: ${describeFailure(outcome)}`);
      return outcome;
    }

    pagesFetched++;
    const entries = result.value;
    if (entries.length === 0) {
      logger.info(`No more jobs found on page ${page}. Stopping.`);
      return { pagesFetched, stopReason: "empty-page" };
    }

    logger.info(`Page ${page}: ${entries.length} jobs`);
    yield* entries;
  }

  return { pagesFetched, stopReason: "exhausted" };
}
