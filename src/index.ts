import "dotenv/config";
import { parseArgs } from "./cli-args.ts";
import { JSearchClient } from "./client.ts";
import { loadConfig } from "./config.ts";
import { saveJobs } from "./export.ts";
import { describeFailure } from "./paginate.ts";
import { describeFields, getJobStatistics } from "./report.ts";
import { scrapeJobs } from "./scrape.ts";
import { logger } from "./utils/logger.ts";
import { RateLimiter } from "./utils/rate-limiter.ts";
import { appendRunHistory } from "./utils/run-history.ts";
import { JSEARCH_FIELDS } from "./utils/types.ts";

const SAMPLE_FIELD_COUNT = 20;

// ── CLI args ─────────────────────────────────────────────────────────

const { query, options, format, basename } = parseArgs(process.argv.slice(2));

// ── Main ─────────────────────────────────────────────────────────────

async function run(): Promise<void> {
  const startTime = Date.now();
  const config = loadConfig();

  if (!config.apiKey) {
    logger.error("JSEARCH_API_KEY is not set. Add your RapidAPI key to .env");
    process.exitCode = 1;
    return;
  }

  const client = new JSearchClient({
    apiKey: config.apiKey,
    host: config.host,
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
  });

  logger.info(`Searching for "${query}" (${options.numPages} pages, details ${options.getJobDetails ? "on" : "off"})`);
  const { jobs, outcome, enriched, detailFailures } = await scrapeJobs(client, query, options, {
    pages: new RateLimiter(config.pageDelayMs, "JSearch pages"),
    details: new RateLimiter(config.detailDelayMs, "JSearch details"),
  });

  if (outcome.failure) {
    logger.warn(`Run stopped early: ${describeFailure(outcome)}`);
  }
  logger.info(`Extracted ${jobs.length} jobs with full raw data`);

  const fields = describeFields(jobs);
  if (fields.length > 0) {
    logger.info("Sample of available fields:");
    for (const field of fields.slice(0, SAMPLE_FIELD_COUNT)) {
      logger.info(`  - ${field.name}: ${field.type}`);
    }
    if (fields.length > SAMPLE_FIELD_COUNT) {
      logger.info(`  ... and ${fields.length - SAMPLE_FIELD_COUNT} more fields`);
    }
  }

  saveJobs(jobs, { format, outputDir: config.outputDir, basename });

  const stats = getJobStatistics(jobs, JSEARCH_FIELDS);
  logger.info("Statistics", stats);

  appendRunHistory({
    timestamp: new Date().toISOString(),
    durationMs: Date.now() - startTime,
    query,
    pagesFetched: outcome.pagesFetched,
    stopReason: outcome.stopReason,
    totalJobs: jobs.length,
    enriched,
    detailFailures,
    stats,
  });
}

run().catch((err) => {
  logger.error("Scraper failed", err);
  process.exitCode = 1;
});
