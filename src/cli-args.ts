import { logger } from "./utils/logger.ts";
import { DEFAULT_SEARCH_OPTIONS } from "./utils/types.ts";
import type { ExportFormat, SearchOptions } from "./utils/types.ts";

export interface CliArgs {
  query: string;
  options: SearchOptions;
  format: ExportFormat;
  basename: string;
}

/**
 * Parses `--name value` flags. A flag followed by another flag (or nothing)
 * has no value and falls back to its default.
 */
export function parseArgs(args: string[]): CliArgs {
  function flag(name: string): string | undefined {
    const idx = args.indexOf(`--${name}`);
    if (idx < 0) return undefined;
    const value = args[idx + 1];
    if (value === undefined || value.startsWith("--")) {
      logger.warn(`Missing value for --${name}, using default`);
      return undefined;
    }
    return value;
  }

  function positiveInt(name: string, fallback: number): number {
    const raw = flag(name);
    if (raw === undefined) return fallback;
    const parsed = parseInt(raw, 10);
    if (isNaN(parsed) || parsed < 1) {
      logger.warn(`Invalid --${name} value "${raw}", using ${fallback}`);
      return fallback;
    }
    return parsed;
  }

  function exportFormat(): ExportFormat {
    const raw = flag("format") ?? "both";
    if (raw === "json" || raw === "csv" || raw === "both") return raw;
    logger.warn(`Invalid --format value "${raw}", using both`);
    return "both";
  }

  return {
    query: flag("query") ?? "Software Engineer",
    options: {
      ...DEFAULT_SEARCH_OPTIONS,
      startPage: positiveInt("start-page", DEFAULT_SEARCH_OPTIONS.startPage),
      numPages: positiveInt("pages", 3),
      datePosted: flag("date-posted") ?? "week",
      country: flag("country") ?? DEFAULT_SEARCH_OPTIONS.country,
      employmentTypes: flag("employment-types") ?? DEFAULT_SEARCH_OPTIONS.employmentTypes,
      radius: positiveInt("radius", DEFAULT_SEARCH_OPTIONS.radius),
      jobRequirements: flag("requirements"),
      getJobDetails: !args.includes("--no-details"),
    },
    format: exportFormat(),
    basename: flag("output") ?? "maximum_job_data",
  };
}
