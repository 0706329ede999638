/**
 * Runtime configuration, read from environment variables (`.env` is loaded
 * by the entry point through dotenv).
 */
import { DEFAULT_HOST } from "./client.ts";

export interface ScraperConfig {
  apiKey: string;
  host: string;
  baseUrl: string;
  pageDelayMs: number;
  detailDelayMs: number;
  timeoutMs: number;
  outputDir: string;
}

type Env = Record<string, string | undefined>;

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < 0 ? defaultValue : parsed;
}

export function loadConfig(env: Env = process.env): ScraperConfig {
  const host = env.JSEARCH_HOST || DEFAULT_HOST;
  return {
    apiKey: env.JSEARCH_API_KEY?.trim() ?? "",
    host,
    baseUrl: env.JSEARCH_BASE_URL || `https://${host}`,
    pageDelayMs: parseNumber(env.JSEARCH_PAGE_DELAY_MS, 1000),
    detailDelayMs: parseNumber(env.JSEARCH_DETAIL_DELAY_MS, 500),
    timeoutMs: parseNumber(env.JSEARCH_TIMEOUT_MS, 30_000),
    outputDir: env.OUTPUT_DIR || "output",
  };
}
