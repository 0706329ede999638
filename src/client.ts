import { fetchJson } from "./utils/fetch-json.ts";
import type { FetchFn } from "./utils/fetch-json.ts";
import { isJobRecord } from "./utils/records.ts";
import { ok, err } from "./utils/result.ts";
import type { Result } from "./utils/result.ts";
import type { FetchFailure, JobRecord, SearchParams } from "./utils/types.ts";

export const DEFAULT_HOST = "jsearch.p.rapidapi.com";

export interface JSearchClientOptions {
  apiKey: string;
  host?: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: FetchFn;
}

/** The two calls the scraper makes; the paginator and enricher depend only on this. */
export interface JobSearchApi {
  search(params: SearchParams): Promise<Result<JobRecord[], FetchFailure>>;
  jobDetails(jobId: string): Promise<Result<JobRecord | null, FetchFailure>>;
}

interface Envelope {
  status: unknown;
  data: unknown;
  error: unknown;
}

function readEnvelope(body: unknown): Result<Envelope, FetchFailure> {
  if (!isJobRecord(body)) {
    return err({ kind: "parse", message: "Response body is not a JSON object" });
  }
  const envelope: Envelope = { status: body.status, data: body.data, error: body.error };
  if (envelope.status !== "OK") {
    return err({
      kind: "api-status",
      status: String(envelope.status ?? "missing"),
      message: describeApiError(envelope.error),
    });
  }
  return ok(envelope);
}

function describeApiError(error: unknown): string {
  if (typeof error === "string" && error) return error;
  if (isJobRecord(error) && typeof error.message === "string") return error.message;
  return "Unknown error";
}

/**
 * Detail payloads arrive as a record, a list of records, or nothing.
 * Collapse to at most one record.
 */
export function normalizeDetailPayload(data: unknown): JobRecord | null {
  if (Array.isArray(data)) {
    const first: unknown = data[0];
    return isJobRecord(first) ? first : null;
  }
  return isJobRecord(data) ? data : null;
}

export class JSearchClient implements JobSearchApi {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number | undefined;
  private readonly fetchImpl: FetchFn | undefined;

  constructor(options: JSearchClientOptions) {
    const host = options.host ?? DEFAULT_HOST;
    this.baseUrl = (options.baseUrl ?? `https://${host}`).replace(/\/+$/, "");
    this.headers = {
      "X-RapidAPI-Key": options.apiKey,
      "X-RapidAPI-Host": host,
      Accept: "application/json",
    };
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch;
  }

  async search(params: SearchParams): Promise<Result<JobRecord[], FetchFailure>> {
    const url = new URL(`${this.baseUrl}/search`);
    url.searchParams.set("query", params.query);
    url.searchParams.set("page", String(params.page));
    url.searchParams.set("num_pages", "1");
    url.searchParams.set("date_posted", params.datePosted);
    url.searchParams.set("country", params.country);
    url.searchParams.set("employment_types", params.employmentTypes);
    url.searchParams.set("radius", String(params.radius));
    if (params.jobRequirements) {
      url.searchParams.set("job_requirements", params.jobRequirements);
    }

    const envelope = await this.get(url);
    if (!envelope.ok) return envelope;

    const { data } = envelope.value;
    if (!Array.isArray(data)) return ok([]);
    return ok(data.filter(isJobRecord));
  }

  async jobDetails(jobId: string): Promise<Result<JobRecord | null, FetchFailure>> {
    const url = new URL(`${this.baseUrl}/job-details`);
    url.searchParams.set("job_id", jobId);

    const envelope = await this.get(url);
    if (!envelope.ok) return envelope;
    return ok(normalizeDetailPayload(envelope.value.data));
  }

  private async get(url: URL): Promise<Result<Envelope, FetchFailure>> {
    const body = await fetchJson(url, { headers: this.headers }, this.timeoutMs, this.fetchImpl);
    if (!body.ok) return body;
    return readEnvelope(body.value);
  }
}
