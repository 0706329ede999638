/**
 * Single-attempt JSON fetch. Every failure mode comes back as a value:
 * network errors and timeouts as `transport`, non-2xx responses as
 * `http-status`, malformed bodies as `parse`.
 */
import { logger } from "./logger.ts";
import { ok, err } from "./result.ts";
import type { Result } from "./result.ts";
import type { FetchFailure } from "./types.ts";

export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>;

const DEFAULT_TIMEOUT_MS = 30_000;

function describe(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export async function fetchJson(
  url: string | URL,
  options: RequestInit = {},
  timeoutMs: number = DEFAULT_TIMEOUT_MS,
  fetchImpl: FetchFn = fetch
): Promise<Result<unknown, FetchFailure>> {
  let response: Response;
  try {
    response = await fetchImpl(url, {
      ...options,
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (e) {
    return err({ kind: "transport", message: describe(e) });
  }

  if (!response.ok) {
    try {
      await response.body?.cancel();
    } catch (e) {
      logger.debug(`Could not discard error body from ${String(url)}: ${describe(e)}`);
    }
    return err({
      kind: "http-status",
      status: response.status,
      message: `HTTP ${response.status} ${response.statusText}`.trim(),
    });
  }

  let text: string;
  try {
    text = await response.text();
  } catch (e) {
    return err({ kind: "transport", message: describe(e) });
  }

  try {
    const body: unknown = JSON.parse(text);
    return ok(body);
  } catch (e) {
    return err({ kind: "parse", message: describe(e) });
  }
}
