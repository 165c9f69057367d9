/**
 * JSON over HTTP with a fixed timeout.
 *
 * Clients never throw on transport problems; they return a FeedError and
 * the caller decides whether it is fatal.
 */

import { FEED_TIMEOUT_MS } from "./pipeline_config";

export interface FeedError {
  error_code: "FETCH_ERROR" | "HTTP_ERROR" | "BAD_SHAPE";
  error_text: string;
  fetched_at_utc: string;
}

export interface FeedJson {
  json: unknown;
  fetched_at_utc: string;
}

/** Type guard: is this an error? */
export function isFeedError<T extends object>(r: T | FeedError): r is FeedError {
  return "error_code" in r;
}

export async function fetchJson(url: string, timeoutMs: number = FEED_TIMEOUT_MS): Promise<FeedJson | FeedError> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, { signal: controller.signal });
    if (!response.ok) {
      const body = await response.text();
      return {
        error_code: "HTTP_ERROR",
        error_text: `HTTP ${response.status}: ${body.slice(0, 200)}`,
        fetched_at_utc: new Date().toISOString(),
      };
    }
    const json: unknown = await response.json();
    return { json, fetched_at_utc: new Date().toISOString() };
  } catch (err: unknown) {
    return {
      error_code: "FETCH_ERROR",
      error_text: err instanceof Error ? err.message : String(err),
      fetched_at_utc: new Date().toISOString(),
    };
  } finally {
    clearTimeout(timer);
  }
}
