/**
 * Live Generation Feed Client
 *
 * GET genary.json → { aaData: string[][] }, one row per unit plus subtotal rows.
 *
 * Row layout consumed:
 *   [0]  HTML snippet with the fuel label in <b>…</b>
 *   [2]  unit name
 *   [4]  net power, MW, comma thousands ("1,234.5")
 *
 * Skipped: rows shorter than 5 cells, subtotal rows (小計), "Load" labels,
 * rows whose power is not a plain number (e.g. "N/A", "-").
 */

import { GENERATION_FEED_URL, withCacheBust } from "./pipeline_config";
import { fetchJson, isFeedError, type FeedError, type FeedJson } from "./http_json";
import { toFuelLabel } from "./fuel_types";
import type { GenerationRecord } from "./types";

export interface GenerationFeed {
  rows: unknown[];
  fetched_at_utc: string;
}

// ─── Parsing ─────────────────────────────────────────────────────────────────

export function parseGenerationFeed(payload: FeedJson): GenerationFeed | FeedError {
  const { json, fetched_at_utc } = payload;
  if (typeof json !== "object" || json === null || !("aaData" in json) || !Array.isArray(json.aaData)) {
    return { error_code: "BAD_SHAPE", error_text: "feed has no aaData array", fetched_at_utc };
  }
  return { rows: json.aaData, fetched_at_utc };
}

const FUEL_LABEL_RE = /<b>(.*?)<\/b>/;
const POWER_RE = /^-?\d+(\.\d+)?$/;

function cell(row: unknown[], i: number): string {
  const v = row[i];
  return v === null || v === undefined ? "" : String(v);
}

export function toGenerationRecords(rows: unknown[], timestamp: string): GenerationRecord[] {
  const records: GenerationRecord[] = [];

  for (const row of rows) {
    if (!Array.isArray(row) || row.length < 5) continue;
    if (cell(row, 2).includes("小計")) continue;

    const unitName = cell(row, 2).trim();
    const powerStr = cell(row, 4).replace(/,/g, "").trim();
    const label = cell(row, 0).match(FUEL_LABEL_RE)?.[1];
    if (label === undefined || !unitName || label.includes("Load")) continue;
    if (!POWER_RE.test(powerStr)) continue;

    records.push({
      timestamp,
      unit_name: unitName,
      fuel_type: toFuelLabel(label),
      net_power_mw: parseFloat(powerStr),
    });
  }

  return records;
}

/** Fetch + shape check. Fatal for the run when an error comes back. */
export async function fetchGenerationFeed(now: Date = new Date()): Promise<GenerationFeed | FeedError> {
  const res = await fetchJson(withCacheBust(GENERATION_FEED_URL, now));
  if (isFeedError(res)) return res;
  return parseGenerationFeed(res);
}
