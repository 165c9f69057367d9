/**
 * System Demand Snapshot
 *
 * GET loadpara.json → { records: [{ curr_load: "32,145.6", ... }] }
 * Persisted to electricity_demand.csv, one row per effective timestamp.
 *
 * Failures here are warnings only; they never abort the generation run.
 */

import { DEMAND_FEED_URL, withCacheBust } from "./pipeline_config";
import { fetchJson, isFeedError } from "./http_json";
import { upsertTable } from "./segmented_store";

export const DEMAND_COLUMNS = ["DATETIME", "DEMAND_MW"];

/** Current load in MW, or a reason string when the payload is unusable. */
export function parseDemandPayload(json: unknown): { demand_mw: number } | { reason: string } {
  if (typeof json !== "object" || json === null || !("records" in json)) {
    return { reason: "'records' array not found" };
  }
  const records = json.records;
  if (!Array.isArray(records) || records.length === 0) {
    return { reason: "'records' array not found or empty" };
  }
  const first: unknown = records[0];
  if (typeof first !== "object" || first === null || !("curr_load" in first)) {
    return { reason: "'curr_load' not found in records" };
  }
  const raw = first.curr_load;
  const demand = typeof raw === "number" ? raw : parseFloat(String(raw).replace(/,/g, ""));
  if (!Number.isFinite(demand)) return { reason: `unparseable curr_load: ${String(raw)}` };
  return { demand_mw: demand };
}

export function saveDemand(tablePath: string, timestamp: string, demandMw: number): void {
  upsertTable(tablePath, DEMAND_COLUMNS, "DATETIME", [{ DATETIME: timestamp, DEMAND_MW: String(demandMw) }]);
}

export type DemandFetcher = () => Promise<unknown>;

/** Default fetcher: returns parsed JSON or throws. */
export const fetchDemandJson: DemandFetcher = async () => {
  const res = await fetchJson(withCacheBust(DEMAND_FEED_URL));
  if (isFeedError(res)) throw new Error(`${res.error_code}: ${res.error_text}`);
  return res.json;
};

/** Fetch and persist; returns the saved value or null. Never throws. */
export async function recordDemand(
  fetcher: DemandFetcher,
  tablePath: string,
  timestamp: string,
): Promise<number | null> {
  console.log("[demand] fetching current electricity demand...");
  let json: unknown;
  try {
    json = await fetcher();
  } catch (err: unknown) {
    console.warn(`[demand] ⚠️ fetch failed: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }

  const parsed = parseDemandPayload(json);
  if ("reason" in parsed) {
    console.warn(`[demand] ⚠️ ${parsed.reason}, skipping`);
    return null;
  }

  saveDemand(tablePath, timestamp, parsed.demand_mw);
  console.log(`[demand] saved ${parsed.demand_mw} MW @ ${timestamp}`);
  return parsed.demand_mw;
}
