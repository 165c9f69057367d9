/**
 * Aggregator — (timestamp, region, fuel_type) → one row.
 *
 * net power is summed. Weather columns are carried from the group; all rows
 * of a group share (timestamp, region) and therefore the same enrichment,
 * which is asserted rather than assumed.
 */

import { WEATHER_FEATURE_KEYS, type AggregatedRow, type EnrichedRecord, type WeatherFeatureSet } from "./types";

function sameFeatures(a: WeatherFeatureSet, b: WeatherFeatureSet): boolean {
  return WEATHER_FEATURE_KEYS.every(k => a[k] === b[k]);
}

function groupKey(r: EnrichedRecord): string {
  return JSON.stringify([r.timestamp, r.region, r.fuel_type]);
}

/** Groups come out in order of first appearance. */
export function aggregateRecords(records: EnrichedRecord[]): AggregatedRow[] {
  const groups = new Map<string, AggregatedRow>();

  for (const r of records) {
    const key = groupKey(r);
    const row = groups.get(key);
    if (!row) {
      groups.set(key, {
        timestamp: r.timestamp,
        region: r.region,
        fuel_type: r.fuel_type,
        net_power_sum: r.net_power_mw,
        weather: { ...r.weather },
      });
      continue;
    }
    if (!sameFeatures(row.weather, r.weather)) {
      throw new Error(
        `[aggregate] weather differs within group ${key} (unit ${r.unit_name}); ` +
        `grouping columns no longer determine enrichment`,
      );
    }
    row.net_power_sum += r.net_power_mw;
  }

  return [...groups.values()];
}
