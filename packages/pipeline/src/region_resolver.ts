/**
 * Region Resolver
 *
 * unit name → region, three layers:
 *   1. static map (plant_to_region_map.csv), authoritative when present
 *   2. keyword table, first matching region in table order
 *   3. "Unknown"
 */

import { readCsvTable } from "./csv_table";
import { REGION_KEYWORDS, UNKNOWN_REGION, isRegion, type Region } from "./regions_config";

export type StaticRegionMap = ReadonlyMap<string, Region>;

export function inferRegionFromName(unitName: string): Region | null {
  for (const [region, keywords] of REGION_KEYWORDS) {
    if (keywords.some(kw => unitName.includes(kw))) return region;
  }
  return null;
}

export function resolveRegion(unitName: string, staticMap: StaticRegionMap): Region {
  return staticMap.get(unitName) ?? inferRegionFromName(unitName) ?? UNKNOWN_REGION;
}

/**
 * Load the static map from a `UNIT_NAME,REGION` CSV.
 * A missing file is an empty map. Rows naming a region outside the region
 * set are dropped with a warning.
 */
export function loadStaticRegionMap(csvPath: string): Map<string, Region> {
  const map = new Map<string, Region>();
  const table = readCsvTable(csvPath);
  if (!table) {
    console.log(`[regions] INFO: ${csvPath} not found, keyword inference only`);
    return map;
  }

  for (const row of table.rows) {
    const unit = (row.UNIT_NAME ?? "").trim();
    const region = (row.REGION ?? "").trim();
    if (!unit || !region) continue;
    if (!isRegion(region)) {
      console.warn(`[regions] ⚠️ ignoring ${unit}: unknown region "${region}"`);
      continue;
    }
    map.set(unit, region);
  }

  console.log(`[regions] static map: ${map.size} units`);
  return map;
}

/** Units that ended up in the Unknown bucket, sorted. */
export function unknownUnits(assignments: ReadonlyMap<string, Region>): string[] {
  return [...assignments].filter(([, r]) => r === UNKNOWN_REGION).map(([u]) => u).sort();
}
