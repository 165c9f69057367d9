/**
 * Per-run unit logs consumed by the reports package.
 *
 *   unit_details_log.csv   DATETIME,UNIT_NAME,REGION,FUEL_TYPE (append-only)
 *   unknown_plants_log.txt one block per run
 */

import { appendFileSync, mkdirSync } from "fs";
import { dirname } from "path";
import { appendCsvRows } from "./csv_table";
import type { Region } from "./regions_config";
import type { GenerationRecord } from "./types";

export const UNIT_DETAIL_COLUMNS = ["DATETIME", "UNIT_NAME", "REGION", "FUEL_TYPE"];

export function appendUnitDetails(
  logPath: string,
  records: GenerationRecord[],
  regions: ReadonlyMap<string, Region>,
): number {
  const rows = records.map(r => ({
    DATETIME: r.timestamp,
    UNIT_NAME: r.unit_name,
    REGION: regions.get(r.unit_name) ?? "Unknown",
    FUEL_TYPE: r.fuel_type,
  }));
  appendCsvRows(logPath, UNIT_DETAIL_COLUMNS, rows);
  return rows.length;
}

export function formatUnknownPlantsBlock(timestamp: string, unknown: string[]): string {
  if (unknown.length === 0) return `[${timestamp}] ✅ No Unknown Plants Detected.\n`;
  return `[${timestamp}] ❌ Unknown Plants Detected:\n  ${unknown.join(", ")}\n`;
}

export function appendUnknownPlantsLog(logPath: string, timestamp: string, unknown: string[]): void {
  mkdirSync(dirname(logPath), { recursive: true });
  appendFileSync(logPath, formatUnknownPlantsBlock(timestamp, unknown), "utf-8");
}
