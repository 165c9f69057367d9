/**
 * Segmented Store — one CSV table per (region, fuel type).
 *
 * Layout: {finalDir}/{Region}/{Region}_{Fuel}.csv
 *
 * Upsert semantics: rows already persisted for an incoming timestamp are
 * dropped, the new row is appended, the table is rewritten. Re-running the
 * same effective timestamp therefore leaves exactly one row per timestamp.
 */

import { join } from "path";
import { readCsvTable, writeCsvTable, formatCell, type CsvRow } from "./csv_table";
import { parseTaipeiTimestamp } from "./effective_time";
import { WEATHER_FEATURE_KEYS, type AggregatedRow } from "./types";

export const TABLE_COLUMNS = [
  "DATETIME",
  "REGION",
  "FUEL_TYPE",
  "NET_P",
  ...WEATHER_FEATURE_KEYS,
];

/**
 * Path-safe name: parenthesized text removed, reserved characters replaced.
 * "燃煤(Coal)" → "燃煤"
 */
export function sanitizeName(name: string): string {
  return name.replace(/\(.*\)/g, "").replace(/[\\/*?:"<>|]/g, "_").trim();
}

export function tablePathFor(finalDir: string, region: string, fuelType: string): string {
  const regionSafe = sanitizeName(region);
  return join(finalDir, regionSafe, `${regionSafe}_${sanitizeName(fuelType)}.csv`);
}

export function toTableRow(row: AggregatedRow): CsvRow {
  const out: CsvRow = {
    DATETIME: row.timestamp,
    REGION: row.region,
    FUEL_TYPE: row.fuel_type,
    NET_P: formatCell(Math.round(row.net_power_sum * 1000) / 1000),
  };
  for (const k of WEATHER_FEATURE_KEYS) out[k] = formatCell(row.weather[k]);
  return out;
}

/** Timestamps compare as instants ("2025-06-01 08:00" equals "2025-06-01 08:00:00"). */
function timestampKey(value: string | undefined): string {
  const raw = value ?? "";
  const ms = parseTaipeiTimestamp(raw);
  return ms === null ? raw : String(ms);
}

/**
 * Replace-by-timestamp upsert on a single table. Existing rows whose key
 * column matches an incoming row are removed; incoming rows are appended in
 * order. Returns the number of replaced rows.
 */
export function upsertTable(path: string, columns: string[], keyColumn: string, incoming: CsvRow[]): number {
  const existing = readCsvTable(path)?.rows ?? [];
  const incomingKeys = new Set(incoming.map(r => timestampKey(r[keyColumn])));
  const kept = existing.filter(r => !incomingKeys.has(timestampKey(r[keyColumn])));
  writeCsvTable(path, columns, [...kept, ...incoming]);
  return existing.length - kept.length;
}

export interface UpsertSummary {
  tables: number;
  rows: number;
  replaced: number;
}

export function upsertRows(finalDir: string, rows: AggregatedRow[]): UpsertSummary {
  const byTable = new Map<string, CsvRow[]>();
  for (const row of rows) {
    const path = tablePathFor(finalDir, row.region, row.fuel_type);
    const list = byTable.get(path) ?? [];
    list.push(toTableRow(row));
    byTable.set(path, list);
  }

  let replaced = 0;
  for (const [path, tableRows] of byTable) {
    replaced += upsertTable(path, TABLE_COLUMNS, "DATETIME", tableRows);
  }

  return { tables: byTable.size, rows: rows.length, replaced };
}
