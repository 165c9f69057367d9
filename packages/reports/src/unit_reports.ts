/**
 * Unit Reports — from unit_details_log.csv
 *
 *   reports/latest_vs_all_units.csv   every unit ever seen, flagged when present
 *                                     in the latest run
 *   reports/{Region}_units.csv        units of the latest run, per region
 *
 * Usage:
 *   npx tsx packages/reports/src/unit_reports.ts [--data-dir ./data]
 */

import { join } from "path";
import { readCsvTable, writeCsvTable, type CsvRow } from "../../pipeline/src/csv_table";
import { parseTaipeiTimestamp } from "../../pipeline/src/effective_time";
import { pipelinePaths } from "../../pipeline/src/pipeline_config";

export interface UnitDetailsSnapshot {
  all: CsvRow[];
  latest: CsvRow[];
  latest_timestamp: string;
}

export function latestTimestamp(rows: CsvRow[]): string | null {
  let best: { ms: number; raw: string } | null = null;
  for (const row of rows) {
    const ms = parseTaipeiTimestamp(row.DATETIME ?? "");
    if (ms === null) continue;
    if (best === null || ms > best.ms) best = { ms, raw: row.DATETIME };
  }
  return best?.raw ?? null;
}

export function loadUnitDetails(logPath: string): UnitDetailsSnapshot {
  const table = readCsvTable(logPath);
  if (table === null) throw new Error(`unit details log not found at ${logPath}; run the live pipeline first`);
  if (table.rows.length === 0) throw new Error("unit details log is empty, nothing to report");

  const latest_timestamp = latestTimestamp(table.rows);
  if (latest_timestamp === null) throw new Error("unit details log has no parseable DATETIME");

  const key = parseTaipeiTimestamp(latest_timestamp);
  const latest = table.rows.filter(r => parseTaipeiTimestamp(r.DATETIME ?? "") === key);
  return { all: table.rows, latest, latest_timestamp };
}

const uniqueSorted = (values: string[]) => [...new Set(values)].sort();

export function latestVsAllUnits(snapshot: UnitDetailsSnapshot): CsvRow[] {
  const inLatest = new Set(snapshot.latest.map(r => r.UNIT_NAME));
  return uniqueSorted(snapshot.all.map(r => r.UNIT_NAME)).map(unit => ({
    UNIT_NAME: unit,
    InLatestEntry: String(inLatest.has(unit)),
  }));
}

export function unitsByRegion(latest: CsvRow[]): Map<string, string[]> {
  const grouped = new Map<string, string[]>();
  for (const row of latest) {
    const list = grouped.get(row.REGION) ?? [];
    list.push(row.UNIT_NAME);
    grouped.set(row.REGION, list);
  }
  const out = new Map<string, string[]>();
  for (const region of [...grouped.keys()].sort()) {
    out.set(region, uniqueSorted(grouped.get(region) ?? []));
  }
  return out;
}

export function regionReportName(region: string): string {
  return `${region.replace("(", "_").replace(")", "").replace(/ /g, "_")}_units.csv`;
}

export interface UnitReportResult {
  latest_timestamp: string;
  files: string[];
}

export function generateUnitReports(logPath: string, reportsDir: string): UnitReportResult {
  const snapshot = loadUnitDetails(logPath);
  const files: string[] = [];

  const overview = join(reportsDir, "latest_vs_all_units.csv");
  writeCsvTable(overview, ["UNIT_NAME", "InLatestEntry"], latestVsAllUnits(snapshot));
  files.push(overview);
  console.log(`[report] latest vs all units → ${overview}`);

  for (const [region, units] of unitsByRegion(snapshot.latest)) {
    const path = join(reportsDir, regionReportName(region));
    writeCsvTable(path, ["UNIT_NAME"], units.map(u => ({ UNIT_NAME: u })));
    files.push(path);
    console.log(`[report] ${region}: ${units.length} units → ${path}`);
  }

  return { latest_timestamp: snapshot.latest_timestamp, files };
}

// ─── CLI ─────────────────────────────────────────────────────────────────────

if (require.main === module) {
  const args = process.argv.slice(2);
  let dataDir: string | undefined;
  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--data-dir" && args[i + 1]) dataDir = args[++i];
  }

  const paths = pipelinePaths(dataDir);
  try {
    const result = generateUnitReports(paths.unitDetailsLog, join(paths.dataRoot, "reports"));
    console.log(`[report] ✅ ${result.files.length} reports for ${result.latest_timestamp}`);
  } catch (err: unknown) {
    console.error(`[report] ❌ ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}
