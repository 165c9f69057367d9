/**
 * Generation Mix Verification
 *
 * Reads every segmented table under final_data/, keeps the rows of the
 * latest timestamp, and prints the per-fuel totals and shares in the order
 * the grid operator publishes them. Ends with the latest fluctuation block.
 *
 * Usage:
 *   npx tsx packages/reports/src/verify_output.ts [--data-dir ./data] [--pdf mix.pdf]
 */

import { existsSync, readdirSync, readFileSync } from "fs";
import { join, resolve } from "path";
import { readCsvTable, type CsvRow } from "../../pipeline/src/csv_table";
import { formatTaipei, parseTaipeiTimestamp } from "../../pipeline/src/effective_time";
import { FUEL_DISPLAY_ORDER } from "../../pipeline/src/fuel_types";
import { pipelinePaths } from "../../pipeline/src/pipeline_config";
import { fmtMw, generateMixPdf } from "./generate_mix_pdf";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface FuelShare {
  fuel_type: string;
  mw: number;
  /** 0–100 */
  percentage: number;
}

export interface MixSummary {
  latest_timestamp: string;
  total_mw: number;
  fuels: FuelShare[];
  tables: number;
}

// ─── Loading ─────────────────────────────────────────────────────────────────

function listCsvFiles(dir: string): string[] {
  const out: string[] = [];
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) out.push(...listCsvFiles(path));
    else if (entry.isFile() && entry.name.endsWith(".csv")) out.push(path);
  }
  return out.sort();
}

/** Rows of every generation table; tables without FUEL_TYPE/NET_P (the demand table) are skipped. */
export function loadGenerationRows(finalDir: string): { rows: CsvRow[]; tables: number } {
  if (!existsSync(finalDir)) throw new Error(`final data directory not found at ${finalDir}`);

  const rows: CsvRow[] = [];
  let tables = 0;
  for (const file of listCsvFiles(finalDir)) {
    const table = readCsvTable(file);
    if (!table || !table.header.includes("FUEL_TYPE") || !table.header.includes("NET_P")) continue;
    tables++;
    rows.push(...table.rows);
  }
  if (tables === 0) throw new Error(`no generation tables found in ${finalDir}`);
  return { rows, tables };
}

// ─── Mix ─────────────────────────────────────────────────────────────────────

export function fuelOrderIndex(fuel: string): number {
  const i = FUEL_DISPLAY_ORDER.indexOf(fuel);
  return i === -1 ? FUEL_DISPLAY_ORDER.length : i;
}

export function computeMix(rows: CsvRow[], tables: number): MixSummary {
  let latestMs: number | null = null;
  for (const row of rows) {
    const ms = parseTaipeiTimestamp(row.DATETIME ?? "");
    if (ms !== null && (latestMs === null || ms > latestMs)) latestMs = ms;
  }
  if (latestMs === null) throw new Error("no rows with a parseable DATETIME");

  const sums = new Map<string, number>();
  for (const row of rows) {
    if (parseTaipeiTimestamp(row.DATETIME ?? "") !== latestMs) continue;
    const mw = parseFloat(row.NET_P);
    if (!Number.isFinite(mw)) continue;
    sums.set(row.FUEL_TYPE, (sums.get(row.FUEL_TYPE) ?? 0) + mw);
  }

  const total = [...sums.values()].reduce((a, b) => a + b, 0);
  const fuels = [...sums.entries()]
    .sort(([a], [b]) => fuelOrderIndex(a) - fuelOrderIndex(b))
    .map(([fuel_type, mw]) => ({
      fuel_type,
      mw,
      percentage: total > 0 ? (mw / total) * 100 : 0,
    }));

  return { latest_timestamp: formatTaipei(new Date(latestMs)), total_mw: total, fuels, tables };
}

// ─── Formatting ──────────────────────────────────────────────────────────────

const RULE = "=".repeat(50);

export function formatMixReport(mix: MixSummary): string {
  const lines = [
    RULE,
    "台電系統各機組發電量（單位 MW）",
    `更新時間 - ${mix.latest_timestamp.slice(0, 16)}`,
    "",
    "各能源別即時發電量小計(每10分鐘更新)：",
    `總計： ${fmtMw(mix.total_mw)} MW`,
    "",
  ];
  for (const f of mix.fuels) {
    lines.push(f.fuel_type, fmtMw(f.mw), `${f.percentage.toFixed(3)}%`, "");
  }
  lines.push(RULE);
  return lines.join("\n") + "\n";
}

/** Lines of the last "--- Fluctuation Report @" block, trimmed; null when none. */
export function latestFluctuationBlock(logText: string): string[] | null {
  const lines = logText.split(/\r?\n/);
  let start = -1;
  for (let i = lines.length - 1; i >= 0; i--) {
    if (lines[i].includes("--- Fluctuation Report @")) { start = i; break; }
  }
  if (start === -1) return null;
  return lines.slice(start).map(l => l.trim()).filter(l => l !== "");
}

export function formatFluctuationSection(logPath: string): string {
  if (!existsSync(logPath)) return "\n--- Fluctuation Log ---\nNo fluctuation log found.\n";
  const block = latestFluctuationBlock(readFileSync(logPath, "utf-8"));
  const body = block ? block.join("\n") : "No fluctuation reports found.";
  return `\n${RULE}\n--- Latest Fluctuation Report ---\n${body}\n${RULE}\n`;
}

// ─── CLI ─────────────────────────────────────────────────────────────────────

async function main() {
  const args = process.argv.slice(2);
  let dataDir: string | undefined;
  let pdfPath: string | undefined;
  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--data-dir" && args[i + 1]) dataDir = args[++i];
    if (args[i] === "--pdf" && args[i + 1]) pdfPath = args[++i];
  }

  const paths = pipelinePaths(dataDir);
  console.log(`[verify] [${formatTaipei(new Date())}] --- Starting verification ---`);

  const { rows, tables } = loadGenerationRows(paths.finalDir);
  console.log(`[verify]    -> ${tables} generation tables`);

  const mix = computeMix(rows, tables);
  console.log("\n" + formatMixReport(mix));
  console.log("[verify] ✅ Verification report complete.");
  console.log(formatFluctuationSection(paths.fluctuationLog));

  if (pdfPath) {
    const pdf = await generateMixPdf(mix, resolve(pdfPath));
    console.log(`[verify] ✅ PDF generated: ${pdf.file_path}`);
    console.log(`[verify]    pdf_hash: ${pdf.pdf_hash}`);
  }
}

if (require.main === module) {
  main().catch((err) => {
    console.error("[verify] FATAL:", err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
