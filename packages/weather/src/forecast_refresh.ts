/**
 * Forecast Cache Refresh — CWA F-D0047-093, one document per county.
 *
 * Steps:
 *   1. Fetch every vital county (sequential, failures skipped)
 *   2. Save raw JSON to {data}/forecast_cache/{county}_forecast.json
 *   3. Log a now / next-window weather summary per county (weather_data_log.csv)
 *   4. Fingerprint the combined structure, log changes
 *
 * Usage:
 *   npx tsx packages/weather/src/forecast_refresh.ts [--data-dir ./data]
 *
 * Schedule: every 6 hours (00:05, 06:05, 12:05, 18:05). The live pipeline
 * tolerates stale or missing cache files.
 */

import { appendFileSync, mkdirSync } from "fs";
import { dirname, join } from "path";
import { appendCsvRows, writeFileAtomic, type CsvRow } from "../../pipeline/src/csv_table";
import { formatTaipei } from "../../pipeline/src/effective_time";
import { forecastFileName } from "../../pipeline/src/forecast_cache";
import { normalizeForecastDocument, type ForecastElement } from "../../pipeline/src/forecast_document";
import { fetchJson, isFeedError, type FeedError, type FeedJson } from "../../pipeline/src/http_json";
import { pipelinePaths } from "../../pipeline/src/pipeline_config";
import { FORECAST_ELEMENTS } from "../../pipeline/src/regions_config";
import { CWA_TIMEOUT_MS, FORECAST_DATASET, VITAL_LOCATIONS, cwaUrl, getCwaApiKey } from "./cwa_config";
import { checkStructure, structureFingerprint, type FingerprintCheck } from "./structure_fingerprint";

// ─── Paths ───────────────────────────────────────────────────────────────────

export interface ForecastRefreshPaths {
  cacheDir: string;
  structureLog: string;
  fingerprintFile: string;
  weatherDataLog: string;
}

export function forecastRefreshPaths(dataRoot: string): ForecastRefreshPaths {
  return {
    cacheDir: pipelinePaths(dataRoot).forecastCacheDir,
    structureLog: join(dataRoot, "weather_structure_log.txt"),
    fingerprintFile: join(dataRoot, "weather_structure_fingerprint.json"),
    weatherDataLog: join(dataRoot, "weather_data_log.csv"),
  };
}

// ─── Summary ─────────────────────────────────────────────────────────────────

export const SUMMARY_COLUMNS = [
  "timestamp", "county",
  "TEMP_now", "WIND_now", "W_CODE_now",
  "TEMP_future_12h", "WIND_future_12h", "W_CODE_future_12h",
];

const SUMMARY_FIELDS = [
  { key: "TEMP", element: FORECAST_ELEMENTS.temperature, valueKey: "Temperature" },
  { key: "WIND", element: FORECAST_ELEMENTS.wind, valueKey: "WindSpeed" },
  { key: "W_CODE", element: FORECAST_ELEMENTS.weatherCode, valueKey: "WeatherCode" },
] as const;

function windowValue(element: ForecastElement | undefined, index: number, valueKey: string): string {
  const v = element?.windows[index]?.values[valueKey];
  return v === null || v === undefined ? "N/A" : String(v);
}

/**
 * Per-county summary from the first location: first window as "now",
 * second window as the 12h proxy. Absent values are "N/A".
 */
export function summarizeForecast(county: string, raw: unknown, timestamp: string): CsvRow {
  const row: CsvRow = { timestamp, county };
  const first = normalizeForecastDocument(raw)?.locations[0];
  for (const f of SUMMARY_FIELDS) {
    const element = first?.elements.find(e => e.name === f.element);
    row[`${f.key}_now`] = windowValue(element, 0, f.valueKey);
    row[`${f.key}_future_12h`] = windowValue(element, 1, f.valueKey);
  }
  return row;
}

// ─── Refresh ─────────────────────────────────────────────────────────────────

export type CountyForecastFetcher = (county: string, locationId: string) => Promise<FeedJson | FeedError>;

export function cwaForecastFetcher(apiKey: string): CountyForecastFetcher {
  return (_county, locationId) =>
    fetchJson(cwaUrl(FORECAST_DATASET, { Authorization: apiKey, locationId }), CWA_TIMEOUT_MS);
}

export interface RefreshResult {
  fetched: string[];
  failed: string[];
  structure: FingerprintCheck | null;
}

export async function refreshForecasts(
  fetcher: CountyForecastFetcher,
  paths: ForecastRefreshPaths,
  now: Date = new Date(),
  locations: Record<string, string> = VITAL_LOCATIONS,
): Promise<RefreshResult> {
  const timestamp = formatTaipei(now);
  const fetched: string[] = [];
  const failed: string[] = [];
  const documents: unknown[] = [];

  for (const [county, locationId] of Object.entries(locations)) {
    console.log(`[forecast] 📡 ${county} (${locationId})...`);
    const res = await fetcher(county, locationId);
    if (isFeedError(res)) {
      console.error(`[forecast] ❌ ${county}: ${res.error_code} ${res.error_text}`);
      failed.push(county);
      continue;
    }

    const outPath = join(paths.cacheDir, forecastFileName(county));
    writeFileAtomic(outPath, JSON.stringify(res.json, null, 2));
    appendCsvRows(paths.weatherDataLog, SUMMARY_COLUMNS, [summarizeForecast(county, res.json, timestamp)]);
    console.log(`[forecast] ✅ ${county} → ${outPath}`);

    fetched.push(county);
    documents.push(res.json);
  }

  let structure: FingerprintCheck | null = null;
  if (documents.length > 0) {
    structure = checkStructure(paths.fingerprintFile, paths.structureLog, structureFingerprint(documents), timestamp);
  } else {
    const message = `[${timestamp}] ⚠️ No weather data fetched successfully to generate a structure fingerprint.\n`;
    mkdirSync(dirname(paths.structureLog), { recursive: true });
    appendFileSync(paths.structureLog, message, "utf-8");
    console.warn(`[forecast] ${message.trimEnd()}`);
  }

  return { fetched, failed, structure };
}

// ─── CLI ─────────────────────────────────────────────────────────────────────

async function main() {
  const args = process.argv.slice(2);
  let dataDir: string | undefined;
  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--data-dir" && args[i + 1]) dataDir = args[++i];
  }

  const paths = forecastRefreshPaths(pipelinePaths(dataDir).dataRoot);
  console.log(`[forecast] --- Starting regional forecast fetch → ${paths.cacheDir} ---`);

  const result = await refreshForecasts(cwaForecastFetcher(getCwaApiKey()), paths);

  console.log(`[forecast] DONE: ${result.fetched.length} fetched, ${result.failed.length} failed`);
  if (result.fetched.length === 0) process.exit(1);
}

if (require.main === module) {
  main().catch((err) => {
    console.error("[forecast] FATAL:", err);
    process.exit(1);
  });
}
