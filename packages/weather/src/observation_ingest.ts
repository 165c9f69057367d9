/**
 * Real-time Observation Ingest — CWA O-A0003-001 (manned stations)
 *
 * One fetch per invocation:
 *   - per-station rows → {data}/10min_weather_log.csv (NULL flags)
 *   - per-region averages → {data}/weather_data/{region}.csv, unless the
 *     region's last ObsTime already equals this observation time
 *
 * Usage:
 *   npx tsx packages/weather/src/observation_ingest.ts [--data-dir ./data]
 *
 * CWA marks missing readings with large negative numbers (-99, -999).
 */

import { join } from "path";
import { appendCsvRows, formatCell, readCsvTable, type CsvRow } from "../../pipeline/src/csv_table";
import { fetchJson, isFeedError } from "../../pipeline/src/http_json";
import { pipelinePaths } from "../../pipeline/src/pipeline_config";
import { CWA_TIMEOUT_MS, OBSERVATION_DATASET, STATIONS_BY_REGION, cwaUrl, getCwaApiKey } from "./cwa_config";

export const OBSERVATION_FIELDS = ["SunshineDuration", "AirTemperature", "WindSpeed"] as const;
export type ObservationField = typeof OBSERVATION_FIELDS[number];
export type StationReading = Record<ObservationField, number | null>;

export const REGION_COLUMNS = ["ObsTime", ...OBSERVATION_FIELDS];
export const STATION_LOG_COLUMNS = [
  "Timestamp", "StationName", "AirTemperature", "WindSpeed", "SunshineDuration", "HasNullValue",
];

const SENTINEL_THRESHOLD = -90;

export interface ObservationPaths {
  weatherDataDir: string;
  stationLog: string;
}

export function observationPaths(dataRoot: string): ObservationPaths {
  return {
    weatherDataDir: join(dataRoot, "weather_data"),
    stationLog: join(dataRoot, "10min_weather_log.csv"),
  };
}

// ─── Parsing ─────────────────────────────────────────────────────────────────

/** Numeric reading, or null for sentinels and non-numeric values. */
export function readingValue(value: unknown): number | null {
  const n = typeof value === "number" ? value
    : typeof value === "string" && value.trim() !== "" ? Number(value)
    : NaN;
  if (!Number.isFinite(n) || n < SENTINEL_THRESHOLD) return null;
  return n;
}

function field(obj: unknown, key: string): unknown {
  if (typeof obj !== "object" || obj === null || !(key in obj)) return undefined;
  return Object.entries(obj).find(([k]) => k === key)?.[1];
}

export interface StationObservation {
  station: string;
  obs_time: string | null;
  reading: StationReading;
}

/** Stations listed in STATIONS_BY_REGION, in feed order. Null when the shape is wrong. */
export function parseObservations(json: unknown): StationObservation[] | null {
  const stations = field(field(json, "records"), "Station");
  if (!Array.isArray(stations)) return null;

  const wanted = new Set(Object.values(STATIONS_BY_REGION).flat());
  const out: StationObservation[] = [];
  for (const s of stations) {
    const name = field(s, "StationName");
    if (typeof name !== "string" || !wanted.has(name)) continue;

    const obsTime = field(field(s, "ObsTime"), "DateTime");
    const elements = field(s, "WeatherElement");
    out.push({
      station: name,
      obs_time: typeof obsTime === "string" ? obsTime : null,
      reading: {
        SunshineDuration: readingValue(field(elements, "SunshineDuration")),
        AirTemperature: readingValue(field(elements, "AirTemperature")),
        WindSpeed: readingValue(field(elements, "WindSpeed")),
      },
    });
  }
  return out;
}

// ─── Regional Averages ───────────────────────────────────────────────────────

export function averageReadings(readings: StationReading[]): StationReading {
  const result: StationReading = { SunshineDuration: null, AirTemperature: null, WindSpeed: null };
  for (const f of OBSERVATION_FIELDS) {
    const present = readings.map(r => r[f]).filter((v): v is number => v !== null);
    if (present.length > 0) {
      result[f] = Math.round((present.reduce((a, b) => a + b, 0) / present.length) * 100) / 100;
    }
  }
  return result;
}

function lastObsTime(path: string): string | null {
  const table = readCsvTable(path);
  const last = table?.rows[table.rows.length - 1];
  return last?.ObsTime || null;
}

const nullable = (v: number | null) => (v === null ? "NULL" : String(v));

export interface IngestSummary {
  obs_time: string;
  stations: number;
  regions_written: string[];
  regions_skipped: string[];
}

export function ingestObservations(json: unknown, paths: ObservationPaths): IngestSummary | null {
  const observations = parseObservations(json);
  if (observations === null) {
    console.error("[observe] ❌ no 'records.Station' structure in the API data, aborting");
    return null;
  }
  if (observations.length === 0) {
    console.warn("[observe] ⚠️ no relevant stations in the fetched data, nothing updated");
    return null;
  }
  const obsTime = observations.find(o => o.obs_time !== null)?.obs_time;
  if (!obsTime) {
    console.warn("[observe] ⚠️ no observation timestamp in the data, aborting regional processing");
    return null;
  }

  const logRows: CsvRow[] = observations.map(o => ({
    Timestamp: o.obs_time ?? "",
    StationName: o.station,
    AirTemperature: nullable(o.reading.AirTemperature),
    WindSpeed: nullable(o.reading.WindSpeed),
    SunshineDuration: nullable(o.reading.SunshineDuration),
    HasNullValue: String(OBSERVATION_FIELDS.some(f => o.reading[f] === null)),
  }));
  appendCsvRows(paths.stationLog, STATION_LOG_COLUMNS, logRows);
  console.log(`[observe] 📝 ${logRows.length} station rows @ ${obsTime} → ${paths.stationLog}`);

  const byStation = new Map(observations.map(o => [o.station, o.reading]));
  const written: string[] = [];
  const skipped: string[] = [];

  for (const [region, stations] of Object.entries(STATIONS_BY_REGION)) {
    const outPath = join(paths.weatherDataDir, `${region}.csv`);
    if (lastObsTime(outPath) === obsTime) {
      console.log(`[observe] ✅ ${region} already up to date (${obsTime})`);
      skipped.push(region);
      continue;
    }

    const readings = stations.flatMap(s => {
      const r = byStation.get(s);
      return r ? [r] : [];
    });
    const avg = averageReadings(readings);
    appendCsvRows(outPath, REGION_COLUMNS, [{
      ObsTime: obsTime,
      SunshineDuration: formatCell(avg.SunshineDuration),
      AirTemperature: formatCell(avg.AirTemperature),
      WindSpeed: formatCell(avg.WindSpeed),
    }]);
    console.log(`[observe] 💾 ${region} average → ${outPath}`);
    written.push(region);
  }

  return { obs_time: obsTime, stations: observations.length, regions_written: written, regions_skipped: skipped };
}

// ─── CLI ─────────────────────────────────────────────────────────────────────

async function main() {
  const args = process.argv.slice(2);
  let dataDir: string | undefined;
  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--data-dir" && args[i + 1]) dataDir = args[++i];
  }

  const paths = observationPaths(pipelinePaths(dataDir).dataRoot);
  console.log("[observe] --- Starting real-time weather fetch ---");
  console.log(`[observe] Regional data: ${paths.weatherDataDir}`);

  const res = await fetchJson(cwaUrl(OBSERVATION_DATASET, { Authorization: getCwaApiKey() }), CWA_TIMEOUT_MS);
  if (isFeedError(res)) {
    console.error(`[observe] ❌ ${res.error_code}: ${res.error_text}`);
    process.exit(1);
  }

  const summary = ingestObservations(res.json, paths);
  console.log(summary ? `[observe] ✅ DONE @ ${summary.obs_time}` : "[observe] DONE (nothing written)");
}

if (require.main === module) {
  main().catch((err) => {
    console.error("[observe] FATAL:", err);
    process.exit(1);
  });
}
