/**
 * Pipeline Configuration
 *
 * All paths hang off one data root (default: {project}/data, override with
 * PIPELINE_DATA_DIR). Feed URLs can be overridden for staging mirrors.
 */

import { resolve, join } from "path";

export const PROJECT_ROOT = resolve(__dirname, "../../..");

export const GENERATION_FEED_URL =
  process.env.GENERATION_FEED_URL ?? "https://www.taipower.com.tw/d006/loadGraph/loadGraph/data/genary.json";

export const DEMAND_FEED_URL =
  process.env.DEMAND_FEED_URL ?? "https://www.taipower.com.tw/d006/loadGraph/loadGraph/data/loadpara.json";

export const FEED_TIMEOUT_MS = 20_000;

export interface PipelinePaths {
  dataRoot: string;
  /** Segmented tables, one folder per region */
  finalDir: string;
  forecastCacheDir: string;
  plantMapFile: string;
  stateFile: string;
  fluctuationLog: string;
  unknownPlantsLog: string;
  unitDetailsLog: string;
  demandTable: string;
}

export function pipelinePaths(dataRoot: string = defaultDataRoot()): PipelinePaths {
  const finalDir = join(dataRoot, "final_data");
  return {
    dataRoot,
    finalDir,
    forecastCacheDir: join(dataRoot, "forecast_cache"),
    plantMapFile: join(dataRoot, "plant_to_region_map.csv"),
    stateFile: join(dataRoot, "last_run_units.json"),
    fluctuationLog: join(dataRoot, "fluctuation_log.txt"),
    unknownPlantsLog: join(dataRoot, "unknown_plants_log.txt"),
    unitDetailsLog: join(dataRoot, "unit_details_log.csv"),
    demandTable: join(finalDir, "electricity_demand.csv"),
  };
}

export function defaultDataRoot(): string {
  return process.env.PIPELINE_DATA_DIR ? resolve(process.env.PIPELINE_DATA_DIR) : join(PROJECT_ROOT, "data");
}

/** Cache-busting query parameter, seconds since epoch. */
export function withCacheBust(url: string, now: Date = new Date()): string {
  const sep = url.includes("?") ? "&" : "?";
  return `${url}${sep}_=${Math.floor(now.getTime() / 1000)}`;
}
