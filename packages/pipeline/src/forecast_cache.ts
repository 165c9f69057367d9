/**
 * Forecast Cache — per-county forecast documents on disk.
 *
 * Layout: {cacheDir}/{county}_forecast.json, written by the forecast
 * refresher on its own (longer) schedule.
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { normalizeForecastDocument, type ForecastDocument } from "./forecast_document";

export interface ForecastSource {
  /** Normalized document for a county, or null when unavailable */
  load(county: string): ForecastDocument | null;
}

export function forecastFileName(county: string): string {
  return `${county}_forecast.json`;
}

/**
 * File-backed source. Each county is read and normalized at most once per
 * instance; create one instance per run.
 */
export function createFileForecastSource(cacheDir: string): ForecastSource {
  const memo = new Map<string, ForecastDocument | null>();

  function read(county: string): ForecastDocument | null {
    const path = join(cacheDir, forecastFileName(county));
    if (!existsSync(path)) return null;
    try {
      const doc = normalizeForecastDocument(JSON.parse(readFileSync(path, "utf-8")));
      if (!doc) console.warn(`[forecast] ⚠️ ${forecastFileName(county)}: unrecognized structure`);
      return doc;
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      console.warn(`[forecast] ⚠️ ${forecastFileName(county)}: unreadable (${msg})`);
      return null;
    }
  }

  return {
    load(county: string): ForecastDocument | null {
      if (!memo.has(county)) memo.set(county, read(county));
      return memo.get(county) ?? null;
    },
  };
}

/** In-memory source over already-normalized documents. */
export function createStaticForecastSource(docs: Record<string, ForecastDocument>): ForecastSource {
  return {
    load(county: string): ForecastDocument | null {
      return docs[county] ?? null;
    },
  };
}
