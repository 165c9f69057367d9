/**
 * Live Pipeline Types
 *
 * Records flowing through one run:
 *   GenerationRecord → (region) → EnrichedRecord → AggregatedRow
 *
 * Missing weather values are `null`, never 0.
 */

import type { Region } from "./regions_config";

// ─── Feed ────────────────────────────────────────────────────────────────────

/** One active generating unit as read from the live feed. */
export interface GenerationRecord {
  /** Effective timestamp, "YYYY-MM-DD HH:mm:ss" (Taipei) */
  timestamp: string;
  unit_name: string;
  /** Bilingual label, e.g. "燃煤(Coal)" */
  fuel_type: string;
  net_power_mw: number;
}

// ─── Weather ─────────────────────────────────────────────────────────────────

export const WEATHER_FEATURE_KEYS = [
  "TEMP_now",
  "WIND_now",
  "W_CODE_now",
  "TEMP_future_12h",
  "WIND_future_12h",
  "W_CODE_future_12h",
] as const;

export type WeatherFeatureKey = typeof WEATHER_FEATURE_KEYS[number];

export type WeatherFeatureSet = Record<WeatherFeatureKey, number | null>;

export function emptyFeatureSet(): WeatherFeatureSet {
  return {
    TEMP_now: null,
    WIND_now: null,
    W_CODE_now: null,
    TEMP_future_12h: null,
    WIND_future_12h: null,
    W_CODE_future_12h: null,
  };
}

// ─── Aggregation ─────────────────────────────────────────────────────────────

export interface EnrichedRecord extends GenerationRecord {
  region: Region;
  weather: WeatherFeatureSet;
}

export interface AggregatedRow {
  timestamp: string;
  region: Region;
  fuel_type: string;
  net_power_sum: number;
  weather: WeatherFeatureSet;
}

// ─── Run State ───────────────────────────────────────────────────────────────

export interface RunState {
  previous_unit_names: Set<string>;
}
