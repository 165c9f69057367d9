/**
 * Forecast Document — normalization at the cache boundary.
 *
 * County forecasts arrive in one of two field casings:
 *
 *   records.locations[0].location[].locationName / weatherElement[]
 *     .elementName / time[].startTime / endTime / elementValue[]
 *
 *   Records.Locations[0].Location[].LocationName / WeatherElement[]
 *     .ElementName / Time[].StartTime / EndTime / ElementValue[]
 *
 * Both are read exactly once here into the canonical shape below, so lookup
 * code never deals with key variants.
 */

import { parseTaipeiTimestamp } from "./effective_time";

// ─── Canonical Shape ─────────────────────────────────────────────────────────

export type ForecastScalar = string | number | null;

export interface ForecastWindow {
  /** Epoch ms, null when absent or unparseable */
  start: number | null;
  end: number | null;
  /** First entry of the window's element values, in source key order */
  values: Record<string, ForecastScalar>;
}

export interface ForecastElement {
  name: string;
  windows: ForecastWindow[];
}

export interface ForecastLocation {
  name: string;
  elements: ForecastElement[];
}

export interface ForecastDocument {
  locations: ForecastLocation[];
  /** Elements published at group level, used by locations that carry none */
  sharedElements: ForecastElement[];
}

// ─── Raw Access ──────────────────────────────────────────────────────────────

type RawObject = Record<string, unknown>;

function isObject(v: unknown): v is RawObject {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** First present key among the casing variants. */
function pick(obj: RawObject, ...keys: string[]): unknown {
  for (const k of keys) {
    if (k in obj) return obj[k];
  }
  return undefined;
}

function pickArray(obj: RawObject, ...keys: string[]): unknown[] {
  const v = pick(obj, ...keys);
  return Array.isArray(v) ? v : [];
}

function pickString(obj: RawObject, ...keys: string[]): string | null {
  const v = pick(obj, ...keys);
  return typeof v === "string" ? v : null;
}

const VALUE_KEY_ALIASES: Record<string, string> = {
  weathercode: "WeatherCode",
};

// ─── Normalization ───────────────────────────────────────────────────────────

function normalizeValues(raw: unknown): Record<string, ForecastScalar> {
  const values: Record<string, ForecastScalar> = {};
  if (!isObject(raw)) return values;
  for (const [key, v] of Object.entries(raw)) {
    if (typeof v === "string" || typeof v === "number" || v === null) {
      values[VALUE_KEY_ALIASES[key] ?? key] = v;
    }
  }
  return values;
}

function normalizeWindow(raw: unknown): ForecastWindow | null {
  if (!isObject(raw)) return null;
  const start = pickString(raw, "startTime", "StartTime");
  const end = pickString(raw, "endTime", "EndTime");
  const [first] = pickArray(raw, "elementValue", "ElementValue");
  return {
    start: start === null ? null : parseTaipeiTimestamp(start),
    end: end === null ? null : parseTaipeiTimestamp(end),
    values: normalizeValues(first),
  };
}

function normalizeElements(rawList: unknown[]): ForecastElement[] {
  const elements: ForecastElement[] = [];
  for (const raw of rawList) {
    if (!isObject(raw)) continue;
    const name = pickString(raw, "elementName", "ElementName");
    if (name === null) continue;
    const windows = pickArray(raw, "time", "Time")
      .map(normalizeWindow)
      .filter((w): w is ForecastWindow => w !== null);
    elements.push({ name, windows });
  }
  return elements;
}

/**
 * Normalize a raw county forecast. Returns null when the document has no
 * locations group at all.
 */
export function normalizeForecastDocument(raw: unknown): ForecastDocument | null {
  if (!isObject(raw)) return null;
  const records = pick(raw, "records", "Records");
  if (!isObject(records)) return null;

  const [group] = pickArray(records, "locations", "Locations");
  if (!isObject(group)) return null;

  const locations: ForecastLocation[] = [];
  for (const loc of pickArray(group, "location", "Location")) {
    if (!isObject(loc)) continue;
    const name = pickString(loc, "locationName", "LocationName");
    if (name === null) continue;
    locations.push({ name, elements: normalizeElements(pickArray(loc, "weatherElement", "WeatherElement")) });
  }

  return {
    locations,
    sharedElements: normalizeElements(pickArray(group, "weatherElement", "WeatherElement")),
  };
}
