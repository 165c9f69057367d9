/**
 * Forecast Index — one scalar per (location, element, instant).
 *
 * Window selection: first window with start ≤ t < end. When none contains
 * t (including t before the first window), the first window is used.
 *
 * Total: every path ends in a finite number or null.
 */

import { FORECAST_ELEMENTS } from "./regions_config";
import type { ForecastDocument, ForecastElement, ForecastScalar, ForecastWindow } from "./forecast_document";

const WEATHER_CODE_FIELD = "WeatherCode";

const PLAIN_NUMBER = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;
const EMBEDDED_NUMBER = /-?\d+(\.\d+)?/;

/**
 * Parse a published value. Direct numeric parse first, then the first
 * numeric substring ("≥ 11" → 11). Empty, "-" and non-numeric → null.
 */
export function parseForecastScalar(value: ForecastScalar | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;

  const s = value.trim();
  if (!s || s === "-") return null;
  if (PLAIN_NUMBER.test(s)) {
    const n = Number(s);
    return Number.isFinite(n) ? n : null;
  }
  const m = s.match(EMBEDDED_NUMBER);
  if (!m) return null;
  const n = Number(m[0]);
  return Number.isFinite(n) ? n : null;
}

export function selectWindow(windows: ForecastWindow[], targetMs: number): ForecastWindow | null {
  for (const w of windows) {
    if (w.start === null || w.end === null) continue;
    if (w.start <= targetMs && targetMs < w.end) return w;
  }
  return windows[0] ?? null;
}

function findElement(doc: ForecastDocument, locationName: string, elementName: string): ForecastElement | null {
  const location = doc.locations.find(l => l.name === locationName);
  if (!location) return null;
  const elements = location.elements.length > 0 ? location.elements : doc.sharedElements;
  return elements.find(e => e.name === elementName) ?? null;
}

export function lookupForecastValue(
  doc: ForecastDocument,
  locationName: string,
  elementName: string,
  target: Date,
): number | null {
  const element = findElement(doc, locationName, elementName);
  if (!element) return null;

  const chosen = selectWindow(element.windows, target.getTime());
  if (!chosen) return null;

  if (elementName === FORECAST_ELEMENTS.weatherCode) {
    return parseForecastScalar(chosen.values[WEATHER_CODE_FIELD]);
  }
  const [first] = Object.values(chosen.values);
  return parseForecastScalar(first);
}
