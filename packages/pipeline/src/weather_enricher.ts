/**
 * Weather Enricher — regional forecast features for one effective instant.
 *
 * Per horizon (now, +12h):
 *   TEMP / WIND  = mean over the profile's towns, present values only
 *   W_CODE       = value at the representative town (categorical, never averaged)
 *
 * Regions without a profile (Other, Unknown) get an all-null set and stay in
 * the pipeline. A missing county document nulls the whole region for the run.
 */

import type { ForecastSource } from "./forecast_cache";
import type { ForecastDocument } from "./forecast_document";
import { lookupForecastValue } from "./forecast_index";
import { FORECAST_ELEMENTS, FORECAST_HORIZONS, WEATHER_PROFILES, type Region } from "./regions_config";
import { emptyFeatureSet, type WeatherFeatureSet } from "./types";

/** Mean rounded to 2 decimals; null for an empty list. */
export function meanOrNull(values: number[]): number | null {
  if (values.length === 0) return null;
  const mean = values.reduce((s, v) => s + v, 0) / values.length;
  return Math.round(mean * 100) / 100;
}

export function enrichRegion(region: Region, effective: Date, source: ForecastSource): WeatherFeatureSet {
  const profile = WEATHER_PROFILES[region];
  const features = emptyFeatureSet();
  if (!profile) return features;

  const docs = new Map<string, ForecastDocument>();
  for (const county of profile.counties) {
    const doc = source.load(county);
    if (!doc) {
      console.warn(`[weather] ⚠️ forecast for ${county} unavailable, no weather for ${region} this run`);
      return emptyFeatureSet();
    }
    docs.set(county, doc);
  }

  for (const { suffix, hours } of FORECAST_HORIZONS) {
    const target = new Date(effective.getTime() + hours * 3600_000);
    const temps: number[] = [];
    const winds: number[] = [];

    for (const { county, town } of profile.avg_towns) {
      const doc = docs.get(county);
      if (!doc) continue;
      const temp = lookupForecastValue(doc, town, FORECAST_ELEMENTS.temperature, target);
      const wind = lookupForecastValue(doc, town, FORECAST_ELEMENTS.wind, target);
      if (temp !== null) temps.push(temp);
      if (wind !== null) winds.push(wind);
    }

    const codeDoc = docs.get(profile.code_town.county);
    const code = codeDoc
      ? lookupForecastValue(codeDoc, profile.code_town.town, FORECAST_ELEMENTS.weatherCode, target)
      : null;

    features[`TEMP_${suffix}` as const] = meanOrNull(temps);
    features[`WIND_${suffix}` as const] = meanOrNull(winds);
    features[`W_CODE_${suffix}` as const] = code === null ? null : Math.trunc(code);
  }

  return features;
}

/** Enrich each distinct region once. */
export function enrichRegions(
  regions: Iterable<Region>,
  effective: Date,
  source: ForecastSource,
): Map<Region, WeatherFeatureSet> {
  const out = new Map<Region, WeatherFeatureSet>();
  for (const region of regions) {
    if (!out.has(region)) out.set(region, enrichRegion(region, effective, source));
  }
  return out;
}
