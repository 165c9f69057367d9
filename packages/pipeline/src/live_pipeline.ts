/**
 * Live Pipeline — one run, fetch to segmented tables.
 *
 * Pipeline order:
 *   1. Effective timestamp (Taipei, floored to 10 min)
 *   2. Fetch generation feed; failure aborts, nothing is written
 *   3. Demand snapshot (warning-only)
 *   4. Unit diff vs previous state → fluctuation log
 *   5. Region resolution → unknown plants log, unit details log
 *   6. Weather enrichment per region (forecast cache)
 *   7. Aggregate (timestamp, region, fuel) → upsert segmented tables
 *
 * State is passed in and handed back; the CLI persists it only on success.
 *
 * Usage:
 *   npx tsx packages/pipeline/src/live_pipeline.ts [--data-dir ./data] [--no-demand]
 *
 * Scheduling is external (cron every 10 minutes); runs must not overlap.
 */

import { aggregateRecords } from "./aggregator";
import { fetchDemandJson, recordDemand, type DemandFetcher } from "./demand_client";
import { effectiveTimeFor } from "./effective_time";
import { createFileForecastSource, type ForecastSource } from "./forecast_cache";
import {
  appendFluctuationLog,
  diffUnits,
  formatFluctuationBlock,
  readRunState,
  writeRunState,
} from "./fluctuation_tracker";
import { fetchGenerationFeed, toGenerationRecords, type GenerationFeed } from "./generation_feed_client";
import { isFeedError, type FeedError } from "./http_json";
import { pipelinePaths, type PipelinePaths } from "./pipeline_config";
import { loadStaticRegionMap, resolveRegion, unknownUnits, type StaticRegionMap } from "./region_resolver";
import { UNKNOWN_REGION, type Region } from "./regions_config";
import { upsertRows } from "./segmented_store";
import { emptyFeatureSet, type EnrichedRecord, type RunState } from "./types";
import { appendUnitDetails, appendUnknownPlantsLog } from "./unit_logs";
import { enrichRegions } from "./weather_enricher";

// ─── Types ───────────────────────────────────────────────────────────────────

export interface PipelineDeps {
  paths: PipelinePaths;
  now: Date;
  fetchFeed: (now: Date) => Promise<GenerationFeed | FeedError>;
  /** null skips the demand snapshot */
  fetchDemand: DemandFetcher | null;
  forecasts: ForecastSource;
  staticRegions: StaticRegionMap;
}

export interface RunSummary {
  timestamp: string;
  units: number;
  added: string[];
  missing: string[];
  unknown: string[];
  aggregated_rows: number;
  tables: number;
  replaced_rows: number;
  demand_mw: number | null;
}

export interface PipelineSuccess {
  summary: RunSummary;
  next_state: RunState;
}

export interface PipelineFailure {
  error_code: FeedError["error_code"] | "NO_RECORDS";
  error_text: string;
  timestamp: string;
}

/** Type guard: did the run abort? */
export function isPipelineFailure(r: PipelineSuccess | PipelineFailure): r is PipelineFailure {
  return "error_code" in r;
}

// ─── Run ─────────────────────────────────────────────────────────────────────

export async function runPipeline(deps: PipelineDeps, state: RunState): Promise<PipelineSuccess | PipelineFailure> {
  const { paths } = deps;
  const { instant, formatted } = effectiveTimeFor(deps.now);
  console.log(`[pipeline] --- Running pipeline for ${formatted} ---`);

  const feed = await deps.fetchFeed(deps.now);
  if (isFeedError(feed)) {
    console.error(`[pipeline] 🚨 FAILED to fetch generation feed: ${feed.error_code} ${feed.error_text}`);
    return { error_code: feed.error_code, error_text: feed.error_text, timestamp: formatted };
  }

  const records = toGenerationRecords(feed.rows, formatted);
  if (records.length === 0) {
    console.error("[pipeline] 🚨 no valid generator records in feed");
    return { error_code: "NO_RECORDS", error_text: "no valid generator records", timestamp: formatted };
  }
  console.log(`[pipeline] fetched ${records.length} active unit rows`);

  const demand = deps.fetchDemand ? await recordDemand(deps.fetchDemand, paths.demandTable, formatted) : null;

  // Unit diff
  const currentUnits = new Set(records.map(r => r.unit_name));
  const diff = diffUnits(currentUnits, state.previous_unit_names);
  appendFluctuationLog(paths.fluctuationLog, formatFluctuationBlock(formatted, currentUnits.size, diff));
  console.log(`[pipeline] fluctuation: added ${diff.added.length}, missing ${diff.missing.length}`);

  // Regions
  const regions = new Map<string, Region>();
  for (const unit of currentUnits) regions.set(unit, resolveRegion(unit, deps.staticRegions));
  const unknown = unknownUnits(regions);
  appendUnknownPlantsLog(paths.unknownPlantsLog, formatted, unknown);
  const detailRows = appendUnitDetails(paths.unitDetailsLog, records, regions);
  console.log(`[pipeline] regions assigned (${unknown.length} unknown), ${detailRows} unit detail rows`);

  // Weather
  const weather = enrichRegions(regions.values(), instant, deps.forecasts);
  const enriched: EnrichedRecord[] = records.map(r => {
    const region = regions.get(r.unit_name) ?? UNKNOWN_REGION;
    return { ...r, region, weather: weather.get(region) ?? emptyFeatureSet() };
  });

  // Aggregate + persist
  const rows = aggregateRecords(enriched);
  const upsert = upsertRows(paths.finalDir, rows);
  console.log(`[pipeline] ${upsert.rows} rows → ${upsert.tables} tables (${upsert.replaced} replaced)`);

  return {
    summary: {
      timestamp: formatted,
      units: currentUnits.size,
      added: diff.added,
      missing: diff.missing,
      unknown,
      aggregated_rows: upsert.rows,
      tables: upsert.tables,
      replaced_rows: upsert.replaced,
      demand_mw: demand,
    },
    next_state: { previous_unit_names: currentUnits },
  };
}

// ─── CLI ─────────────────────────────────────────────────────────────────────

function parseArgs(): { dataDir: string | undefined; demand: boolean } {
  const args = process.argv.slice(2);
  let dataDir: string | undefined;
  let demand = true;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--data-dir" && args[i + 1]) dataDir = args[++i];
    if (args[i] === "--no-demand") demand = false;
  }
  return { dataDir, demand };
}

async function main() {
  const { dataDir, demand } = parseArgs();
  const paths = pipelinePaths(dataDir);

  const deps: PipelineDeps = {
    paths,
    now: new Date(),
    fetchFeed: fetchGenerationFeed,
    fetchDemand: demand ? fetchDemandJson : null,
    forecasts: createFileForecastSource(paths.forecastCacheDir),
    staticRegions: loadStaticRegionMap(paths.plantMapFile),
  };

  const state = readRunState(paths.stateFile);
  const result = await runPipeline(deps, state);

  if (isPipelineFailure(result)) {
    console.error(`[pipeline] ❌ Pipeline run failed @ ${result.timestamp}: ${result.error_code}`);
    process.exit(1);
  }

  writeRunState(paths.stateFile, result.next_state);
  console.log(`[pipeline] ✅ Pipeline run successful @ ${result.summary.timestamp}`);
}

if (require.main === module) {
  main().catch((err) => {
    console.error("[pipeline] FATAL:", err);
    process.exit(1);
  });
}
