/**
 * Full run against an in-memory feed and forecast source, in a temp data root.
 */

import { existsSync, mkdtempSync, readFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { readCsvTable } from "../csv_table";
import { createStaticForecastSource } from "../forecast_cache";
import { normalizeForecastDocument, type ForecastDocument } from "../forecast_document";
import type { GenerationFeed } from "../generation_feed_client";
import type { FeedError } from "../http_json";
import { isPipelineFailure, runPipeline, type PipelineDeps } from "../live_pipeline";
import { pipelinePaths } from "../pipeline_config";
import type { Region } from "../regions_config";
import { tablePathFor } from "../segmented_store";
import type { RunState } from "../types";
import { countyDoc, dayWindows } from "./forecast_fixtures";

// 09:35 Taipei → effective 09:30
const NOW = new Date("2025-06-01T01:35:00Z");

const FEED_ROWS: unknown[] = [
  ["<b>燃煤</b>", "", "林口#1", "", "800"],
  ["<b>燃煤</b>", "", "林口#2", "", "700.5"],
  ["<b>燃煤</b>", "", "小計", "", "1,500.5"],
  ["<b>風力</b>", "", "花蓮風#1", "", "12"],
  ["<b>太陽能</b>", "", "神秘#1", "", "3"],
];

function hualien(): ForecastDocument {
  const doc = normalizeForecastDocument(countyDoc({
    "花蓮市": {
      "平均溫度": dayWindows({ Temperature: "27.5" }, { Temperature: "24" }),
      "風速": dayWindows({ WindSpeed: "3" }, { WindSpeed: "6" }),
      "天氣現象": dayWindows({ WeatherCode: "02" }, { WeatherCode: "04" }),
    },
  }));
  if (!doc) throw new Error("fixture did not normalize");
  return doc;
}

function deps(dataRoot: string, feed: GenerationFeed | FeedError): PipelineDeps {
  return {
    paths: pipelinePaths(dataRoot),
    now: NOW,
    fetchFeed: async () => feed,
    fetchDemand: async () => ({ records: [{ curr_load: "25,000.5" }] }),
    forecasts: createStaticForecastSource({ "花蓮縣": hualien() }),
    staticRegions: new Map<string, Region>(),
  };
}

const okFeed: GenerationFeed = { rows: FEED_ROWS, fetched_at_utc: "2025-06-01T01:35:01Z" };
const emptyState = (): RunState => ({ previous_unit_names: new Set() });

beforeEach(() => {
  jest.spyOn(console, "log").mockImplementation(() => {});
  jest.spyOn(console, "warn").mockImplementation(() => {});
  jest.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => jest.restoreAllMocks());

describe("runPipeline", () => {
  test("first run writes tables, logs and demand", async () => {
    const root = mkdtempSync(join(tmpdir(), "pipeline-"));
    const result = await runPipeline(deps(root, okFeed), emptyState());
    if (isPipelineFailure(result)) throw new Error(result.error_text);

    expect(result.summary).toEqual({
      timestamp: "2025-06-01 09:30:00",
      units: 4,
      added: ["林口#1", "林口#2", "神秘#1", "花蓮風#1"],
      missing: [],
      unknown: ["神秘#1"],
      aggregated_rows: 3,
      tables: 3,
      replaced_rows: 0,
      demand_mw: 25000.5,
    });
    expect([...result.next_state.previous_unit_names].sort()).toEqual(["林口#1", "林口#2", "神秘#1", "花蓮風#1"]);

    const finalDir = join(root, "final_data");
    expect(readCsvTable(tablePathFor(finalDir, "North", "燃煤(Coal)"))?.rows).toEqual([{
      DATETIME: "2025-06-01 09:30:00", REGION: "North", FUEL_TYPE: "燃煤(Coal)", NET_P: "1500.5",
      TEMP_now: "", WIND_now: "", W_CODE_now: "", TEMP_future_12h: "", WIND_future_12h: "", W_CODE_future_12h: "",
    }]);
    expect(readCsvTable(tablePathFor(finalDir, "East", "風力(Wind)"))?.rows).toEqual([{
      DATETIME: "2025-06-01 09:30:00", REGION: "East", FUEL_TYPE: "風力(Wind)", NET_P: "12",
      TEMP_now: "27.5", WIND_now: "3", W_CODE_now: "2", TEMP_future_12h: "24", WIND_future_12h: "6", W_CODE_future_12h: "4",
    }]);
    expect(existsSync(tablePathFor(finalDir, "Unknown", "太陽能(Solar)"))).toBe(true);

    expect(readFileSync(join(root, "unknown_plants_log.txt"), "utf-8"))
      .toBe("[2025-06-01 09:30:00] ❌ Unknown Plants Detected:\n  神秘#1\n");
    expect(readCsvTable(join(root, "unit_details_log.csv"))?.rows).toHaveLength(4);
    expect(readCsvTable(join(finalDir, "electricity_demand.csv"))?.rows)
      .toEqual([{ DATETIME: "2025-06-01 09:30:00", DEMAND_MW: "25000.5" }]);
  });

  test("re-running the same timestamp leaves one row per table", async () => {
    const root = mkdtempSync(join(tmpdir(), "pipeline-"));
    const first = await runPipeline(deps(root, okFeed), emptyState());
    if (isPipelineFailure(first)) throw new Error(first.error_text);
    const second = await runPipeline(deps(root, okFeed), first.next_state);
    if (isPipelineFailure(second)) throw new Error(second.error_text);

    expect(second.summary.added).toEqual([]);
    expect(second.summary.missing).toEqual([]);
    expect(second.summary.replaced_rows).toBe(3);

    const finalDir = join(root, "final_data");
    for (const [region, fuel] of [["North", "燃煤(Coal)"], ["East", "風力(Wind)"], ["Unknown", "太陽能(Solar)"]]) {
      expect(readCsvTable(tablePathFor(finalDir, region, fuel))?.rows).toHaveLength(1);
    }

    const log = readFileSync(join(root, "fluctuation_log.txt"), "utf-8");
    expect(log.endsWith("--- Fluctuation Report @ 2025-06-01 09:30:00 (4 plants) ✅ ---\n")).toBe(true);
  });

  test("fetch failure writes nothing", async () => {
    const root = mkdtempSync(join(tmpdir(), "pipeline-"));
    const failure: FeedError = { error_code: "FETCH_ERROR", error_text: "timeout", fetched_at_utc: "2025-06-01T01:35:20Z" };
    const result = await runPipeline(deps(root, failure), emptyState());

    expect(result).toEqual({ error_code: "FETCH_ERROR", error_text: "timeout", timestamp: "2025-06-01 09:30:00" });
    expect(existsSync(join(root, "final_data"))).toBe(false);
    expect(existsSync(join(root, "fluctuation_log.txt"))).toBe(false);
  });

  test("feed without valid records is NO_RECORDS", async () => {
    const root = mkdtempSync(join(tmpdir(), "pipeline-"));
    const result = await runPipeline(deps(root, { rows: [["<b>Load</b>", "", "x", "", "1"]], fetched_at_utc: "t" }), emptyState());

    expect(isPipelineFailure(result)).toBe(true);
    if (isPipelineFailure(result)) expect(result.error_code).toBe("NO_RECORDS");
    expect(existsSync(join(root, "unit_details_log.csv"))).toBe(false);
  });

  test("demand snapshot can be switched off", async () => {
    const root = mkdtempSync(join(tmpdir(), "pipeline-"));
    const result = await runPipeline({ ...deps(root, okFeed), fetchDemand: null }, emptyState());

    expect(isPipelineFailure(result)).toBe(false);
    if (!isPipelineFailure(result)) expect(result.summary.demand_mw).toBeNull();
    expect(existsSync(join(root, "final_data", "electricity_demand.csv"))).toBe(false);
  });
});
