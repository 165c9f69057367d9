/**
 * Region resolution: static map, keyword fallback, Unknown.
 */

import { mkdtempSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { inferRegionFromName, loadStaticRegionMap, resolveRegion, unknownUnits } from "../region_resolver";
import type { Region } from "../regions_config";

beforeEach(() => {
  jest.spyOn(console, "log").mockImplementation(() => {});
  jest.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => jest.restoreAllMocks());

describe("resolveRegion", () => {
  const empty = new Map<string, Region>();

  test("keyword match when the static map is empty", () => {
    expect(resolveRegion("林口#1", empty)).toBe("North");
    expect(resolveRegion("台中#5", empty)).toBe("Central");
    expect(resolveRegion("興達#3", empty)).toBe("South");
    expect(resolveRegion("和平#1", empty)).toBe("East");
    expect(resolveRegion("塔山#2", empty)).toBe("Islands");
    expect(resolveRegion("汽電共生", empty)).toBe("Other");
  });

  test("static map wins over keywords", () => {
    const map = new Map<string, Region>([["林口#1", "South"]]);
    expect(resolveRegion("林口#1", map)).toBe("South");
    expect(resolveRegion("林口#2", map)).toBe("North");
  });

  test("table order decides between regions, not keyword length", () => {
    expect(inferRegionFromName("林口台中聯絡#1")).toBe("North");
  });

  test("no match is Unknown", () => {
    expect(resolveRegion("神秘#1", empty)).toBe("Unknown");
    expect(inferRegionFromName("神秘#1")).toBeNull();
  });
});

describe("loadStaticRegionMap", () => {
  test("reads UNIT_NAME,REGION and drops rows outside the region set", () => {
    const dir = mkdtempSync(join(tmpdir(), "regions-"));
    const path = join(dir, "plant_to_region_map.csv");
    writeFileSync(path, "\uFEFFUNIT_NAME,REGION\n大潭#1, North \n怪#1,Mars\n,South\n", "utf-8");

    const map = loadStaticRegionMap(path);
    expect(map.size).toBe(1);
    expect(map.get("大潭#1")).toBe("North");
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  test("missing file is an empty map", () => {
    const dir = mkdtempSync(join(tmpdir(), "regions-"));
    expect(loadStaticRegionMap(join(dir, "absent.csv")).size).toBe(0);
  });
});

test("unknownUnits lists Unknown assignments sorted", () => {
  const assignments = new Map<string, Region>([
    ["z#1", "Unknown"],
    ["林口#1", "North"],
    ["a#1", "Unknown"],
  ]);
  expect(unknownUnits(assignments)).toEqual(["a#1", "z#1"]);
});
