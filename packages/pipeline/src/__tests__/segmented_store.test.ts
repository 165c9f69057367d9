/**
 * Segmented tables: naming, row encoding, idempotent upsert.
 */

import { mkdtempSync, readFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { readCsvTable } from "../csv_table";
import { sanitizeName, tablePathFor, toTableRow, upsertRows, upsertTable } from "../segmented_store";
import { emptyFeatureSet, type AggregatedRow } from "../types";

const HEADER = "DATETIME,REGION,FUEL_TYPE,NET_P,TEMP_now,WIND_now,W_CODE_now,TEMP_future_12h,WIND_future_12h,W_CODE_future_12h";

function row(timestamp: string, mw: number): AggregatedRow {
  return {
    timestamp,
    region: "North",
    fuel_type: "燃煤(Coal)",
    net_power_sum: mw,
    weather: { ...emptyFeatureSet(), TEMP_now: 27.5 },
  };
}

describe("naming", () => {
  test("sanitizeName drops parenthesized text and reserved characters", () => {
    expect(sanitizeName("燃煤(Coal)")).toBe("燃煤");
    expect(sanitizeName("民營電廠-燃煤(IPP-Coal)")).toBe("民營電廠-燃煤");
    expect(sanitizeName("a/b:c")).toBe("a_b_c");
  });

  test("tablePathFor", () => {
    expect(tablePathFor("/data/final_data", "North", "燃煤(Coal)")).toBe(join("/data/final_data", "North", "North_燃煤.csv"));
  });
});

test("toTableRow rounds NET_P and writes missing weather as empty", () => {
  const r = toTableRow({ ...row("2025-06-01 09:30:00", 1234.56789) });
  expect(r.NET_P).toBe("1234.568");
  expect(r.TEMP_now).toBe("27.5");
  expect(r.WIND_now).toBe("");
});

describe("upsertRows", () => {
  test("re-running a timestamp keeps one row", () => {
    const dir = mkdtempSync(join(tmpdir(), "store-"));
    const first = upsertRows(dir, [row("2025-06-01 09:30:00", 1500.5)]);
    const second = upsertRows(dir, [row("2025-06-01 09:30:00", 1600)]);

    expect(first).toEqual({ tables: 1, rows: 1, replaced: 0 });
    expect(second).toEqual({ tables: 1, rows: 1, replaced: 1 });

    const path = tablePathFor(dir, "North", "燃煤(Coal)");
    expect(readFileSync(path, "utf-8")).toBe(
      `\uFEFF${HEADER}\n2025-06-01 09:30:00,North,燃煤(Coal),1600,27.5,,,,,\n`,
    );
  });

  test("new timestamps append", () => {
    const dir = mkdtempSync(join(tmpdir(), "store-"));
    upsertRows(dir, [row("2025-06-01 09:30:00", 1500.5)]);
    upsertRows(dir, [row("2025-06-01 09:40:00", 1490)]);

    const table = readCsvTable(tablePathFor(dir, "North", "燃煤(Coal)"));
    expect(table?.rows.map(r => [r.DATETIME, r.NET_P])).toEqual([
      ["2025-06-01 09:30:00", "1500.5"],
      ["2025-06-01 09:40:00", "1490"],
    ]);
  });
});

test("upsertTable matches timestamps as instants", () => {
  const path = join(mkdtempSync(join(tmpdir(), "store-")), "t.csv");
  upsertTable(path, ["DATETIME", "V"], "DATETIME", [{ DATETIME: "2025-06-01 09:30", V: "1" }]);
  const replaced = upsertTable(path, ["DATETIME", "V"], "DATETIME", [{ DATETIME: "2025-06-01 09:30:00", V: "2" }]);
  expect(replaced).toBe(1);
  expect(readCsvTable(path)?.rows).toEqual([{ DATETIME: "2025-06-01 09:30:00", V: "2" }]);
});
