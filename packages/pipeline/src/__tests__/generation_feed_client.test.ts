/**
 * genary.json row parsing.
 */

import { parseGenerationFeed, toGenerationRecords } from "../generation_feed_client";
import { isFeedError } from "../http_json";

const TS = "2025-06-01 09:30:00";

describe("toGenerationRecords", () => {
  const rows: unknown[] = [
    ["<A NAME='coal'></A><b>燃煤</b>", "", "林口#1", "800.0", "1,234.5", "154.2%", ""],
    ["<b>燃煤</b>", "", "小計", "", "5,000.0"],
    ["<b>Load</b>", "", "Total", "", "30,000"],
    ["<b>風力</b>", "", "彰工風#1", "", "N/A"],
    ["<b>風力</b>", "", "彰工風#2", "", "-"],
    ["<b>太陽能</b>", "", "  ", "", "10"],
    ["no label", "", "X#1", "", "10"],
    ["<b>地熱</b>", "", "台電自有地熱", "", "0.3"],
    ["<b>儲能</b>", "", "大潭儲能", "", "-12.5"],
    ["short"],
    "not a row",
  ];
  const records = toGenerationRecords(rows, TS);

  test("comma thousands and bilingual label", () => {
    expect(records[0]).toEqual({ timestamp: TS, unit_name: "林口#1", fuel_type: "燃煤(Coal)", net_power_mw: 1234.5 });
  });

  test("subtotal, Load, non-numeric, unlabelled and short rows are skipped", () => {
    expect(records.map(r => r.unit_name)).toEqual(["林口#1", "台電自有地熱", "大潭儲能"]);
  });

  test("unknown labels pass through, negatives kept", () => {
    expect(records[1].fuel_type).toBe("地熱");
    expect(records[2]).toMatchObject({ fuel_type: "儲能(Energy Storage System)", net_power_mw: -12.5 });
  });
});

describe("parseGenerationFeed", () => {
  test("aaData rows are passed through", () => {
    const res = parseGenerationFeed({ json: { aaData: [["a"]] }, fetched_at_utc: "2025-06-01T01:30:00Z" });
    expect(isFeedError(res)).toBe(false);
    if (!isFeedError(res)) expect(res.rows).toEqual([["a"]]);
  });

  test("missing aaData is BAD_SHAPE", () => {
    const res = parseGenerationFeed({ json: { data: [] }, fetched_at_utc: "2025-06-01T01:30:00Z" });
    expect(res).toEqual({ error_code: "BAD_SHAPE", error_text: "feed has no aaData array", fetched_at_utc: "2025-06-01T01:30:00Z" });
  });
});
