/**
 * Unit diff, fluctuation log format, run state persistence.
 */

import { mkdtempSync, readFileSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  appendFluctuationLog,
  diffUnits,
  formatFluctuationBlock,
  readRunState,
  writeRunState,
} from "../fluctuation_tracker";

beforeEach(() => {
  jest.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => jest.restoreAllMocks());

describe("diffUnits", () => {
  test("identical sets are stable", () => {
    const units = new Set(["a", "b"]);
    expect(diffUnits(units, units)).toEqual({ added: [], missing: [] });
  });

  test("added and missing are set differences", () => {
    expect(diffUnits(new Set(["B", "C"]), new Set(["A", "B"]))).toEqual({ added: ["C"], missing: ["A"] });
  });

  test("first run reports every unit as added, sorted", () => {
    expect(diffUnits(new Set(["z", "m", "a"]), new Set())).toEqual({ added: ["a", "m", "z"], missing: [] });
  });
});

describe("formatFluctuationBlock", () => {
  test("stable run", () => {
    expect(formatFluctuationBlock("2025-06-01 09:30:00", 2, { added: [], missing: [] }))
      .toBe("--- Fluctuation Report @ 2025-06-01 09:30:00 (2 plants) ✅ ---\n");
  });

  test("changes listed", () => {
    expect(formatFluctuationBlock("2025-06-01 09:40:00", 3, { added: ["C", "D"], missing: ["A"] })).toBe(
      "--- Fluctuation Report @ 2025-06-01 09:40:00 (3 plants) ❌ ---\n" +
      "  [ADDED] C, D\n" +
      "  [MISSING] A\n",
    );
  });

  test("blocks accumulate in the log", () => {
    const path = join(mkdtempSync(join(tmpdir(), "fluct-")), "logs", "fluctuation_log.txt");
    appendFluctuationLog(path, "one\n");
    appendFluctuationLog(path, "two\n");
    expect(readFileSync(path, "utf-8")).toBe("one\ntwo\n");
  });
});

describe("run state", () => {
  test("absent file is an empty set", () => {
    const dir = mkdtempSync(join(tmpdir(), "state-"));
    expect(readRunState(join(dir, "last_run_units.json")).previous_unit_names.size).toBe(0);
  });

  test("corrupt or mistyped file is an empty set with a warning", () => {
    const dir = mkdtempSync(join(tmpdir(), "state-"));
    const corrupt = join(dir, "corrupt.json");
    const mistyped = join(dir, "mistyped.json");
    writeFileSync(corrupt, "[\"a\",");
    writeFileSync(mistyped, JSON.stringify({ units: ["a"] }));

    expect(readRunState(corrupt).previous_unit_names.size).toBe(0);
    expect(readRunState(mistyped).previous_unit_names.size).toBe(0);
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  test("written state is a sorted JSON array and reads back", () => {
    const path = join(mkdtempSync(join(tmpdir(), "state-")), "last_run_units.json");
    writeRunState(path, { previous_unit_names: new Set(["林口#2", "林口#1"]) });
    expect(readFileSync(path, "utf-8")).toBe('["林口#1","林口#2"]');
    expect([...readRunState(path).previous_unit_names]).toEqual(["林口#1", "林口#2"]);
  });
});
