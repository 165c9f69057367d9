/**
 * Fluctuation Tracker — which units appeared or disappeared since last run.
 *
 * State: JSON array of unit names (last_run_units.json). Absent or corrupt
 * state reads as an empty set, so a first run reports every unit as added.
 */

import { existsSync, readFileSync, appendFileSync, mkdirSync } from "fs";
import { dirname } from "path";
import { writeFileAtomic } from "./csv_table";
import type { RunState } from "./types";

export interface UnitDiff {
  added: string[];
  missing: string[];
}

/** Set difference both ways; results sorted. */
export function diffUnits(current: ReadonlySet<string>, previous: ReadonlySet<string>): UnitDiff {
  return {
    added: [...current].filter(u => !previous.has(u)).sort(),
    missing: [...previous].filter(u => !current.has(u)).sort(),
  };
}

export function formatFluctuationBlock(timestamp: string, unitCount: number, diff: UnitDiff): string {
  const stable = diff.added.length === 0 && diff.missing.length === 0;
  let block = `--- Fluctuation Report @ ${timestamp} (${unitCount} plants) ${stable ? "✅" : "❌"} ---\n`;
  if (diff.added.length > 0) block += `  [ADDED] ${diff.added.join(", ")}\n`;
  if (diff.missing.length > 0) block += `  [MISSING] ${diff.missing.join(", ")}\n`;
  return block;
}

export function appendFluctuationLog(logPath: string, block: string): void {
  mkdirSync(dirname(logPath), { recursive: true });
  appendFileSync(logPath, block, "utf-8");
}

// ─── State ───────────────────────────────────────────────────────────────────

export function readRunState(statePath: string): RunState {
  if (!existsSync(statePath)) return { previous_unit_names: new Set() };
  try {
    const parsed: unknown = JSON.parse(readFileSync(statePath, "utf-8"));
    if (!Array.isArray(parsed) || !parsed.every((u): u is string => typeof u === "string")) {
      console.warn(`[state] ⚠️ ${statePath} is not a list of unit names, treating as empty`);
      return { previous_unit_names: new Set() };
    }
    return { previous_unit_names: new Set(parsed) };
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    console.warn(`[state] ⚠️ ${statePath} unreadable (${msg}), treating as empty`);
    return { previous_unit_names: new Set() };
  }
}

export function writeRunState(statePath: string, state: RunState): void {
  writeFileAtomic(statePath, JSON.stringify([...state.previous_unit_names].sort()));
}
