/**
 * Structure Fingerprint — detects reshaping of third-party documents.
 *
 * Only the shape counts: object keys (sorted), the first element of each
 * array, and scalar types. Values are ignored, so a fresh forecast with the
 * same schema keeps the same fingerprint.
 */

import { createHash } from "crypto";
import { existsSync, readFileSync, appendFileSync, mkdirSync } from "fs";
import { dirname } from "path";
import { writeFileAtomic } from "../../pipeline/src/csv_table";

type Shape = string | Shape[] | Array<[string, Shape]>;

function shapeOf(value: unknown): Shape {
  if (Array.isArray(value)) return value.length > 0 ? [shapeOf(value[0])] : [];
  if (value === null) return "null";
  if (typeof value === "object") {
    return Object.entries(value)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]): [string, Shape] => [k, shapeOf(v)]);
  }
  return typeof value;
}

export function structureFingerprint(data: unknown): string {
  return createHash("md5").update(JSON.stringify(shapeOf(data)), "utf8").digest("hex");
}

// ─── Change Log ──────────────────────────────────────────────────────────────

export interface FingerprintCheck {
  changed: boolean;
  previous: string | null;
  current: string;
}

export function readStoredFingerprint(path: string): string | null {
  if (!existsSync(path)) return null;
  try {
    const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
    if (typeof parsed === "object" && parsed !== null && "fingerprint" in parsed && typeof parsed.fingerprint === "string") {
      return parsed.fingerprint;
    }
    return null;
  } catch {
    console.warn(`[forecast] ⚠️ could not decode ${path}, treating as new structure`);
    return null;
  }
}

/**
 * Compare against the stored fingerprint, append the outcome to the
 * structure log, and store the new fingerprint when it changed.
 */
export function checkStructure(
  fingerprintFile: string,
  structureLog: string,
  current: string,
  timestamp: string,
): FingerprintCheck {
  const previous = readStoredFingerprint(fingerprintFile);
  const changed = current !== previous;

  let message: string;
  if (changed) {
    message =
      `[${timestamp}] ❌ WEATHER DATA STRUCTURE CHANGE DETECTED!\n` +
      `  Old Fingerprint: ${previous ?? "None"}\n` +
      `  New Fingerprint: ${current}\n` +
      `  Review the CWA API documentation or the cached JSON files.\n`;
    writeFileAtomic(fingerprintFile, JSON.stringify({ fingerprint: current, timestamp }, null, 2));
  } else {
    message = `[${timestamp}] ✅ Weather data structure remains consistent.\n`;
  }

  mkdirSync(dirname(structureLog), { recursive: true });
  appendFileSync(structureLog, message, "utf-8");
  console.log(`[forecast] ${message.trimEnd()}`);
  return { changed, previous, current };
}
