/**
 * CSV Tables — read, rewrite, append.
 *
 * Files are UTF-8 with a BOM. Fields are quoted only when needed.
 * Rewrites go through a temp file + rename.
 */

import { existsSync, readFileSync, writeFileSync, appendFileSync, renameSync, mkdirSync } from "fs";
import { dirname } from "path";

const BOM = "\uFEFF";

export type CsvRow = Record<string, string>;

export interface CsvTable {
  header: string[];
  rows: CsvRow[];
}

// ─── Encoding ────────────────────────────────────────────────────────────────

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) return `"${value.replace(/"/g, '""')}"`;
  return value;
}

function encodeLine(header: string[], row: CsvRow): string {
  return header.map(col => escapeCsvField(row[col] ?? "")).join(",");
}

/** Split CSV text into records, honouring quoted fields. */
export function parseCsv(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') { field += '"'; i++; }
        else inQuotes = false;
      } else {
        field += ch;
      }
      continue;
    }
    if (ch === '"') inQuotes = true;
    else if (ch === ",") { record.push(field); field = ""; }
    else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && text[i + 1] === "\n") i++;
      record.push(field);
      records.push(record);
      record = [];
      field = "";
    } else {
      field += ch;
    }
  }
  if (field !== "" || record.length > 0) {
    record.push(field);
    records.push(record);
  }

  return records.filter(r => !(r.length === 1 && r[0] === ""));
}

// ─── File Operations ─────────────────────────────────────────────────────────

/** Read a table. Returns null when the file does not exist. */
export function readCsvTable(path: string): CsvTable | null {
  if (!existsSync(path)) return null;
  let text = readFileSync(path, "utf-8");
  if (text.startsWith(BOM)) text = text.slice(1);

  const [header = [], ...body] = parseCsv(text);
  const rows = body.map(fields => {
    const row: CsvRow = {};
    header.forEach((col, i) => { row[col] = fields[i] ?? ""; });
    return row;
  });
  return { header, rows };
}

export function writeFileAtomic(path: string, content: string): void {
  mkdirSync(dirname(path), { recursive: true });
  const tmp = `${path}.tmp-${process.pid}`;
  writeFileSync(tmp, content, "utf-8");
  renameSync(tmp, path);
}

/** Rewrite a whole table (header always written). */
export function writeCsvTable(path: string, header: string[], rows: CsvRow[]): void {
  const lines = [header.map(escapeCsvField).join(","), ...rows.map(r => encodeLine(header, r))];
  writeFileAtomic(path, BOM + lines.join("\n") + "\n");
}

/** Append rows; the header is written only when the file is created. */
export function appendCsvRows(path: string, header: string[], rows: CsvRow[]): void {
  if (rows.length === 0) return;
  mkdirSync(dirname(path), { recursive: true });
  const isNew = !existsSync(path);
  const lines = rows.map(r => encodeLine(header, r));
  const prefix = isNew ? BOM + header.map(escapeCsvField).join(",") + "\n" : "";
  appendFileSync(path, prefix + lines.join("\n") + "\n", "utf-8");
}

/** Empty cell for missing values; numbers in their shortest form. */
export function formatCell(value: number | string | null): string {
  if (value === null) return "";
  return typeof value === "number" ? String(value) : value;
}
