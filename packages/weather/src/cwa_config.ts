/**
 * Central Weather Administration (CWA) Open Data — configuration
 *
 * Forecasts: F-D0047-093 (township forecasts, one locationId per county).
 * Observations: O-A0003-001 (manned stations, 10-minute cadence).
 *
 * API key: CWA_API_KEY env, or a CWA_API_KEY= line in {project}/.env.local.
 */

import { existsSync, readFileSync } from "fs";
import { join } from "path";
import { PROJECT_ROOT } from "../../pipeline/src/pipeline_config";

export const CWA_API_BASE = "https://opendata.cwa.gov.tw/api/v1/rest/datastore";
export const FORECAST_DATASET = "F-D0047-093";
export const OBSERVATION_DATASET = "O-A0003-001";

export const CWA_TIMEOUT_MS = 30_000;

/** County → CWA locationId of its township forecast. */
export const VITAL_LOCATIONS: Record<string, string> = {
  "臺北市": "F-D0047-063",
  "新北市": "F-D0047-071",
  "基隆市": "F-D0047-051",
  "桃園市": "F-D0047-007",
  "苗栗縣": "F-D0047-015",
  "臺中市": "F-D0047-075",
  "彰化縣": "F-D0047-019",
  "高雄市": "F-D0047-067",
  "臺南市": "F-D0047-079",
  "屏東縣": "F-D0047-035",
  "花蓮縣": "F-D0047-043",
  "澎湖縣": "F-D0047-047",
};

/** Observation stations relevant to generation, grouped by region. */
export const STATIONS_BY_REGION: Record<string, string[]> = {
  north:   ["臺北", "新北", "基隆", "新竹", "新屋", "鞍部"],
  central: ["臺中", "後龍", "古坑", "田中", "日月潭", "阿里山", "玉山"],
  south:   ["嘉義", "臺南", "永康", "高雄", "恆春"],
  east:    ["宜蘭", "花蓮", "成功", "臺東", "大武"],
  island:  ["澎湖", "金門", "馬祖", "蘭嶼", "東吉島"],
};

export function getCwaApiKey(): string {
  if (process.env.CWA_API_KEY) return process.env.CWA_API_KEY;
  const envPath = join(PROJECT_ROOT, ".env.local");
  if (existsSync(envPath)) {
    const lines = readFileSync(envPath, "utf-8").split("\n");
    for (const line of lines) {
      const m = line.match(/^CWA_API_KEY=(.+)$/);
      if (m) return m[1].trim();
    }
  }
  throw new Error("CWA_API_KEY not found in env or .env.local");
}

export function cwaUrl(dataset: string, params: Record<string, string>): string {
  return `${CWA_API_BASE}/${dataset}?${new URLSearchParams(params).toString()}`;
}
