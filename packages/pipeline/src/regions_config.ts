/**
 * Region Configuration
 *
 * Fixed geographic buckets used to group both generation and weather data,
 * the keyword table used when a unit is not in the static map, and the
 * weather profile (forecast towns) of each weather-bearing region.
 *
 * Town names follow the county forecast documents (F-D0047 series).
 */

export const REGIONS = ["North", "Central", "South", "East", "Islands", "Other", "Unknown"] as const;

export type Region = typeof REGIONS[number];

export const UNKNOWN_REGION: Region = "Unknown";

export function isRegion(value: string): value is Region {
  return REGIONS.some(r => r === value);
}

/**
 * Keyword fallback, scanned in order. First region whose list has a keyword
 * contained in the unit name wins.
 */
export const REGION_KEYWORDS: ReadonlyArray<readonly [Region, readonly string[]]> = [
  ["North",   ["林口", "大潭", "新桃", "通霄", "協和", "石門", "翡翠", "桂山", "觀音", "龍潭", "北部"]],
  ["Central", ["台中", "大甲溪", "明潭", "彰工", "中港", "竹南", "苗栗", "雲林", "麥寮", "中部", "彰"]],
  ["South",   ["興達", "大林", "南部", "核三", "曾文", "嘉義", "台南", "高雄", "永安", "屏東"]],
  ["East",    ["和平", "花蓮", "蘭陽", "卑南", "立霧", "東部"]],
  ["Islands", ["澎湖", "金門", "馬祖", "塔山", "離島"]],
  ["Other",   ["汽電共生", "其他台電自有", "其他購電太陽能", "其他購電風力", "購買地熱", "台電自有地熱", "生質能"]],
];

// ─── Weather Profiles ────────────────────────────────────────────────────────

export interface TownRef {
  county: string;
  town: string;
}

export interface WeatherProfile {
  /** Towns averaged for temperature and wind */
  avg_towns: TownRef[];
  /** Representative town for the (categorical) weather code */
  code_town: TownRef;
  /** Counties whose cached forecast must be present */
  counties: string[];
}

export const WEATHER_PROFILES: Partial<Record<Region, WeatherProfile>> = {
  North: {
    avg_towns: [
      { county: "新北市", town: "林口區" },
      { county: "桃園市", town: "觀音區" },
      { county: "苗栗縣", town: "通霄鎮" },
      { county: "臺北市", town: "中正區" },
    ],
    code_town: { county: "臺北市", town: "中正區" },
    counties: ["新北市", "桃園市", "苗栗縣", "臺北市"],
  },
  Central: {
    avg_towns: [
      { county: "臺中市", town: "龍井區" },
      { county: "臺中市", town: "西屯區" },
      { county: "彰化縣", town: "彰化市" },
    ],
    code_town: { county: "臺中市", town: "西屯區" },
    counties: ["臺中市", "彰化縣"],
  },
  South: {
    avg_towns: [
      { county: "高雄市", town: "永安區" },
      { county: "高雄市", town: "小港區" },
      { county: "臺南市", town: "安南區" },
      { county: "屏東縣", town: "恆春鎮" },
    ],
    code_town: { county: "高雄市", town: "苓雅區" },
    counties: ["高雄市", "臺南市", "屏東縣"],
  },
  East: {
    avg_towns: [{ county: "花蓮縣", town: "花蓮市" }],
    code_town: { county: "花蓮縣", town: "花蓮市" },
    counties: ["花蓮縣"],
  },
  Islands: {
    avg_towns: [{ county: "澎湖縣", town: "湖西鄉" }],
    code_town: { county: "澎湖縣", town: "湖西鄉" },
    counties: ["澎湖縣"],
  },
};

/** Forecast element display names as published in the county documents. */
export const FORECAST_ELEMENTS = {
  temperature: "平均溫度",
  wind: "風速",
  weatherCode: "天氣現象",
} as const;

export const FORECAST_HORIZONS = [
  { suffix: "now", hours: 0 },
  { suffix: "future_12h", hours: 12 },
] as const;
