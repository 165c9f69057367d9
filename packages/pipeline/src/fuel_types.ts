/**
 * Fuel Type Registry
 *
 * Maps the native short label found in the live feed (inside `<b>…</b>`)
 * to the canonical bilingual label used in tables and reports.
 */

export const FUEL_LABELS: Record<string, string> = {
  "太陽能": "太陽能(Solar)",
  "風力": "風力(Wind)",
  "燃煤": "燃煤(Coal)",
  "燃氣": "燃氣(LNG)",
  "水力": "水力(Hydro)",
  "核能": "核能(Nuclear)",
  "汽電共生": "汽電共生(Co-Gen)",
  "民營電廠-燃煤": "民營電廠-燃煤(IPP-Coal)",
  "民營電廠-燃氣": "民營電廠-燃氣(IPP-LNG)",
  "燃油": "燃油(Oil)",
  "輕油": "輕油(Diesel)",
  "其它再生能源": "其它再生能源(Other Renewable Energy)",
  "儲能": "儲能(Energy Storage System)",
};

/** Display order of the generation mix report. Unlisted labels go last. */
export const FUEL_DISPLAY_ORDER: readonly string[] = [
  "核能(Nuclear)",
  "燃煤(Coal)",
  "汽電共生(Co-Gen)",
  "民營電廠-燃煤(IPP-Coal)",
  "燃氣(LNG)",
  "民營電廠-燃氣(IPP-LNG)",
  "燃油(Oil)",
  "輕油(Diesel)",
  "水力(Hydro)",
  "風力(Wind)",
  "太陽能(Solar)",
  "其它再生能源(Other Renewable Energy)",
  "儲能(Energy Storage System)",
];

/** Unknown labels pass through unchanged. */
export function toFuelLabel(native: string): string {
  return FUEL_LABELS[native] ?? native;
}

/**
 * English part of a bilingual label: "燃煤(Coal)" → "Coal".
 * Labels without parentheses are returned as-is.
 */
export function englishFuelName(label: string): string {
  const m = label.match(/\(([^)]+)\)\s*$/);
  return m ? m[1] : label;
}
