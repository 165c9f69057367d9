/**
 * Effective Timestamp
 *
 * The run's logical time: wall clock in Asia/Taipei, floored to the
 * 10-minute boundary. Taipei has no DST, so a fixed +08:00 offset is exact.
 */

export const TAIPEI_OFFSET_MS = 8 * 3600_000;

const TEN_MINUTES_MS = 10 * 60_000;

export interface EffectiveTime {
  /** Floored instant */
  instant: Date;
  /** "YYYY-MM-DD HH:mm:ss" in Taipei local time; the persistence key */
  formatted: string;
}

export function effectiveTimeFor(now: Date): EffectiveTime {
  const floored = new Date(Math.floor(now.getTime() / TEN_MINUTES_MS) * TEN_MINUTES_MS);
  return { instant: floored, formatted: formatTaipei(floored) };
}

/** Format an instant as Taipei local "YYYY-MM-DD HH:mm:ss". */
export function formatTaipei(d: Date): string {
  return new Date(d.getTime() + TAIPEI_OFFSET_MS).toISOString().slice(0, 19).replace("T", " ");
}

/**
 * Parse a timestamp string into epoch ms.
 * Strings carrying an offset or "Z" are taken as-is; bare local times
 * ("2025-06-01 08:00:00", "2025-06-01T08:00:00") are read as Taipei time.
 * Returns null when unparseable.
 */
export function parseTaipeiTimestamp(value: string): number | null {
  const s = value.trim();
  if (!s) return null;

  const hasZone = /(Z|[+-]\d{2}:?\d{2})$/i.test(s);
  if (hasZone) {
    const ms = Date.parse(s);
    return Number.isNaN(ms) ? null : ms;
  }

  const m = s.match(/^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2}))?)?$/);
  if (!m) return null;
  const [, y, mo, d, h = "0", mi = "0", sec = "0"] = m;
  const utc = Date.UTC(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(sec));
  return utc - TAIPEI_OFFSET_MS;
}
