const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parses a YYYY-MM-DD calendar date to UTC midnight epoch milliseconds.
 * Returns null for malformed or impossible dates (e.g. 2026-02-30).
 */
export function parseIsoDate(value: string): number | null {
  const match = ISO_DATE.exec(value);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const epoch = Date.UTC(year, month - 1, day);
  const check = new Date(epoch);
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
    return null;
  }
  return epoch;
}

/**
 * UTC midnight of the calendar day containing `date`.
 */
export function startOfUtcDay(date: Date): number {
  return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

/**
 * Whole calendar days from `today` until `isoDate`; negative once past.
 * Null when `isoDate` does not parse.
 */
export function daysUntil(isoDate: string, today: Date): number | null {
  const target = parseIsoDate(isoDate);
  if (target === null) return null;
  return Math.round((target - startOfUtcDay(today)) / DAY_MS);
}

/**
 * Formats the UTC calendar day of `date` as YYYY-MM-DD.
 */
export function formatIsoDate(date: Date): string {
  return new Date(startOfUtcDay(date)).toISOString().slice(0, 10);
}

export function isValidDate(date: Date): boolean {
  return !Number.isNaN(date.getTime());
}
