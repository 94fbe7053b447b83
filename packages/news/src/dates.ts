/**
 * Date helpers for publication dates and retrieval windows
 */

import type { DateRange } from "./types.js";

const ISO_DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/;

/**
 * Normalize a provider date ("2024-03-01 12:00:00", RFC 822, ISO) to YYYY-MM-DD.
 */
export function toIsoDate(value: string | null | undefined): string | null {
  if (!value) return null;

  const trimmed = value.trim();
  const prefix = ISO_DATE_PREFIX.exec(trimmed);
  if (prefix) {
    const [, year, month, day] = prefix;
    const parsed = new Date(`${year}-${month}-${day}T00:00:00Z`);
    return Number.isNaN(parsed.getTime()) ? null : `${year}-${month}-${day}`;
  }

  const timestamp = Date.parse(trimmed);
  if (Number.isNaN(timestamp)) return null;
  return new Date(timestamp).toISOString().slice(0, 10);
}

/**
 * A window is usable when both ends parse and end is strictly after start
 */
export function isValidDateRange(range: DateRange): boolean {
  const start = toIsoDate(range.start);
  const end = toIsoDate(range.end);
  if (!start || !end) return false;
  return end > start;
}
