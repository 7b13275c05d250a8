import type { CalendarMonth } from "./types.js";

export const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
] as const;

/**
 * Converts a JavaScript Date to the CalendarMonth it falls in (local time).
 */
export function dateToCalendarMonth(date: Date): CalendarMonth {
  return {
    year: date.getFullYear(),
    month: date.getMonth() + 1, // JS months are 0-indexed
  };
}

/**
 * Moves a month forward (or back, for negative offsets), wrapping year boundaries.
 */
export function addMonths(start: CalendarMonth, offset: number): CalendarMonth {
  const zeroBased = start.year * 12 + (start.month - 1) + offset;
  return {
    year: Math.floor(zeroBased / 12),
    month: (((zeroBased % 12) + 12) % 12) + 1,
  };
}

/**
 * Formats a month the way schedule documents key it.
 *
 * @example
 * ```typescript
 * formatMonthLabel({ year: 2025, month: 3 }); // "March 2025"
 * ```
 */
export function formatMonthLabel(month: CalendarMonth): string {
  const name = MONTH_NAMES[month.month - 1];
  if (!name) {
    throw new RangeError(`Month must be between 1 and 12, got ${month.month}`);
  }
  return `${name} ${month.year}`;
}

/**
 * Parses a `"March 2025"` label back to a CalendarMonth.
 * Returns undefined for anything else.
 */
export function parseMonthLabel(label: string): CalendarMonth | undefined {
  const match = /^([A-Za-z]+) (\d{4})$/.exec(label.trim());
  if (!match) return undefined;
  const [, name, year] = match;
  if (!name || !year) return undefined;
  const index = MONTH_NAMES.findIndex((m) => m.toLowerCase() === name.toLowerCase());
  if (index === -1) return undefined;
  return { year: Number(year), month: index + 1 };
}

/**
 * Compares two months.
 * Returns:
 *  negative if a < b
 *   0 if a = b
 *  positive if a > b
 */
export function compareMonths(a: CalendarMonth, b: CalendarMonth): number {
  return a.year * 12 + a.month - (b.year * 12 + b.month);
}

/**
 * Consecutive months starting at `start`.
 *
 * @example
 * ```typescript
 * monthSequence({ year: 2024, month: 11 }, 3);
 * // [{ year: 2024, month: 11 }, { year: 2024, month: 12 }, { year: 2025, month: 1 }]
 * ```
 */
export function monthSequence(start: CalendarMonth, count: number): CalendarMonth[] {
  return Array.from({ length: Math.max(0, count) }, (_, i) => addMonths(start, i));
}
