// ──────────────────────────────────────────
// Sources: day filter
// ──────────────────────────────────────────

import { dayKeyOf, parseEmissionDate } from '../../shared/dates';
import type { DayKey } from '../../shared/types';

export interface DayFilterResult<T> {
  matched: T[];
  /** Rows whose date could not be parsed; left out of every day. */
  unparseable: T[];
}

/**
 * Keeps the rows whose emission date falls on `day`, ignoring the time of day.
 */
export function filterByDay<T>(rows: readonly T[], dateOf: (row: T) => unknown, day: DayKey): DayFilterResult<T> {
  const matched: T[] = [];
  const unparseable: T[] = [];

  for (const row of rows) {
    const date = parseEmissionDate(dateOf(row));
    if (!date) {
      unparseable.push(row);
    } else if (dayKeyOf(date) === day) {
      matched.push(row);
    }
  }

  return { matched, unparseable };
}
