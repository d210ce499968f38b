// ──────────────────────────────────────────
// Day keys and emission-date parsing
// ──────────────────────────────────────────
// Emission dates are wall-clock values without a zone. They are kept in
// the UTC fields of a Date so the day is read back with toISOString().

import type { DayKey } from './types';

const DAY_KEY = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?$/;

export function isDayKey(value: string): boolean {
  const m = DAY_KEY.exec(value);
  if (!m) return false;
  return buildUtc(Number(m[1]), Number(m[2]), Number(m[3]), 0, 0, 0, 0) !== null;
}

export function dayKeyOf(date: Date): DayKey {
  return date.toISOString().slice(0, 10);
}

/**
 * Today's date in `timeZone`, e.g. `todayIn('America/Sao_Paulo')`.
 */
export function todayIn(timeZone: string, now: Date = new Date()): DayKey {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(now);

  const pick = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';

  return `${pick('year')}-${pick('month')}-${pick('day')}`;
}

/**
 * Parses an emission date coming from a driver. Returns null when the
 * value is not a valid Date or a `YYYY-MM-DD[ HH:MM[:SS[.f]]]` string.
 */
export function parseEmissionDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value !== 'string') return null;

  const m = TIMESTAMP.exec(value.trim());
  if (!m) return null;

  const millis = m[7] ? Number(m[7].padEnd(3, '0').slice(0, 3)) : 0;
  return buildUtc(
    Number(m[1]),
    Number(m[2]),
    Number(m[3]),
    Number(m[4] ?? 0),
    Number(m[5] ?? 0),
    Number(m[6] ?? 0),
    millis
  );
}

/** `19/10/2026` for `2026-10-19`. */
export function formatDayKey(day: DayKey): string {
  const [year, month, date] = day.split('-');
  return `${date}/${month}/${year}`;
}

function buildUtc(
  year: number,
  month: number,
  day: number,
  hours: number,
  minutes: number,
  seconds: number,
  millis: number
): Date | null {
  if (hours > 23 || minutes > 59 || seconds > 59) return null;
  const d = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds, millis));
  // Date.UTC rolls 2026-02-31 over into March
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return null;
  }
  return d;
}
