// ──────────────────────────────────────────
// Sources: field coercion for driver values
// ──────────────────────────────────────────

import { DataQualityError } from '../../shared/errors';

const NUMERIC = /^-?\d+(\.\d+)?$/;

/**
 * Monetary field. Drivers hand decimals back as numbers (tedious) or
 * strings (pg); anything else is a data quality failure.
 */
export function parseAmount(value: unknown, field: string): number {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && NUMERIC.test(value.trim())) return Number(value.trim());
  throw new DataQualityError(`${field} is not numeric: ${JSON.stringify(value) ?? String(value)}`);
}

export function parseOptionalNumber(value: unknown, field: string): number | null {
  if (value === null || value === undefined) return null;
  return parseAmount(value, field);
}

export function parseOptionalText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return String(value);
}
