// ──────────────────────────────────────────
// Domain contracts — typed interfaces between domains
// ──────────────────────────────────────────

import type { DayKey, DaySlice, ReturnRecord, SalesRecord } from './types';

/**
 * Read side of a source view. Implemented by the Knex repositories;
 * tests plug in arrays.
 */
export interface ViewReader<Row> {
  findAll(): Promise<Row[]>;
}

/**
 * Sources contract — exposed to the Reporting domain.
 * Each call returns every record whose emission date is `date`.
 */
export interface SalesSourceContract {
  getSalesByDate(date: DayKey): Promise<DaySlice<SalesRecord>>;
  getReturnsByDate(date: DayKey): Promise<DaySlice<ReturnRecord>>;
}
