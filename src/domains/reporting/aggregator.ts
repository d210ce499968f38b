// ──────────────────────────────────────────
// Reporting: per-salesperson aggregation
// ──────────────────────────────────────────

import { DataQualityError } from '../../shared/errors';
import type {
  AggregateResult,
  Cents,
  ReturnRecord,
  SalesRecord,
  SalespersonSummary,
} from '../../shared/types';

/**
 * Reconciles one day of sales and returns.
 *
 * Sales are keyed by `salesperson`, returns by `salesperson_name`; the two
 * are outer-joined on that name with the missing side counted as zero.
 * Rows are ordered by net descending, ties by name. Totals cover every
 * record, including those without a salesperson name.
 */
export function aggregate(sales: readonly SalesRecord[], returns: readonly ReturnRecord[]): AggregateResult {
  // raw amounts are summed first and rounded to cents once per figure
  const revenueByName = new Map<string, number>();
  const returnsByName = new Map<string, number>();
  let totalRevenue = 0;
  let totalReturns = 0;

  for (const sale of sales) {
    const amount = requireFinite(sale.invoice_value, 'invoice_value');
    totalRevenue += amount;
    if (sale.salesperson !== null) {
      revenueByName.set(sale.salesperson, (revenueByName.get(sale.salesperson) ?? 0) + amount);
    }
  }

  for (const ret of returns) {
    const amount = requireFinite(ret.total_value, 'total_value');
    totalReturns += amount;
    if (ret.salesperson_name !== null) {
      returnsByName.set(ret.salesperson_name, (returnsByName.get(ret.salesperson_name) ?? 0) + amount);
    }
  }

  const names = Array.from(new Set([...revenueByName.keys(), ...returnsByName.keys()])).sort(compareNames);

  const salespeople: SalespersonSummary[] = names.map((name) => {
    const revenue = toCents(revenueByName.get(name) ?? 0, 'invoice_value');
    const returned = toCents(returnsByName.get(name) ?? 0, 'total_value');
    return { salesperson_name: name, revenue, returns: returned, net: revenue - returned };
  });

  // Array#sort is stable, so equal nets keep the name order
  salespeople.sort((a, b) => b.net - a.net);

  const revenue = toCents(totalRevenue, 'invoice_value');
  const returned = toCents(totalReturns, 'total_value');

  return {
    totals: {
      total_revenue: revenue,
      total_returns: returned,
      net_revenue: revenue - returned,
    },
    salespeople,
  };
}

/**
 * Rounds a currency amount to whole cents, half away from zero. The scaled
 * value is cut to 15 significant digits first so that 1.005 gives 101.
 */
export function toCents(value: number, field: string): Cents {
  const scaled = Number((requireFinite(value, field) * 100).toPrecision(15));
  // + 0 turns -0 into 0
  return Math.sign(scaled) * Math.round(Math.abs(scaled)) + 0;
}

export function fromCents(cents: Cents): number {
  return cents / 100;
}

function requireFinite(value: number, field: string): number {
  if (!Number.isFinite(value)) {
    throw new DataQualityError(`${field} is not a finite number: ${String(value)}`);
  }
  return value;
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
