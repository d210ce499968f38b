// ──────────────────────────────────────────
// Reporting: currency formatting
// ──────────────────────────────────────────
// Tier 1 is Intl with the configured locale and currency. When either
// cannot be resolved, tier 2 prints `SYMBOL 1,234.56`.

import { LocaleResolutionError, errorMessage } from '../../shared/errors';
import type { Cents } from '../../shared/types';
import { fromCents } from './aggregator';

export interface CurrencyOptions {
  locale: string;
  currency: string;
  symbol: string;
}

export class CurrencyFormatter {
  private readonly intl: Intl.NumberFormat | null;

  constructor(private options: CurrencyOptions) {
    try {
      this.intl = resolveNumberFormat(options.locale, options.currency);
    } catch (err) {
      if (!(err instanceof LocaleResolutionError)) throw err;
      console.warn(`[Currency] ${err.message}; using fallback format "${options.symbol} ###,###.##"`);
      this.intl = null;
    }
  }

  get usesFallback(): boolean {
    return this.intl === null;
  }

  format(cents: Cents): string {
    if (this.intl) return this.intl.format(fromCents(cents));
    return formatFallback(cents, this.options.symbol);
  }
}

export function resolveNumberFormat(locale: string, currency: string): Intl.NumberFormat {
  let supported: string[];
  try {
    supported = Intl.NumberFormat.supportedLocalesOf(locale);
  } catch (err) {
    throw new LocaleResolutionError(`Invalid locale "${locale}": ${errorMessage(err)}`, { cause: err });
  }
  if (supported.length === 0) {
    throw new LocaleResolutionError(`Locale "${locale}" is not available on this host`);
  }

  try {
    return new Intl.NumberFormat(locale, { style: 'currency', currency });
  } catch (err) {
    throw new LocaleResolutionError(`Invalid currency "${currency}": ${errorMessage(err)}`, { cause: err });
  }
}

/** `R$ 1,234,567.89`, `R$ -100.00`. */
export function formatFallback(cents: Cents, symbol: string): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  const whole = Math.floor(abs / 100)
    .toString()
    .replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  const fraction = String(abs % 100).padStart(2, '0');
  return `${symbol} ${sign}${whole}.${fraction}`;
}
