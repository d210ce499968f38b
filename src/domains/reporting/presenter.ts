// ──────────────────────────────────────────
// Reporting: report → display strings
// ──────────────────────────────────────────

import { formatDayKey } from '../../shared/dates';
import { errorMessage } from '../../shared/errors';
import type { DailyReport, DayKey, ReportView } from '../../shared/types';
import { CurrencyFormatter } from './currency';

export const TABLE_COLUMNS = ['Salesperson', 'Revenue', 'Returns', 'Net'];

export class ReportPresenter {
  private weekdays: Intl.DateTimeFormat;

  constructor(
    private currency: CurrencyFormatter,
    locale: string
  ) {
    this.weekdays = weekdayFormat(locale);
  }

  present(report: DailyReport): ReportView {
    const money = (cents: number) => this.currency.format(cents);

    return {
      title: this.title(report.date),
      date: report.date,
      metrics: {
        revenue: money(report.totals.total_revenue),
        returns: money(report.totals.total_returns),
        net_revenue: money(report.totals.net_revenue),
      },
      table: {
        columns: TABLE_COLUMNS,
        rows: report.salespeople.map((s) => [s.salesperson_name, money(s.revenue), money(s.returns), money(s.net)]),
      },
      excluded: { ...report.excluded },
      generated_at: report.generated_at.toISOString(),
    };
  }

  title(date: DayKey): string {
    const weekday = this.weekdays.format(new Date(`${date}T12:00:00Z`));
    return `Daily Invoicing (${formatDayKey(date)} - ${weekday})`;
  }
}

function weekdayFormat(locale: string): Intl.DateTimeFormat {
  try {
    return new Intl.DateTimeFormat(locale, { weekday: 'long', timeZone: 'UTC' });
  } catch (err) {
    console.warn(`[Presenter] Locale "${locale}" rejected (${errorMessage(err)}); weekdays in en-US`);
    return new Intl.DateTimeFormat('en-US', { weekday: 'long', timeZone: 'UTC' });
  }
}
