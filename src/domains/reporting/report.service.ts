// ──────────────────────────────────────────
// Reporting: daily report service
// ──────────────────────────────────────────

import type { SalesSourceContract } from '../../shared/contracts';
import type { DailyReport, DayKey } from '../../shared/types';
import { SerialQueue } from '../../platform/serial';
import { aggregate } from './aggregator';

export class DailyReportService {
  private queue = new SerialQueue();

  constructor(
    private sources: SalesSourceContract,
    private now: () => Date = () => new Date()
  ) {}

  /** Queued behind any pass already running; passes never overlap. */
  buildReport(date: DayKey): Promise<DailyReport> {
    return this.queue.enqueue(() => this.compute(date));
  }

  private async compute(date: DayKey): Promise<DailyReport> {
    // one connection: sales first, then returns
    const sales = await this.sources.getSalesByDate(date);
    const returns = await this.sources.getReturnsByDate(date);

    const { totals, salespeople } = aggregate(sales.records, returns.records);

    return {
      date,
      totals,
      salespeople,
      excluded: { sales: sales.excluded, returns: returns.excluded },
      generated_at: this.now(),
    };
  }
}
