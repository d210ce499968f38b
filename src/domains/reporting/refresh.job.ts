// ──────────────────────────────────────────
// Reporting: refresh job (scheduled, default 10s interval)
// ──────────────────────────────────────────

import { errorMessage } from '../../shared/errors';
import { dayKeyOf, todayIn } from '../../shared/dates';
import type { DailyReport, ReportSnapshot } from '../../shared/types';
import { DailyReportService } from './report.service';
import { fromCents } from './aggregator';

export class RefreshJob {
  private latest: ReportSnapshot | null = null;
  private active: Promise<void> = Promise.resolve();
  private waiting: Promise<void> | null = null;

  constructor(
    private reports: DailyReportService,
    private timeZone: string,
    private now: () => Date = () => new Date()
  ) {}

  /**
   * Refreshes today's report. A call made while a refresh is running is
   * queued behind it; calls made while one is already queued share it.
   * Never rejects: failures become an error snapshot.
   */
  run(): Promise<void> {
    if (this.waiting) return this.waiting;

    const waiting = this.active.then(() => {
      this.waiting = null;
      // a rejected link would stall every later run
      this.active = this.refresh().catch((err) => {
        console.error('[Refresh] Refresh aborted:', errorMessage(err));
      });
      return this.active;
    });
    this.waiting = waiting;
    return waiting;
  }

  getLatest(): ReportSnapshot | null {
    return this.latest;
  }

  private async refresh(): Promise<void> {
    // UTC day until the configured zone resolves
    let date = dayKeyOf(this.now());
    try {
      date = todayIn(this.timeZone, this.now());
      const report = await this.reports.buildReport(date);
      this.latest = { status: 'ok', report, refreshed_at: this.now() };
      console.log(
        `[Refresh] ${date}: ${report.salespeople.length} salespeople, net ${fromCents(report.totals.net_revenue).toFixed(2)}`
      );
    } catch (err) {
      const message = errorMessage(err);
      this.latest = {
        status: 'error',
        date,
        error: message,
        refreshed_at: this.now(),
        last_report: this.lastGoodReport(),
      };
      console.error(`[Refresh] Failed for ${date}:`, message);
    }
  }

  private lastGoodReport(): DailyReport | null {
    if (!this.latest) return null;
    return this.latest.status === 'ok' ? this.latest.report : this.latest.last_report;
  }
}
