// ──────────────────────────────────────────
// Reporting domain — barrel export
// ──────────────────────────────────────────

export { CurrencyFormatter } from './currency';
export { ReportPresenter } from './presenter';
export { DailyReportService } from './report.service';
export { RefreshJob } from './refresh.job';
export { createReportingRoutes, createDashboardRoute } from './routes';
