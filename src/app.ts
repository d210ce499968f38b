// ──────────────────────────────────────────
// App entry point — bootstrap + Express server
// ──────────────────────────────────────────
// 1. Load configuration
// 2. Open the data source connection
// 3. Instantiate source repos and services
// 4. Instantiate reporting with contract injection
// 5. Mount routes
// 6. Start the refresh runtime
// 7. Listen on port

import dotenv from 'dotenv';
dotenv.config();

import express from 'express';
import { loadConfig } from './config';
import { createDb, closeDb } from './db/connection';

// Sources
import { SalesRepo, ReturnsRepo, SourceService } from './domains/sources';

// Reporting
import {
  DailyReportService,
  RefreshJob,
  CurrencyFormatter,
  ReportPresenter,
  createReportingRoutes,
  createDashboardRoute,
} from './domains/reporting';

// Runtime
import { Runtime } from './runtime';

async function main() {
  const config = loadConfig();
  const db = createDb(config.db, config.report.timeZone);

  // ── Sources ──
  const salesRepo = new SalesRepo(db, config.db.schema);
  const returnsRepo = new ReturnsRepo(db, config.db.schema);
  const sourceService = new SourceService(salesRepo, returnsRepo, config.cacheTtlMs);

  // ── Reporting ──
  const reportService = new DailyReportService(sourceService);
  const refreshJob = new RefreshJob(reportService, config.report.timeZone);
  const formatter = new CurrencyFormatter({
    locale: config.report.locale,
    currency: config.report.currency,
    symbol: config.report.currencySymbol,
  });
  const presenter = new ReportPresenter(formatter, config.report.locale);

  // ── Runtime ──
  const runtime = new Runtime(refreshJob, config.refreshIntervalMs);

  // ── Express app ──
  const app = express();
  app.use(express.json());

  app.use('/api/v1/report', createReportingRoutes(reportService, refreshJob, presenter));
  app.use('/', createDashboardRoute(refreshJob, presenter, config.refreshIntervalMs));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', last_refresh: refreshJob.getLatest()?.status ?? 'pending' });
  });

  // Start
  runtime.start();
  const server = app.listen(config.port, () => {
    console.log(`[App] Invoicing board listening on port ${config.port} (${config.db.driver}, ${config.report.timeZone})`);
  });

  // Graceful shutdown
  const shutdown = async () => {
    console.log('[App] Shutting down...');
    runtime.stop();
    server.close();
    await closeDb(db);
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[App] Shutdown error:', err instanceof Error ? err.message : err);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((err) => {
  console.error('[App] Fatal error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
