// ──────────────────────────────────────────
// Reporting: API routes
// ──────────────────────────────────────────

import { Router, Request, Response } from 'express';
import { isDayKey } from '../../shared/dates';
import { errorMessage } from '../../shared/errors';
import type { ReportSnapshot } from '../../shared/types';
import { DailyReportService } from './report.service';
import { RefreshJob } from './refresh.job';
import { ReportPresenter } from './presenter';
import { renderDashboard } from './dashboard.view';

export function snapshotBody(snapshot: ReportSnapshot, presenter: ReportPresenter): Record<string, unknown> {
  if (snapshot.status === 'ok') {
    return {
      status: 'ok',
      refreshed_at: snapshot.refreshed_at.toISOString(),
      report: snapshot.report,
      view: presenter.present(snapshot.report),
    };
  }
  return {
    status: 'error',
    date: snapshot.date,
    error: snapshot.error,
    refreshed_at: snapshot.refreshed_at.toISOString(),
    view: snapshot.last_report ? presenter.present(snapshot.last_report) : null,
  };
}

export function createReportingRoutes(
  reportService: DailyReportService,
  refreshJob: RefreshJob,
  presenter: ReportPresenter
): Router {
  const router = Router();

  // GET /latest — snapshot from the last scheduled refresh
  router.get('/latest', (_req: Request, res: Response) => {
    const snapshot = refreshJob.getLatest();
    if (!snapshot) {
      res.status(503).json({ error: 'No refresh has completed yet' });
      return;
    }
    res.status(snapshot.status === 'ok' ? 200 : 502).json(snapshotBody(snapshot, presenter));
  });

  // GET /?date=YYYY-MM-DD — report for any day, built on demand
  router.get('/', async (req: Request, res: Response) => {
    const date = typeof req.query.date === 'string' ? req.query.date : '';
    if (!isDayKey(date)) {
      res.status(400).json({ error: 'date must be a valid YYYY-MM-DD day' });
      return;
    }

    try {
      const report = await reportService.buildReport(date);
      res.json({ report, view: presenter.present(report) });
    } catch (err) {
      res.status(502).json({ error: errorMessage(err) });
    }
  });

  // POST /refresh — force a refresh of today's report
  router.post('/refresh', async (_req: Request, res: Response) => {
    try {
      await refreshJob.run();
      const snapshot = refreshJob.getLatest();
      if (!snapshot) {
        res.status(503).json({ error: 'Refresh produced no snapshot' });
        return;
      }
      res.status(snapshot.status === 'ok' ? 200 : 502).json(snapshotBody(snapshot, presenter));
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  return router;
}

export function createDashboardRoute(refreshJob: RefreshJob, presenter: ReportPresenter, refreshMs: number): Router {
  const router = Router();
  const refreshSeconds = Math.max(1, Math.round(refreshMs / 1000));

  router.get('/', (_req: Request, res: Response) => {
    const snapshot = refreshJob.getLatest();
    let html: string;

    if (!snapshot) {
      html = renderDashboard({ view: null, error: null, refreshSeconds });
    } else if (snapshot.status === 'ok') {
      html = renderDashboard({ view: presenter.present(snapshot.report), error: null, refreshSeconds });
    } else {
      html = renderDashboard({
        view: snapshot.last_report ? presenter.present(snapshot.last_report) : null,
        error: snapshot.error,
        refreshSeconds,
      });
    }

    res.type('html').send(html);
  });

  return router;
}
