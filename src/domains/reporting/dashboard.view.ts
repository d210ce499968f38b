// ──────────────────────────────────────────
// Reporting: server-rendered dashboard page
// ──────────────────────────────────────────

import type { ReportView } from '../../shared/types';

export interface DashboardState {
  /** Report to show; null before the first successful refresh. */
  view: ReportView | null;
  /** Message of the last failed refresh, if the last one failed. */
  error: string | null;
  refreshSeconds: number;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function renderDashboard(state: DashboardState): string {
  const { view, error } = state;
  const title = view ? view.title : 'Daily Invoicing';

  const banner = error ? `<div class="error" role="alert">Refresh failed: ${escapeHtml(error)}</div>` : '';
  const body = view ? renderReport(view) : '<p class="empty">Waiting for the first refresh…</p>';

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta http-equiv="refresh" content="${state.refreshSeconds}">
<title>${escapeHtml(title)}</title>
<style>
body { font-family: system-ui, sans-serif; margin: 2rem; color: #1f2933; }
.cards { display: flex; gap: 1rem; }
.card { flex: 1; padding: 1rem; border: 1px solid #d9e2ec; border-radius: 8px; }
.card .label { font-size: 0.9rem; color: #627d98; }
.card .value { font-size: 1.6rem; font-weight: 600; }
.table-wrap { width: 50%; margin: 2rem auto; }
table { width: 100%; border-collapse: collapse; }
th, td { padding: 0.4rem 0.6rem; border-bottom: 1px solid #e4e7eb; }
td.amount, th.amount { text-align: right; }
.error { padding: 0.8rem; margin-bottom: 1rem; background: #ffe3e3; color: #a61b1b; border-radius: 6px; }
.note { font-size: 0.8rem; color: #829ab1; }
</style>
</head>
<body>
<h1>${escapeHtml(title)}</h1>
${banner}
${body}
</body>
</html>
`;
}

function renderReport(view: ReportView): string {
  const cards = [
    card('Revenue', view.metrics.revenue),
    card('Returns', view.metrics.returns),
    card('Net Revenue', view.metrics.net_revenue),
  ].join('\n');

  const head = view.table.columns
    .map((c, i) => `<th${i > 0 ? ' class="amount"' : ''}>${escapeHtml(c)}</th>`)
    .join('');
  const rows = view.table.rows
    .map(
      (row) =>
        `<tr>${row.map((cell, i) => `<td${i > 0 ? ' class="amount"' : ''}>${escapeHtml(cell)}</td>`).join('')}</tr>`
    )
    .join('\n');

  const excludedTotal = view.excluded.sales + view.excluded.returns;
  const note =
    excludedTotal > 0
      ? `<p class="note">${view.excluded.sales} sales and ${view.excluded.returns} returns rows were left out: unreadable emission date.</p>`
      : '';

  return `<div class="cards">
${cards}
</div>
<div class="table-wrap">
<h2>Revenue, Returns and Net by Salesperson</h2>
<table>
<thead><tr>${head}</tr></thead>
<tbody>
${rows}
</tbody>
</table>
${note}
</div>`;
}

function card(label: string, value: string): string {
  return `<div class="card"><div class="label">${escapeHtml(label)}</div><div class="value">${escapeHtml(value)}</div></div>`;
}
