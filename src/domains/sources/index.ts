// ──────────────────────────────────────────
// Sources domain — barrel export
// ──────────────────────────────────────────

export { SalesRepo } from './sales.repo';
export { ReturnsRepo } from './returns.repo';
export { SourceService } from './source.service';
