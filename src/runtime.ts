// ──────────────────────────────────────────
// Runtime: refresh scheduler
// ──────────────────────────────────────────

import { RefreshJob } from './domains/reporting/refresh.job';

export class Runtime {
  private intervals: NodeJS.Timeout[] = [];

  constructor(
    private refreshJob: RefreshJob,
    private refreshIntervalMs: number
  ) {}

  start(): void {
    if (this.intervals.length > 0) return;

    // First report right away, then on every tick
    this.tick();
    this.intervals.push(setInterval(() => this.tick(), this.refreshIntervalMs));

    console.log(`[Runtime] Started refresh job (every ${this.refreshIntervalMs / 1000}s)`);
  }

  stop(): void {
    this.intervals.forEach(clearInterval);
    this.intervals = [];
    console.log('[Runtime] Stopped refresh job');
  }

  async runOnce(): Promise<void> {
    await this.refreshJob.run();
  }

  private tick(): void {
    this.refreshJob.run().catch((err) =>
      console.error('[Runtime] RefreshJob error:', err instanceof Error ? err.message : String(err))
    );
  }
}
