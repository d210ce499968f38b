import { afterEach, describe, expect, it, vi } from 'vitest';
import { SerialQueue } from '../src/platform/serial';
import { DailyReportService } from '../src/domains/reporting/report.service';
import { RefreshJob } from '../src/domains/reporting/refresh.job';
import type { SalesSourceContract } from '../src/shared/contracts';
import { ConnectivityError } from '../src/shared/errors';
import type { DailyReport, DaySlice, ReturnRecord, SalesRecord } from '../src/shared/types';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const at = new Date('2026-10-19T12:00:00Z');

const fixedSource = (sales: SalesRecord[], returns: ReturnRecord[]): SalesSourceContract => ({
  getSalesByDate: async () => ({ records: sales, excluded: 1 }),
  getReturnsByDate: async () => ({ records: returns, excluded: 0 }),
});

const report = (date: string): DailyReport => ({
  date,
  totals: { total_revenue: 0, total_returns: 0, net_revenue: 0 },
  salespeople: [],
  excluded: { sales: 0, returns: 0 },
  generated_at: at,
});

describe('SerialQueue', () => {
  it('runs tasks one after another in order', async () => {
    const queue = new SerialQueue();
    const gate = deferred<void>();
    const order: string[] = [];

    const first = queue.enqueue(async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = queue.enqueue(async () => {
      order.push('second');
    });

    await vi.waitFor(() => expect(order).toEqual(['first:start']));
    expect(queue.size).toBe(2);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(queue.size).toBe(0);
  });

  it('keeps going after a failed task', async () => {
    const queue = new SerialQueue();

    const failed = queue.enqueue(async () => {
      throw new Error('boom');
    });
    const next = queue.enqueue(async () => 42);

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe(42);
  });
});

describe('DailyReportService', () => {
  it('aggregates the day and carries excluded counts', async () => {
    const sale: SalesRecord = { emission_date: at, salesperson: 'Ana', invoice_value: 300 };
    const ret: ReturnRecord = {
      quantity: 1,
      total_value: 100,
      invoice_number: '1',
      emission_date: at,
      salesperson_code: '1',
      salesperson_name: 'Rui',
    };
    const service = new DailyReportService(fixedSource([sale], [ret]), () => at);

    expect(await service.buildReport('2026-10-19')).toEqual({
      date: '2026-10-19',
      totals: { total_revenue: 30000, total_returns: 10000, net_revenue: 20000 },
      salespeople: [
        { salesperson_name: 'Ana', revenue: 30000, returns: 0, net: 30000 },
        { salesperson_name: 'Rui', revenue: 0, returns: 10000, net: -10000 },
      ],
      excluded: { sales: 1, returns: 0 },
      generated_at: at,
    });
  });

  it('never runs two passes at the same time', async () => {
    const gate = deferred<DaySlice<SalesRecord>>();
    let active = 0;
    let maxActive = 0;
    const getSalesByDate = vi
      .fn<(date: string) => Promise<DaySlice<SalesRecord>>>()
      .mockImplementationOnce(async () => {
        active++;
        maxActive = Math.max(maxActive, active);
        const slice = await gate.promise;
        active--;
        return slice;
      })
      .mockImplementation(async () => {
        active++;
        maxActive = Math.max(maxActive, active);
        active--;
        return { records: [], excluded: 0 };
      });
    const service = new DailyReportService({
      getSalesByDate,
      getReturnsByDate: async () => ({ records: [], excluded: 0 }),
    });

    const first = service.buildReport('2026-10-19');
    const second = service.buildReport('2026-10-18');
    await vi.waitFor(() => expect(getSalesByDate).toHaveBeenCalledTimes(1));

    gate.resolve({ records: [], excluded: 0 });
    await Promise.all([first, second]);

    expect(getSalesByDate.mock.calls).toEqual([['2026-10-19'], ['2026-10-18']]);
    expect(maxActive).toBe(1);
  });
});

describe('RefreshJob', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  const service = () => new DailyReportService(fixedSource([], []), () => at);

  it('builds the report for today in the configured zone', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const reports = service();
    const build = vi.spyOn(reports, 'buildReport');
    const job = new RefreshJob(reports, 'America/Sao_Paulo', () => new Date('2026-10-20T02:00:00Z'));

    await job.run();

    expect(build).toHaveBeenCalledWith('2026-10-19');
    expect(job.getLatest()?.status).toBe('ok');
  });

  it('queues a tick behind a running refresh and merges further ticks', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const reports = service();
    const gate = deferred<DailyReport>();
    const build = vi
      .spyOn(reports, 'buildReport')
      .mockImplementationOnce(() => gate.promise)
      .mockImplementation(async (date) => report(date));
    const job = new RefreshJob(reports, 'UTC', () => at);

    const first = job.run();
    await vi.waitFor(() => expect(build).toHaveBeenCalledTimes(1));

    const second = job.run();
    const third = job.run();
    expect(third).toBe(second);
    expect(build).toHaveBeenCalledTimes(1);

    gate.resolve(report('2026-10-19'));
    await first;
    await second;
    expect(build).toHaveBeenCalledTimes(2);
  });

  it('stores failures as an error snapshot and keeps the last good report', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const reports = service();
    const good = report('2026-10-19');
    vi.spyOn(reports, 'buildReport')
      .mockResolvedValueOnce(good)
      .mockRejectedValueOnce(new ConnectivityError('Could not read sales from the data source: timeout'))
      .mockResolvedValueOnce(good);
    const job = new RefreshJob(reports, 'UTC', () => at);

    await job.run();
    await expect(job.run()).resolves.toBeUndefined();

    expect(job.getLatest()).toEqual({
      status: 'error',
      date: '2026-10-19',
      error: 'Could not read sales from the data source: timeout',
      refreshed_at: at,
      last_report: good,
    });
    expect(error).toHaveBeenCalledWith(
      '[Refresh] Failed for 2026-10-19:',
      'Could not read sales from the data source: timeout'
    );

    await job.run();
    expect(job.getLatest()).toEqual({ status: 'ok', report: good, refreshed_at: at });
  });

  it('records a bad zone as an error snapshot and keeps later runs going', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const reports = service();
    const build = vi.spyOn(reports, 'buildReport');
    const job = new RefreshJob(reports, 'America/Sao_Paolo', () => at);

    await expect(job.run()).resolves.toBeUndefined();
    await expect(job.run()).resolves.toBeUndefined();

    expect(build).not.toHaveBeenCalled();
    expect(job.getLatest()).toEqual({
      status: 'error',
      date: '2026-10-19',
      error: expect.stringContaining('America/Sao_Paolo'),
      refreshed_at: at,
      last_report: null,
    });
    expect(error).toHaveBeenCalledTimes(2);
  });

  it('survives a report build that throws before returning a promise', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const reports = service();
    vi.spyOn(reports, 'buildReport')
      .mockImplementationOnce(() => {
        throw new Error('boom');
      })
      .mockImplementation(async (date) => report(date));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const job = new RefreshJob(reports, 'UTC', () => at);

    await expect(job.run()).resolves.toBeUndefined();
    expect(job.getLatest()).toMatchObject({ status: 'error', error: 'boom' });

    await job.run();
    expect(job.getLatest()?.status).toBe('ok');
  });

  it('logs the net figure in currency units', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const reports = service();
    vi.spyOn(reports, 'buildReport').mockResolvedValue({
      ...report('2026-10-19'),
      totals: { total_revenue: 150000, total_returns: 20050, net_revenue: 129950 },
    });
    const job = new RefreshJob(reports, 'UTC', () => at);

    await job.run();

    expect(log).toHaveBeenCalledWith('[Refresh] 2026-10-19: 0 salespeople, net 1299.50');
  });

  it('has no snapshot before the first run', () => {
    expect(new RefreshJob(service(), 'UTC').getLatest()).toBeNull();
  });
});
