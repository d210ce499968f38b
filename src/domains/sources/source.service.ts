// ──────────────────────────────────────────
// Sources: day-scoped fetch service
// ──────────────────────────────────────────

import type { SalesSourceContract, ViewReader } from '../../shared/contracts';
import { ConnectivityError, errorMessage } from '../../shared/errors';
import type {
  DayKey,
  DaySlice,
  QueryKind,
  ReturnRecord,
  ReturnsViewRow,
  SalesRecord,
  SalesViewRow,
} from '../../shared/types';
import { TtlCache } from '../../platform/cache';
import { filterByDay } from './date-filter';
import { toReturnRecord } from './returns.repo';
import { toSalesRecord } from './sales.repo';

export class SourceService implements SalesSourceContract {
  private salesCache: TtlCache<DaySlice<SalesRecord>>;
  private returnsCache: TtlCache<DaySlice<ReturnRecord>>;

  constructor(
    private salesReader: ViewReader<SalesViewRow>,
    private returnsReader: ViewReader<ReturnsViewRow>,
    cacheTtlMs: number,
    now?: () => number
  ) {
    this.salesCache = new TtlCache(cacheTtlMs, now);
    this.returnsCache = new TtlCache(cacheTtlMs, now);
  }

  async getSalesByDate(date: DayKey): Promise<DaySlice<SalesRecord>> {
    return this.salesCache.getOrLoad(date, async () => {
      const rows = await this.read(this.salesReader, 'sales');
      const { matched, unparseable } = filterByDay(rows, (r) => r.Emissao, date);
      this.reportExcluded('sales', date, unparseable.length);
      return { records: matched.map(toSalesRecord), excluded: unparseable.length };
    });
  }

  async getReturnsByDate(date: DayKey): Promise<DaySlice<ReturnRecord>> {
    return this.returnsCache.getOrLoad(date, async () => {
      const rows = await this.read(this.returnsReader, 'returns');
      const { matched, unparseable } = filterByDay(rows, (r) => r.EMISSAO_NFD, date);
      this.reportExcluded('returns', date, unparseable.length);
      return { records: matched.map(toReturnRecord), excluded: unparseable.length };
    });
  }

  private async read<Row>(reader: ViewReader<Row>, kind: QueryKind): Promise<Row[]> {
    try {
      return await reader.findAll();
    } catch (err) {
      throw new ConnectivityError(`Could not read ${kind} from the data source: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  private reportExcluded(kind: QueryKind, date: DayKey, count: number): void {
    if (count === 0) return;
    console.warn(`[Sources] Excluded ${count} ${kind} rows with an unparseable emission date (report ${date})`);
  }
}
