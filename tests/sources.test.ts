import knex from 'knex';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { SalesRepo, toSalesRecord } from '../src/domains/sources/sales.repo';
import { ReturnsRepo, toReturnRecord } from '../src/domains/sources/returns.repo';
import { SourceService } from '../src/domains/sources/source.service';
import type { ViewReader } from '../src/shared/contracts';
import { ConnectivityError, DataQualityError } from '../src/shared/errors';
import type { ReturnsViewRow, SalesViewRow } from '../src/shared/types';

class ArrayReader<Row> implements ViewReader<Row> {
  calls = 0;
  constructor(public rows: Row[]) {}
  async findAll(): Promise<Row[]> {
    this.calls++;
    return this.rows;
  }
}

class FailingReader<Row> implements ViewReader<Row> {
  async findAll(): Promise<Row[]> {
    throw new Error('connect ECONNREFUSED 10.0.0.5:1433');
  }
}

const salesRow = (Emissao: unknown, VENDEDOR: unknown, ValorNF: unknown): SalesViewRow => ({
  Emissao,
  VENDEDOR,
  ValorNF,
});

const returnsRow = (EMISSAO_NFD: unknown, NOME_VENDEDOR: unknown, VALOR_TOTAL: unknown): ReturnsViewRow => ({
  QUANTIDADE: 2,
  VALOR_TOTAL,
  NF: 4521,
  EMISSAO_NFD,
  COD_VENDEDOR: '007',
  NOME_VENDEDOR,
});

describe('view queries', () => {
  // no connection settings: builds SQL without loading a driver
  const db = knex({ client: 'mssql' });

  it('selects the sales columns from the configured schema', () => {
    const sql = new SalesRepo(db, 'dbo').query().toSQL().sql;
    expect(sql).toBe('select [Emissao], [VENDEDOR], [ValorNF] from [dbo].[v_faturamento_produto]');
  });

  it('selects the returns columns from the configured schema', () => {
    const sql = new ReturnsRepo(db, 'dbo').query().toSQL().sql;
    expect(sql).toBe(
      'select [QUANTIDADE], [VALOR_TOTAL], [NF], [EMISSAO_NFD], [COD_VENDEDOR], [NOME_VENDEDOR] from [dbo].[v_devolucoes]'
    );
  });
});

describe('row mapping', () => {
  it('maps a sales row, reading numeric strings', () => {
    expect(toSalesRecord(salesRow('2026-10-19 09:15:00', 'Ana', '1250.40'))).toEqual({
      emission_date: new Date('2026-10-19T09:15:00.000Z'),
      salesperson: 'Ana',
      invoice_value: 1250.4,
    });
  });

  it('maps a returns row', () => {
    expect(toReturnRecord(returnsRow(new Date('2026-10-19T00:00:00Z'), null, 80))).toEqual({
      quantity: 2,
      total_value: 80,
      invoice_number: '4521',
      emission_date: new Date('2026-10-19T00:00:00Z'),
      salesperson_code: '007',
      salesperson_name: null,
    });
  });

  it('rejects null or non-numeric values', () => {
    expect(() => toSalesRecord(salesRow('2026-10-19', 'Ana', null))).toThrow(DataQualityError);
    expect(() => toReturnRecord(returnsRow('2026-10-19', 'Ana', 'abc'))).toThrow('VALOR_TOTAL is not numeric: "abc"');
  });
});

describe('SourceService', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns only the rows of the requested day', async () => {
    const sales = new ArrayReader([
      salesRow('2026-10-19 08:00:00', 'Ana', 100),
      salesRow('2026-10-18 18:00:00', 'Ana', 999),
      salesRow(new Date('2026-10-19T17:45:00Z'), 'Bia', '40.50'),
    ]);
    const service = new SourceService(sales, new ArrayReader<ReturnsViewRow>([]), 0);

    const slice = await service.getSalesByDate('2026-10-19');

    expect(slice.excluded).toBe(0);
    expect(slice.records.map((r) => [r.salesperson, r.invoice_value])).toEqual([
      ['Ana', 100],
      ['Bia', 40.5],
    ]);
  });

  it('counts and logs rows with unreadable dates instead of failing', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const returns = new ArrayReader([
      returnsRow('2026-10-19 10:00:00', 'Ana', 30),
      returnsRow('pending', 'Ana', 'not even a number'),
      returnsRow(null, 'Bia', 10),
    ]);
    const service = new SourceService(new ArrayReader<SalesViewRow>([]), returns, 0);

    const slice = await service.getReturnsByDate('2026-10-19');

    expect(slice.excluded).toBe(2);
    expect(slice.records).toHaveLength(1);
    expect(warn).toHaveBeenCalledWith(
      '[Sources] Excluded 2 returns rows with an unparseable emission date (report 2026-10-19)'
    );
  });

  it('wraps reader failures as connectivity errors', async () => {
    const service = new SourceService(new FailingReader<SalesViewRow>(), new ArrayReader<ReturnsViewRow>([]), 0);

    await expect(service.getSalesByDate('2026-10-19')).rejects.toThrow(ConnectivityError);
    await expect(service.getSalesByDate('2026-10-19')).rejects.toThrow(
      'Could not read sales from the data source: connect ECONNREFUSED 10.0.0.5:1433'
    );
  });

  it('lets data quality errors through unwrapped', async () => {
    const sales = new ArrayReader([salesRow('2026-10-19', 'Ana', 'n/a')]);
    const service = new SourceService(sales, new ArrayReader<ReturnsViewRow>([]), 0);

    await expect(service.getSalesByDate('2026-10-19')).rejects.toThrow(DataQualityError);
  });

  it('memoizes per day within the TTL', async () => {
    let clock = 1_000;
    const sales = new ArrayReader([salesRow('2026-10-19', 'Ana', 100)]);
    const service = new SourceService(sales, new ArrayReader<ReturnsViewRow>([]), 10_000, () => clock);

    const first = await service.getSalesByDate('2026-10-19');
    clock += 9_999;
    const second = await service.getSalesByDate('2026-10-19');
    await service.getSalesByDate('2026-10-18');

    expect(second).toBe(first);
    expect(sales.calls).toBe(2);

    clock += 1;
    await service.getSalesByDate('2026-10-19');
    expect(sales.calls).toBe(3);
  });
});
