// ──────────────────────────────────────────
// Sources: sales view repository
// ──────────────────────────────────────────

import type { Knex } from 'knex';
import type { ViewReader } from '../../shared/contracts';
import { parseEmissionDate } from '../../shared/dates';
import { DataQualityError } from '../../shared/errors';
import type { SalesRecord, SalesViewRow } from '../../shared/types';
import { parseAmount, parseOptionalText } from './values';

export const SALES_VIEW = 'v_faturamento_produto';
export const SALES_COLUMNS = ['Emissao', 'VENDEDOR', 'ValorNF'] as const;

export class SalesRepo implements ViewReader<SalesViewRow> {
  constructor(
    private db: Knex,
    private schema: string
  ) {}

  query(): Knex.QueryBuilder {
    return this.db.withSchema(this.schema).from(SALES_VIEW).select(...SALES_COLUMNS);
  }

  async findAll(): Promise<SalesViewRow[]> {
    return this.query();
  }
}

export function toSalesRecord(row: SalesViewRow): SalesRecord {
  const emissionDate = parseEmissionDate(row.Emissao);
  if (!emissionDate) {
    throw new DataQualityError(`Emissao is not a date: ${String(row.Emissao)}`);
  }

  return {
    emission_date: emissionDate,
    salesperson: parseOptionalText(row.VENDEDOR),
    invoice_value: parseAmount(row.ValorNF, 'ValorNF'),
  };
}
