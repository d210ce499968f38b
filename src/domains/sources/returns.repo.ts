// ──────────────────────────────────────────
// Sources: returns view repository
// ──────────────────────────────────────────

import type { Knex } from 'knex';
import type { ViewReader } from '../../shared/contracts';
import { parseEmissionDate } from '../../shared/dates';
import { DataQualityError } from '../../shared/errors';
import type { ReturnRecord, ReturnsViewRow } from '../../shared/types';
import { parseAmount, parseOptionalNumber, parseOptionalText } from './values';

export const RETURNS_VIEW = 'v_devolucoes';
export const RETURNS_COLUMNS = [
  'QUANTIDADE',
  'VALOR_TOTAL',
  'NF',
  'EMISSAO_NFD',
  'COD_VENDEDOR',
  'NOME_VENDEDOR',
] as const;

export class ReturnsRepo implements ViewReader<ReturnsViewRow> {
  constructor(
    private db: Knex,
    private schema: string
  ) {}

  query(): Knex.QueryBuilder {
    return this.db.withSchema(this.schema).from(RETURNS_VIEW).select(...RETURNS_COLUMNS);
  }

  // EMISSAO_NFD is not reliably typed in the view, so the day is picked client-side
  async findAll(): Promise<ReturnsViewRow[]> {
    return this.query();
  }
}

export function toReturnRecord(row: ReturnsViewRow): ReturnRecord {
  const emissionDate = parseEmissionDate(row.EMISSAO_NFD);
  if (!emissionDate) {
    throw new DataQualityError(`EMISSAO_NFD is not a date: ${String(row.EMISSAO_NFD)}`);
  }

  return {
    quantity: parseOptionalNumber(row.QUANTIDADE, 'QUANTIDADE'),
    total_value: parseAmount(row.VALOR_TOTAL, 'VALOR_TOTAL'),
    invoice_number: parseOptionalText(row.NF) ?? '',
    emission_date: emissionDate,
    salesperson_code: parseOptionalText(row.COD_VENDEDOR),
    salesperson_name: parseOptionalText(row.NOME_VENDEDOR),
  };
}
