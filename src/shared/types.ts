// ──────────────────────────────────────────
// Shared type definitions for the invoicing board
// ──────────────────────────────────────────

/** Calendar day, `YYYY-MM-DD`. */
export type DayKey = string;

/** Money as an integer number of cents. */
export type Cents = number;

export type DbDriver = 'mssql' | 'pg';
export type QueryKind = 'sales' | 'returns';

export interface DbConfig {
  driver: DbDriver;
  server: string;
  port: number | null;
  database: string;
  user: string;
  password: string;
  schema: string;
}

export interface ReportConfig {
  timeZone: string;
  locale: string;
  currency: string;
  currencySymbol: string;
}

export interface AppConfig {
  db: DbConfig;
  report: ReportConfig;
  port: number;
  refreshIntervalMs: number;
  cacheTtlMs: number;
}

// ── Source view rows, as the driver hands them back ──

export interface SalesViewRow {
  Emissao: unknown;
  VENDEDOR: unknown;
  ValorNF: unknown;
}

export interface ReturnsViewRow {
  QUANTIDADE: unknown;
  VALOR_TOTAL: unknown;
  NF: unknown;
  EMISSAO_NFD: unknown;
  COD_VENDEDOR: unknown;
  NOME_VENDEDOR: unknown;
}

// ── Clean records ──

export interface SalesRecord {
  emission_date: Date;
  salesperson: string | null;
  invoice_value: number;
}

export interface ReturnRecord {
  quantity: number | null;
  total_value: number;
  invoice_number: string;
  emission_date: Date;
  salesperson_code: string | null;
  salesperson_name: string | null;
}

export interface DaySlice<T> {
  records: T[];
  /** Rows dropped because their emission date could not be parsed. */
  excluded: number;
}

// ── Aggregates ──

export interface SalespersonSummary {
  salesperson_name: string;
  revenue: Cents;
  returns: Cents;
  net: Cents;
}

export interface DailyTotals {
  total_revenue: Cents;
  total_returns: Cents;
  net_revenue: Cents;
}

export interface AggregateResult {
  totals: DailyTotals;
  salespeople: SalespersonSummary[];
}

export interface DailyReport extends AggregateResult {
  date: DayKey;
  excluded: {
    sales: number;
    returns: number;
  };
  generated_at: Date;
}

export type ReportSnapshot =
  | {
      status: 'ok';
      report: DailyReport;
      refreshed_at: Date;
    }
  | {
      status: 'error';
      date: DayKey;
      error: string;
      refreshed_at: Date;
      last_report: DailyReport | null;
    };

// ── Presentation ──

export interface ReportMetrics {
  revenue: string;
  returns: string;
  net_revenue: string;
}

export interface ReportTable {
  columns: string[];
  rows: string[][];
}

export interface ReportView {
  title: string;
  date: DayKey;
  metrics: ReportMetrics;
  table: ReportTable;
  excluded: {
    sales: number;
    returns: number;
  };
  generated_at: string;
}
