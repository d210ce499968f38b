// ──────────────────────────────────────────
// Configuration — environment → AppConfig
// ──────────────────────────────────────────

import { ConfigError } from './shared/errors';
import type { AppConfig, DbDriver } from './shared/types';

type Env = Record<string, string | undefined>;

const DRIVERS: readonly DbDriver[] = ['mssql', 'pg'];
const REQUIRED_DB_VARS = ['DB_SERVER', 'DB_DATABASE', 'DB_USER', 'DB_PASSWORD'] as const;

export function loadConfig(env: Env = process.env): AppConfig {
  const problems: string[] = [];

  const read = (name: string, fallback: string): string => {
    const value = env[name]?.trim();
    return value ? value : fallback;
  };

  const readInt = (name: string, fallback: number): number => {
    const raw = env[name]?.trim();
    if (!raw) return fallback;
    if (!/^\d+$/.test(raw)) {
      problems.push(`${name} must be a non-negative integer (got "${raw}")`);
      return fallback;
    }
    return parseInt(raw, 10);
  };

  for (const name of REQUIRED_DB_VARS) {
    if (!env[name]?.trim()) problems.push(`${name} is required`);
  }

  const driverName = read('DB_DRIVER', 'mssql');
  const driver = DRIVERS.find((d) => d === driverName);
  if (!driver) {
    problems.push(`DB_DRIVER must be one of ${DRIVERS.join(', ')} (got "${driverName}")`);
  }

  const port = env.DB_PORT?.trim() ? readInt('DB_PORT', 0) : null;

  const config: AppConfig = {
    db: {
      driver: driver ?? 'mssql',
      server: read('DB_SERVER', ''),
      port,
      database: read('DB_DATABASE', ''),
      user: read('DB_USER', ''),
      password: env.DB_PASSWORD ?? '',
      schema: read('DB_SCHEMA', 'dbo'),
    },
    report: {
      timeZone: read('REPORT_TIMEZONE', 'America/Sao_Paulo'),
      locale: read('REPORT_LOCALE', 'pt-BR'),
      currency: read('REPORT_CURRENCY', 'BRL'),
      currencySymbol: read('CURRENCY_SYMBOL', 'R$'),
    },
    port: readInt('PORT', 3000),
    refreshIntervalMs: readInt('REFRESH_INTERVAL_MS', 10_000),
    cacheTtlMs: readInt('CACHE_TTL_MS', 10_000),
  };

  if (!isTimeZone(config.report.timeZone)) {
    problems.push(`REPORT_TIMEZONE must be an IANA time zone (got "${config.report.timeZone}")`);
  }

  if (config.refreshIntervalMs === 0) {
    problems.push('REFRESH_INTERVAL_MS must be greater than 0');
  }

  if (problems.length > 0) {
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }
  return config;
}

function isTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch (err) {
    if (err instanceof RangeError) return false;
    throw err;
  }
}
