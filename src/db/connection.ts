// ──────────────────────────────────────────
// Database connection — Knex instance
// ──────────────────────────────────────────

import knex, { Knex } from 'knex';
import pg from 'pg';
import type { DbConfig } from '../shared/types';

// Postgres type OIDs
const PG_TIMESTAMP = 1114;
const PG_TIMESTAMPTZ = 1184;
const PG_DATE = 1082;

/**
 * Builds the single connection handle the process reuses for every
 * refresh. Callers own it and release it with closeDb().
 */
export function createDb(config: DbConfig, timeZone?: string): Knex {
  if (config.driver !== 'pg') {
    return knex({
      client: config.driver,
      connection: connectionSettings(config),
      pool: { min: 0, max: 1 },
    });
  }

  keepPgDatesAsText();
  return knex({
    client: 'pg',
    connection: connectionSettings(config),
    pool: {
      min: 0,
      max: 1,
      afterCreate: (conn: pg.Client, done: (err: Error | null, conn: pg.Client) => void) => {
        if (!timeZone) {
          done(null, conn);
          return;
        }
        conn.query(`SET TIME ZONE '${timeZone.replace(/'/g, "''")}'`, (err: Error | null) => done(err, conn));
      },
    },
  });
}

export function connectionSettings(config: DbConfig): Knex.StaticConnectionConfig {
  if (config.driver === 'mssql') {
    return {
      server: config.server,
      port: config.port ?? 1433,
      database: config.database,
      user: config.user,
      password: config.password,
      options: {
        // wall-clock datetime values land in the UTC fields of the Date
        useUTC: true,
        trustServerCertificate: true,
      },
    };
  }

  return {
    host: config.server,
    port: config.port ?? 5432,
    database: config.database,
    user: config.user,
    password: config.password,
  };
}

/**
 * Process-wide: node-postgres keeps one parser table. Date and timestamp
 * values come back as the wall-clock text the server sends, so the day
 * filter reads them the way it reads SQL Server values. For timestamptz
 * that text is rendered in the session TimeZone, which createDb sets to
 * the report zone; the offset suffix is dropped.
 */
export function keepPgDatesAsText(): void {
  pg.types.setTypeParser(PG_TIMESTAMP, (value: string) => value);
  pg.types.setTypeParser(PG_TIMESTAMPTZ, stripOffset);
  pg.types.setTypeParser(PG_DATE, (value: string) => value);
}

export function stripOffset(value: string): string {
  return value.replace(/(\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(?:Z|[+-]\d{2}(?::?\d{2}){0,2})$/, '$1');
}

export async function closeDb(db: Knex): Promise<void> {
  await db.destroy();
}
