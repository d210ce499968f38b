// ──────────────────────────────────────────
// Script: Seed — create the two source relations as plain tables in a
// development database and fill them with today's and yesterday's rows
// ──────────────────────────────────────────
//
// Usage:
//   npm run seed
//
// Never point this at the production ERP: there the relations are views.

import dotenv from 'dotenv';
dotenv.config();

import { faker } from '@faker-js/faker';
import type { Knex } from 'knex';
import { loadConfig } from '../src/config';
import { createDb, closeDb } from '../src/db/connection';
import { dayKeyOf, todayIn } from '../src/shared/dates';
import type { DayKey } from '../src/shared/types';
import { SALES_VIEW } from '../src/domains/sources/sales.repo';
import { RETURNS_VIEW } from '../src/domains/sources/returns.repo';

const SALES_PER_DAY = 40;
const RETURNS_PER_DAY = 6;

async function ensureTables(db: Knex, schema: string): Promise<void> {
  const scoped = () => db.schema.withSchema(schema);

  if (!(await scoped().hasTable(SALES_VIEW))) {
    await scoped().createTable(SALES_VIEW, (t) => {
      t.increments('id').primary();
      t.datetime('Emissao').notNullable();
      t.string('VENDEDOR', 100);
      t.decimal('ValorNF', 14, 2).notNullable();
    });
    console.log(`[Seed] Created ${schema}.${SALES_VIEW}`);
  }

  if (!(await scoped().hasTable(RETURNS_VIEW))) {
    await scoped().createTable(RETURNS_VIEW, (t) => {
      t.increments('id').primary();
      t.integer('QUANTIDADE');
      t.decimal('VALOR_TOTAL', 14, 2).notNullable();
      t.string('NF', 20);
      // text on purpose: the board must cope with unreadable dates here
      t.string('EMISSAO_NFD', 30);
      t.string('COD_VENDEDOR', 10);
      t.string('NOME_VENDEDOR', 100);
    });
    console.log(`[Seed] Created ${schema}.${RETURNS_VIEW}`);
  }
}

function timestampOn(day: DayKey): string {
  const hh = String(faker.number.int({ min: 8, max: 18 })).padStart(2, '0');
  const mm = String(faker.number.int({ min: 0, max: 59 })).padStart(2, '0');
  return `${day} ${hh}:${mm}:00`;
}

async function seed() {
  const config = loadConfig();
  const db = createDb(config.db, config.report.timeZone);
  const schema = config.db.schema;
  console.log('[Seed] Starting...');

  if (config.db.driver === 'pg') {
    await db.schema.createSchemaIfNotExists(schema);
  }
  await ensureTables(db, schema);

  console.log('[Seed] Clearing existing data...');
  await db.withSchema(schema).from(SALES_VIEW).del();
  await db.withSchema(schema).from(RETURNS_VIEW).del();

  const today = todayIn(config.report.timeZone);
  const yesterday = dayKeyOf(new Date(Date.parse(`${today}T00:00:00Z`) - 86_400_000));

  const team = Array.from({ length: 5 }, (_, i) => ({
    code: String(100 + i),
    name: faker.person.fullName(),
  }));
  // only ever shows up on the returns side
  const formerRep = { code: '199', name: faker.person.fullName() };

  const sales = [today, yesterday].flatMap((day) =>
    Array.from({ length: SALES_PER_DAY }, () => ({
      Emissao: timestampOn(day),
      VENDEDOR: faker.helpers.arrayElement(team).name,
      ValorNF: faker.number.float({ min: 50, max: 5_000, fractionDigits: 2 }),
    }))
  );

  const returns = [today, yesterday].flatMap((day) =>
    Array.from({ length: RETURNS_PER_DAY }, () => {
      const rep = faker.helpers.arrayElement([...team, formerRep]);
      return {
        QUANTIDADE: faker.number.int({ min: 1, max: 10 }),
        VALOR_TOTAL: faker.number.float({ min: 20, max: 800, fractionDigits: 2 }),
        NF: faker.string.numeric(6),
        EMISSAO_NFD: timestampOn(day),
        COD_VENDEDOR: rep.code,
        NOME_VENDEDOR: rep.name,
      };
    })
  );
  returns.push({
    QUANTIDADE: 1,
    VALOR_TOTAL: 99.9,
    NF: faker.string.numeric(6),
    EMISSAO_NFD: 'pending',
    COD_VENDEDOR: team[0].code,
    NOME_VENDEDOR: team[0].name,
  });

  await db.batchInsert(`${schema}.${SALES_VIEW}`, sales, 100);
  await db.batchInsert(`${schema}.${RETURNS_VIEW}`, returns, 100);

  console.log(`[Seed] Inserted ${sales.length} sales and ${returns.length} returns (${yesterday}, ${today})`);
  await closeDb(db);
}

seed().catch((err) => {
  console.error('[Seed] Error:', err);
  process.exit(1);
});
