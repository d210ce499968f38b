// ──────────────────────────────────────────
// Script: Reset — drop the development source tables
// ──────────────────────────────────────────

import dotenv from 'dotenv';
dotenv.config();

import { loadConfig } from '../src/config';
import { createDb, closeDb } from '../src/db/connection';
import { SALES_VIEW } from '../src/domains/sources/sales.repo';
import { RETURNS_VIEW } from '../src/domains/sources/returns.repo';

async function reset() {
  const config = loadConfig();
  const db = createDb(config.db, config.report.timeZone);
  const schema = config.db.schema;

  console.log('[Reset] Dropping development tables...');
  await db.schema.withSchema(schema).dropTableIfExists(RETURNS_VIEW);
  await db.schema.withSchema(schema).dropTableIfExists(SALES_VIEW);

  console.log('[Reset] Done. Run `npm run seed` to recreate them');
  await closeDb(db);
}

reset().catch((err) => {
  console.error('[Reset] Error:', err);
  process.exit(1);
});
