#!/usr/bin/env node

import { readFile } from 'fs/promises';
import pg from 'pg';
import { getConfig } from '../config/index.js';
import { KV_TABLE } from '../persistence/postgres-byte-store.js';
import { PersistenceError, errorMessage } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('migrate');

// Resolved from src/db; the script runs from sources through `npm run db:migrate`
const INIT_SQL = new URL('../../scripts/init-db.sql', import.meta.url);

/**
 * Create the snapshot table used by STORAGE_DRIVER=postgres
 */
async function migrate(): Promise<void> {
  const { postgres } = getConfig();
  const pool = new pg.Pool(postgres);

  try {
    await pool.query(await readFile(INIT_SQL, 'utf-8'));

    const { rows } = await pool.query<{ ready: boolean }>('SELECT to_regclass($1) IS NOT NULL AS ready', [
      `public.${KV_TABLE}`,
    ]);
    if (!rows[0]?.ready) {
      throw new PersistenceError(`Table ${KV_TABLE} is missing after running init-db.sql`);
    }
    logger.info({ database: postgres.database, table: KV_TABLE }, 'Snapshot table ready');
  } catch (error) {
    logger.error({ error: errorMessage(error) }, 'Migration failed');
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

void migrate();
