/**
 * One-time database schema setup for the history store.
 * Runs schema/init.sql to create the submissions table and indexes.
 */

import fs from 'fs';
import path from 'path';
import { Pool } from 'pg';
import { PROJECT_ROOT, loadConfig, logger } from '@tradeform/shared';

const config = loadConfig();

if (!config.databaseUrl) {
  logger.error('DATABASE_URL is not set, nothing to initialize');
  process.exit(1);
}

const pool = new Pool({ connectionString: config.databaseUrl });

async function runInitSchema(): Promise<void> {
  const client = await pool.connect();

  try {
    logger.info('Running database schema (init.sql)');

    const schemaPath = path.join(PROJECT_ROOT, 'services', 'form-api', 'src', 'schema', 'init.sql');
    const sql = fs.readFileSync(schemaPath, 'utf-8');
    await client.query(sql);

    logger.info('Database schema complete');
  } catch (error) {
    logger.error('Schema init failed', error);
    throw error;
  } finally {
    client.release();
    await pool.end();
  }
}

runInitSchema()
  .then(() => process.exit(0))
  .catch(() => process.exit(1));
