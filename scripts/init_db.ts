/**
 * Creates the scores database and applies migrations.
 * `--reset` deletes the existing database file first.
 *
 * Usage: npx tsx scripts/init_db.ts [--reset]
 */

import './load_env';

import { closeDatabase, initializeDatabase, resetDatabase } from '../src/data/db';
import { ScoreRepository } from '../src/data/repositories/scores_repo';
import { errorMessage } from '../src/core/errors';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('init_db');

try {
  if (process.argv.includes('--reset')) {
    resetDatabase();
  }
  const db = initializeDatabase();
  const stats = new ScoreRepository(db).getStats();
  console.log(`Database ready at ${db.name}`);
  console.log(`Stored scores: ${stats.total} (${stats.tickers} tickers, latest ${stats.latestDate ?? '-'})`);
} catch (error) {
  logger.error({ error: errorMessage(error) }, 'Database initialization failed');
  process.exitCode = 1;
} finally {
  closeDatabase();
}
