/**
 * SQLite database initialization and management
 * Uses better-sqlite3 for synchronous operations
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, readFileSync, readdirSync, unlinkSync } from 'fs';
import { dirname, join } from 'path';
import { getEnvConfig } from '@/core/env';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('db');

const IN_MEMORY = ':memory:';

let db: Database.Database | null = null;

function getDbPath(): string {
  const dbPath = getEnvConfig().scoresDbPath;
  if (dbPath !== IN_MEMORY) {
    const dataDir = dirname(dbPath);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
  }
  return dbPath;
}

function runMigrations(database: Database.Database): void {
  const migrationsDir = join(process.cwd(), 'src', 'data', 'migrations');
  if (!existsSync(migrationsDir)) {
    logger.warn({ migrationsDir }, 'Migrations directory not found');
    return;
  }

  const files = readdirSync(migrationsDir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  logger.debug({ migrationsDir, files }, 'Running database migrations');

  for (const file of files) {
    database.exec(readFileSync(join(migrationsDir, file), 'utf-8'));
  }
}

/**
 * Opens a connection and applies migrations (idempotent). Used directly by
 * tests with ':memory:'.
 */
export function openDatabase(dbPath: string): Database.Database {
  const database = new Database(dbPath);
  if (dbPath !== IN_MEMORY) {
    database.pragma('journal_mode = WAL');
  }
  runMigrations(database);
  return database;
}

export function initializeDatabase(): Database.Database {
  if (db) {
    return db;
  }

  const dbPath = getDbPath();
  const isNew = dbPath === IN_MEMORY || !existsSync(dbPath);

  logger.info({ dbPath, isNew }, 'Initializing database');

  db = openDatabase(dbPath);
  return db;
}

export function getDatabase(): Database.Database {
  if (!db) {
    return initializeDatabase();
  }
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    logger.info('Database connection closed');
  }
}

export function resetDatabase(): void {
  closeDatabase();

  const dbPath = getDbPath();
  if (dbPath !== IN_MEMORY) {
    for (const path of [dbPath, `${dbPath}-wal`, `${dbPath}-shm`]) {
      if (existsSync(path)) unlinkSync(path);
    }
  }

  logger.info('Database reset complete');
}
