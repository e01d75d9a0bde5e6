/**
 * Database Client Setup
 *
 * Initializes Drizzle ORM over better-sqlite3. Handles file permissions,
 * pragmas and the SQL migrations shipped in packages/core/drizzle/.
 */

import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import * as schema from '../schema/index.js';
import { logger } from '../utils/logger.js';
import { RegistryError } from '../utils/errors.js';

export type DatabaseClient = BetterSQLite3Database<typeof schema>;

/**
 * Anything repositories can run queries on: the client itself or a
 * transaction opened with `db.transaction(tx => ...)`.
 */
export type DatabaseExecutor = BaseSQLiteDatabase<'sync', Database.RunResult, typeof schema>;

export interface DatabaseConfig {
  /** Filesystem path or ':memory:' */
  sqliteFilePath: string;

  enableWAL?: boolean; // Ignored for in-memory databases
}

// Underlying connections, kept out of the drizzle object
const connections = new WeakMap<DatabaseClient, Database.Database>();

/**
 * Translate DATABASE_URL into a SQLite file path.
 *
 * Accepts `sqlite:///<path>`, `sqlite://:memory:`, a bare path or `:memory:`.
 */
export function parseDatabaseUrl(url: string): DatabaseConfig {
  const trimmed = url.trim();
  if (trimmed === ':memory:' || trimmed === 'sqlite://' || /^sqlite:\/\/\/?:memory:$/.test(trimmed)) {
    return { sqliteFilePath: ':memory:' };
  }
  if (trimmed.startsWith('sqlite:///')) {
    return { sqliteFilePath: trimmed.slice('sqlite:///'.length) || ':memory:' };
  }
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)) {
    throw new RegistryError(
      `Unsupported DATABASE_URL scheme: ${trimmed.split(':')[0] ?? ''}`,
      'configuration_error',
      500
    );
  }
  return { sqliteFilePath: trimmed };
}

/**
 * Initialize database connection
 *
 * @param config Database configuration
 * @returns Drizzle database client
 */
export function initializeDatabase(config: DatabaseConfig): DatabaseClient {
  const filePath = config.sqliteFilePath;
  const inMemory = filePath === ':memory:';

  if (!inMemory) {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
  }

  const sqlite = new Database(filePath);

  if (!inMemory) {
    try {
      fs.chmodSync(filePath, 0o600);
    } catch (err) {
      logger.warn({ err }, `[db] Could not set file permissions on ${filePath}`);
    }
    if (config.enableWAL !== false) {
      sqlite.pragma('journal_mode = WAL');
      logger.debug('[db] SQLite WAL mode enabled');
    }
  }

  // SQLite default is OFF
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');
  sqlite.pragma('synchronous = NORMAL');

  const db = drizzle(sqlite, { schema });
  connections.set(db, sqlite);

  logger.info(`[db] SQLite initialized: ${inMemory ? ':memory:' : filePath}`);
  return db;
}

function connectionOf(db: DatabaseClient): Database.Database {
  const sqlite = connections.get(db);
  if (!sqlite) {
    throw new RegistryError('Database client was not created by initializeDatabase', 'db_unknown_client', 500);
  }
  return sqlite;
}

/**
 * Run database migrations
 *
 * Executes packages/core/drizzle/*.sql in lexicographic order. Statements are
 * idempotent, so re-running is safe.
 */
export function runMigrations(db: DatabaseClient): void {
  const migrationsDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../drizzle');

  if (!fs.existsSync(migrationsDir)) {
    logger.warn(`[db] Migrations directory not found: ${migrationsDir}`);
    return;
  }

  const files = fs
    .readdirSync(migrationsDir)
    .filter(f => f.endsWith('.sql'))
    .sort();

  const sqlite = connectionOf(db);
  for (const file of files) {
    const sqlContent = fs.readFileSync(path.join(migrationsDir, file), 'utf-8');
    try {
      sqlite.exec(sqlContent);
      logger.debug(`[db] Migration applied: ${file}`);
    } catch (err) {
      logger.error({ err }, `[db] Migration failed: ${file}`);
      throw err;
    }
  }

  logger.info(`[db] All migrations complete (${files.length} files)`);
}

/**
 * Close database connection
 */
export function closeDatabase(db: DatabaseClient): void {
  const sqlite = connections.get(db);
  if (!sqlite || !sqlite.open) return;
  try {
    sqlite.close();
    logger.debug('[db] SQLite connection closed');
  } catch (err) {
    logger.warn({ err }, '[db] Error closing database connection');
  }
}

/**
 * Health check - verify database connectivity
 *
 * @returns true if healthy, false otherwise
 */
export function checkDatabaseHealth(db: DatabaseClient): boolean {
  try {
    connectionOf(db).prepare('SELECT 1').get();
    return true;
  } catch (err) {
    logger.error({ err }, '[db] Health check failed');
    return false;
  }
}
