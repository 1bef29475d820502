/**
 * Database Connection Module
 *
 * Provides a singleton SQLite connection using better-sqlite3.
 * The database lives at ~/.fra/index.db unless VECTOR_DB_PATH says otherwise.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { getDbPath } from '../config/paths.js';

// Module-level singleton instance
let db: Database.Database | null = null;

/**
 * Apply the connection pragmas every handle needs.
 */
export function configureConnection(handle: Database.Database): Database.Database {
  // OFF by default in SQLite; chunks cascade from their source row
  handle.pragma('foreign_keys = ON');
  // Readers keep working while an index rebuild commits
  handle.pragma('journal_mode = WAL');
  return handle;
}

/**
 * Get the singleton database instance.
 *
 * Creates the database file and its directory on first call.
 *
 * @example
 * ```ts
 * const db = getDb();
 * const sources = db.prepare('SELECT * FROM sources').all();
 * ```
 */
export function getDb(): Database.Database {
  if (db) {
    return db;
  }

  const dbPath = getDbPath();
  const dir = dirname(dbPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  db = configureConnection(new Database(dbPath));

  process.on('exit', () => closeDb());

  return db;
}

/**
 * Close the database connection.
 * Safe to call multiple times or when no connection exists.
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

export { getDbPath };
