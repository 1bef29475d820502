/**
 * Database Migration Runner
 *
 * Applies embedded SQL migrations in order, tracking them in _migrations.
 * Safe to run on every start.
 */

import type Database from 'better-sqlite3';
import { getDb } from './connection.js';

/**
 * Result of running migrations.
 */
export interface MigrationResult {
  /** Names of migrations applied by this call */
  applied: string[];
  /** Migrations that failed with their error messages */
  failed: Array<{ name: string; error: string }>;
}

// SQL is embedded so the built CLI needs no migration files on disk
const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: '001-initial.sql',
    sql: `
-- One row per indexed filing
CREATE TABLE IF NOT EXISTS sources (
  source_id TEXT PRIMARY KEY,
  document_path TEXT,
  content_hash TEXT NOT NULL,
  embedding_model TEXT NOT NULL,
  embedding_dimensions INTEGER NOT NULL,
  chunk_count INTEGER NOT NULL DEFAULT 0,
  page_count INTEGER NOT NULL DEFAULT 0,
  page_strategy TEXT NOT NULL,
  indexed_at TEXT NOT NULL
);

-- Chunks and their vectors, replaced as a whole on rebuild
CREATE TABLE IF NOT EXISTS chunks (
  source_id TEXT NOT NULL REFERENCES sources(source_id) ON DELETE CASCADE,
  chunk_index INTEGER NOT NULL,
  content TEXT NOT NULL,
  section TEXT NOT NULL,
  page INTEGER NOT NULL,
  word_start INTEGER NOT NULL,
  word_end INTEGER NOT NULL,
  embedding BLOB NOT NULL,
  PRIMARY KEY (source_id, chunk_index)
);
`,
  },
];

/** Set once migrations succeeded against the singleton connection */
let initialized = false;

function toMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Apply pending migrations to a specific connection.
 * Tests call this with an in-memory database.
 */
export function applyMigrations(db: Database.Database): MigrationResult {
  const applied: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const done = new Set(
    db
      .prepare<[], { name: string }>('SELECT name FROM _migrations')
      .all()
      .map((row) => row.name)
  );

  for (const migration of MIGRATIONS) {
    if (done.has(migration.name)) continue;

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();
      applied.push(migration.name);
    } catch (error) {
      failed.push({ name: migration.name, error: toMessage(error) });
    }
  }

  return { applied, failed };
}

/**
 * Run migrations against the shared connection, once per process.
 */
export function runMigrations(): MigrationResult {
  if (initialized) {
    return { applied: [], failed: [] };
  }

  const result = applyMigrations(getDb());
  // Failures are retried on the next call
  initialized = result.failed.length === 0;
  return result;
}

/**
 * Number of migrations defined in code.
 */
export function getMigrationCount(): number {
  return MIGRATIONS.length;
}

/**
 * Reset migration state for testing.
 *
 * @internal
 */
export function resetMigrationState(): void {
  initialized = false;
}
