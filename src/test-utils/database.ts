/**
 * In-memory database for tests.
 */

import Database from 'better-sqlite3';
import { applyMigrations, configureConnection, DatabaseOperations } from '../database/index.js';

export interface TestDatabase {
  db: Database.Database;
  ops: DatabaseOperations;
}

/**
 * A migrated `:memory:` database. Close `db` in afterEach.
 *
 * @internal
 */
export function createTestDatabase(): TestDatabase {
  const db = configureConnection(new Database(':memory:'));
  const result = applyMigrations(db);
  if (result.failed.length > 0) {
    throw new Error(`Test migrations failed: ${result.failed.map((f) => f.error).join('; ')}`);
  }
  return { db, ops: new DatabaseOperations(db) };
}
