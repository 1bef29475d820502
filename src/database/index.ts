/**
 * Database Module
 *
 * SQLite storage for indexed filings and their chunk vectors.
 *
 * @example
 * ```ts
 * import { getDatabase, runMigrations } from './database/index.js';
 *
 * runMigrations();
 * const source = getDatabase().getSource('filing-10k');
 * ```
 */

export { getDb, closeDb, getDbPath, configureConnection } from './connection.js';

export {
  runMigrations,
  applyMigrations,
  getMigrationCount,
  resetMigrationState,
  type MigrationResult,
} from './migrate.js';

export {
  SourceRowSchema,
  ChunkRowSchema,
  SchemaValidationError,
  validateRow,
  validateRows,
  type SourceRow,
  type ChunkRow,
} from './validation.js';

export {
  getDatabase,
  resetDatabase,
  DatabaseOperations,
  embeddingToBlob,
  blobToEmbedding,
  type PageStrategy,
  type SourceWriteInput,
  type ChunkWriteInput,
  type SourceRecord,
  type StoredChunk,
} from './operations.js';
