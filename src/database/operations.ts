/**
 * Database Operations
 *
 * Typed reads and writes for the filing index. Handles:
 * - Float32Array <-> BLOB conversion
 * - Row validation on the way out
 * - The single transaction that swaps a source's chunks on rebuild
 */

import { statSync } from 'node:fs';
import type Database from 'better-sqlite3';
import { getDb, getDbPath } from './connection.js';
import {
  SourceRowSchema,
  ChunkRowSchema,
  CountRowSchema,
  validateRow,
  validateRows,
  type SourceRow,
} from './validation.js';

// ============================================================================
// Types
// ============================================================================

export type PageStrategy = SourceRow['page_strategy'];

/**
 * Metadata written alongside a source's chunks.
 */
export interface SourceWriteInput {
  sourceId: string;
  documentPath?: string;
  contentHash: string;
  embeddingModel: string;
  embeddingDimensions: number;
  pageCount: number;
  pageStrategy: PageStrategy;
}

/**
 * One chunk plus its vector, ready to insert.
 */
export interface ChunkWriteInput {
  chunkIndex: number;
  content: string;
  section: string;
  page: number;
  wordStart: number;
  wordEnd: number;
  embedding: Float32Array;
}

/**
 * A source row as the rest of the code sees it.
 */
export interface SourceRecord {
  sourceId: string;
  documentPath: string | null;
  contentHash: string;
  embeddingModel: string;
  embeddingDimensions: number;
  chunkCount: number;
  pageCount: number;
  pageStrategy: PageStrategy;
  indexedAt: string;
}

export interface StoredChunk extends Omit<ChunkWriteInput, 'embedding'> {
  sourceId: string;
  embedding: Float32Array;
}

// ============================================================================
// BLOB helpers
// ============================================================================

/**
 * Convert a Float32Array to a Buffer for BLOB storage.
 * Only the view's own bytes are copied, not the whole backing buffer.
 */
export function embeddingToBlob(embedding: Float32Array): Buffer {
  return Buffer.from(embedding.buffer, embedding.byteOffset, embedding.byteLength);
}

/**
 * Convert a BLOB back to a Float32Array.
 * Copies first: the Buffer's offset may not be 4-byte aligned.
 */
export function blobToEmbedding(blob: Buffer): Float32Array {
  const bytes = new Uint8Array(blob.byteLength);
  bytes.set(blob);
  return new Float32Array(bytes.buffer);
}

function toSourceRecord(row: SourceRow): SourceRecord {
  return {
    sourceId: row.source_id,
    documentPath: row.document_path,
    contentHash: row.content_hash,
    embeddingModel: row.embedding_model,
    embeddingDimensions: row.embedding_dimensions,
    chunkCount: row.chunk_count,
    pageCount: row.page_count,
    pageStrategy: row.page_strategy,
    indexedAt: row.indexed_at,
  };
}

// ============================================================================
// Operations
// ============================================================================

/**
 * High-level database operations wrapper.
 *
 * Takes an explicit connection in tests; defaults to the shared one.
 */
export class DatabaseOperations {
  private readonly db: Database.Database;

  constructor(db?: Database.Database) {
    this.db = db ?? getDb();
  }

  /**
   * Size of the database file in bytes, 0 before it is created.
   */
  getDatabaseSize(): number {
    try {
      return statSync(getDbPath()).size;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return 0;
      }
      throw error;
    }
  }

  getSource(sourceId: string): SourceRecord | undefined {
    const row = this.db.prepare('SELECT * FROM sources WHERE source_id = ?').get(sourceId);
    return row ? toSourceRecord(validateRow(SourceRowSchema, row, `sources.source_id=${sourceId}`)) : undefined;
  }

  listSources(): SourceRecord[] {
    const rows = this.db.prepare('SELECT * FROM sources ORDER BY source_id').all();
    return validateRows(SourceRowSchema, rows, 'sources').map(toSourceRecord);
  }

  countChunks(sourceId: string): number {
    const row = this.db.prepare('SELECT COUNT(*) AS count FROM chunks WHERE source_id = ?').get(sourceId);
    return validateRow(CountRowSchema, row, 'chunks.count').count;
  }

  /**
   * Replace everything stored for a source in one transaction.
   *
   * Readers on other connections see either the old rows or the new ones.
   * If any insert throws, the transaction rolls back and the old rows stay.
   */
  replaceSource(source: SourceWriteInput, chunks: ChunkWriteInput[]): void {
    const deleteChunks = this.db.prepare('DELETE FROM chunks WHERE source_id = ?');
    const upsertSource = this.db.prepare(`
      INSERT INTO sources (
        source_id, document_path, content_hash, embedding_model, embedding_dimensions,
        chunk_count, page_count, page_strategy, indexed_at
      ) VALUES (
        @sourceId, @documentPath, @contentHash, @embeddingModel, @embeddingDimensions,
        @chunkCount, @pageCount, @pageStrategy, @indexedAt
      )
      ON CONFLICT(source_id) DO UPDATE SET
        document_path = excluded.document_path,
        content_hash = excluded.content_hash,
        embedding_model = excluded.embedding_model,
        embedding_dimensions = excluded.embedding_dimensions,
        chunk_count = excluded.chunk_count,
        page_count = excluded.page_count,
        page_strategy = excluded.page_strategy,
        indexed_at = excluded.indexed_at
    `);
    const insertChunk = this.db.prepare(`
      INSERT INTO chunks (source_id, chunk_index, content, section, page, word_start, word_end, embedding)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);

    this.db.transaction(() => {
      deleteChunks.run(source.sourceId);
      upsertSource.run({
        sourceId: source.sourceId,
        documentPath: source.documentPath ?? null,
        contentHash: source.contentHash,
        embeddingModel: source.embeddingModel,
        embeddingDimensions: source.embeddingDimensions,
        chunkCount: chunks.length,
        pageCount: source.pageCount,
        pageStrategy: source.pageStrategy,
        indexedAt: new Date().toISOString(),
      });
      for (const chunk of chunks) {
        insertChunk.run(
          source.sourceId,
          chunk.chunkIndex,
          chunk.content,
          chunk.section,
          chunk.page,
          chunk.wordStart,
          chunk.wordEnd,
          embeddingToBlob(chunk.embedding)
        );
      }
    })();
  }

  /**
   * Load a source's chunks in chunk_index order.
   */
  getChunks(sourceId: string): StoredChunk[] {
    const rows = this.db
      .prepare('SELECT * FROM chunks WHERE source_id = ? ORDER BY chunk_index ASC')
      .all(sourceId);

    return validateRows(ChunkRowSchema, rows, `chunks.source_id=${sourceId}`).map((row) => ({
      sourceId: row.source_id,
      chunkIndex: row.chunk_index,
      content: row.content,
      section: row.section,
      page: row.page,
      wordStart: row.word_start,
      wordEnd: row.word_end,
      embedding: blobToEmbedding(row.embedding),
    }));
  }

  /**
   * Delete a source and (by cascade) its chunks.
   *
   * @returns true if a source row was removed
   */
  deleteSource(sourceId: string): boolean {
    return this.db.prepare('DELETE FROM sources WHERE source_id = ?').run(sourceId).changes > 0;
  }
}

// Lazily created so importing this module doesn't open the database
let dbOpsInstance: DatabaseOperations | null = null;

/**
 * Get the shared DatabaseOperations instance.
 */
export function getDatabase(): DatabaseOperations {
  if (!dbOpsInstance) {
    dbOpsInstance = new DatabaseOperations();
  }
  return dbOpsInstance;
}

/**
 * Reset the shared instance.
 *
 * @internal
 */
export function resetDatabase(): void {
  dbOpsInstance = null;
}
