/**
 * Document Indexer
 *
 * Builds, persists and loads the searchable index of one filing:
 * Parse → Chunk → Embed → Store → Swap
 *
 * A build does all of its parsing, chunking and embedding in memory
 * first. Only then are the source's rows replaced in a single SQLite
 * transaction, and only after that commits is the in-memory snapshot the
 * Retriever reads swapped. A build that fails at any step leaves both the
 * stored rows and the live snapshot as they were.
 *
 * Builds and loads for the same sourceId run one at a time.
 */

import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';

import { DatabaseError, DocumentNotFoundError, DocumentParseError, IndexNotBuiltError, ValidationError } from '../errors/index.js';
import type { DatabaseOperations } from '../database/index.js';
import { EmbeddingMismatchError } from '../search/errors.js';
import { VectorIndex } from '../search/store.js';
import { consoleLogger, type Logger } from '../utils/logger.js';
import { chunkDocument, CHUNK_CONFIG, validateChunkConfig, type ChunkConfig } from './chunker/index.js';
import { embedChunks, type EmbedderOptions, type EmbeddingProvider } from './embedder/index.js';
import { parseFilingHtml, DEFAULT_CHARS_PER_PAGE } from './parser/html-parser.js';
import type { Chunk, EmbeddingRecord, IndexProgress, IndexSummary, ParsedDocument } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface DocumentIndexerOptions {
  /** Embedding provider shared with the Retriever */
  provider: EmbeddingProvider;

  /** Storage for sources and chunks */
  db: DatabaseOperations;

  /** Word window settings */
  chunkConfig?: ChunkConfig;

  /**
   * Page length estimate when the filing has no page-break markers.
   * @default 3000
   */
  charsPerPage?: number;

  /**
   * Fewest extracted words accepted as a filing.
   * @default 100
   */
  minWords?: number;

  /** Batching, timeout and retry for the embedding step */
  embedding?: Omit<EmbedderOptions, 'onProgress'>;

  /** Fired as each phase advances */
  onProgress?: (progress: IndexProgress) => void;

  logger?: Logger;
}

export interface BuildMetadata {
  /** Where the document was read from, stored for `fra status` */
  documentPath?: string;
  /** sha256 of the raw document; computed when omitted */
  contentHash?: string;
}

export interface EnsureIndexOptions {
  /** Rebuild even when the stored index is current */
  force?: boolean;
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const DEFAULT_MIN_WORDS = 100;

// ============================================================================
// HELPERS
// ============================================================================

/**
 * sha256 of a document's raw text, hex encoded.
 */
export function hashContent(content: string): string {
  return createHash('sha256').update(content, 'utf-8').digest('hex');
}

function assertSourceId(sourceId: string): void {
  if (sourceId.trim().length === 0) {
    throw new ValidationError('Invalid source id', ['sourceId must not be empty']);
  }
}

/**
 * Read a document, mapping a missing file to DocumentNotFoundError.
 */
async function readDocument(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'EISDIR')) {
      throw new DocumentNotFoundError(path);
    }
    throw error;
  }
}

/** Section labels in order of first appearance among the chunks */
function sectionsOf(chunks: Chunk[]): string[] {
  return [...new Set(chunks.map((chunk) => chunk.section))];
}

// ============================================================================
// INDEXER
// ============================================================================

/**
 * @example
 * ```typescript
 * const indexer = new DocumentIndexer({
 *   provider: createEmbeddingProvider(config.embedding),
 *   db: getDatabase(),
 * });
 * const summary = await indexer.ensureIndex('data/filing-10k.htm', 'filing-10k');
 * console.log(`${summary.chunkCount} chunks, cached: ${summary.cached}`);
 * ```
 */
export class DocumentIndexer {
  private readonly provider: EmbeddingProvider;
  private readonly db: DatabaseOperations;
  private readonly chunkConfig: ChunkConfig;
  private readonly charsPerPage: number;
  private readonly minWords: number;
  private readonly embedding: Omit<EmbedderOptions, 'onProgress'>;
  private readonly onProgress?: (progress: IndexProgress) => void;
  private readonly logger: Logger;

  /** Live snapshots by sourceId; replaced whole, never mutated */
  private readonly snapshots = new Map<string, VectorIndex>();

  /** Tail of the pending work chain per sourceId */
  private readonly locks = new Map<string, Promise<void>>();

  constructor(options: DocumentIndexerOptions) {
    this.provider = options.provider;
    this.db = options.db;
    this.chunkConfig = validateChunkConfig(options.chunkConfig ?? CHUNK_CONFIG);
    this.charsPerPage = options.charsPerPage ?? DEFAULT_CHARS_PER_PAGE;
    this.minWords = options.minWords ?? DEFAULT_MIN_WORDS;
    this.embedding = options.embedding ?? {};
    this.onProgress = options.onProgress;
    this.logger = options.logger ?? consoleLogger;
  }

  get embeddingProvider(): EmbeddingProvider {
    return this.provider;
  }

  /**
   * The snapshot queries currently read, if one is loaded.
   */
  getSnapshot(sourceId: string): VectorIndex | undefined {
    return this.snapshots.get(sourceId);
  }

  /**
   * The loaded snapshot, loading it from storage on first use.
   *
   * @throws IndexNotBuiltError if the source was never indexed
   */
  async getOrLoadSnapshot(sourceId: string): Promise<VectorIndex> {
    const current = this.snapshots.get(sourceId);
    if (current) return current;

    await this.loadIndex(sourceId);
    const loaded = this.snapshots.get(sourceId);
    if (!loaded) {
      throw new IndexNotBuiltError(sourceId);
    }
    return loaded;
  }

  /**
   * Index raw filing HTML under `sourceId`, replacing anything stored for it.
   *
   * @throws DocumentParseError if fewer than minWords words were extracted
   * @throws EmbeddingError if embedding fails
   * @throws DatabaseError if the rows can't be written
   */
  async buildIndex(rawDocument: string, sourceId: string, metadata: BuildMetadata = {}): Promise<IndexSummary> {
    assertSourceId(sourceId);
    return this.withSourceLock(sourceId, () => this.build(rawDocument, sourceId, metadata));
  }

  /**
   * Read a filing from disk and index it.
   *
   * @throws DocumentNotFoundError if the file doesn't exist
   */
  async buildIndexFromFile(path: string, sourceId: string): Promise<IndexSummary> {
    const content = await readDocument(path);
    return this.buildIndex(content, sourceId, { documentPath: path, contentHash: hashContent(content) });
  }

  /**
   * Load a persisted index into memory without parsing or embedding.
   *
   * @throws IndexNotBuiltError if nothing is stored for the source
   * @throws EmbeddingMismatchError if it was built with another embedding model
   */
  async loadIndex(sourceId: string): Promise<IndexSummary> {
    assertSourceId(sourceId);
    return this.withSourceLock(sourceId, async () => this.load(sourceId));
  }

  /**
   * Load the stored index when it matches the file's content and the
   * configured embedding model; build it otherwise.
   */
  async ensureIndex(path: string, sourceId: string, options: EnsureIndexOptions = {}): Promise<IndexSummary> {
    assertSourceId(sourceId);
    const content = await readDocument(path);
    const contentHash = hashContent(content);

    if (!options.force) {
      const stored = this.db.getSource(sourceId);
      if (stored && stored.contentHash === contentHash && stored.embeddingModel === this.provider.id) {
        this.logger.debug?.(`Index for "${sourceId}" is current; loading from storage`);
        return this.loadIndex(sourceId);
      }
      if (stored) {
        this.logger.debug?.(
          stored.contentHash !== contentHash
            ? `Document for "${sourceId}" changed; rebuilding`
            : `Embedding model changed (${stored.embeddingModel} -> ${this.provider.id}); rebuilding`
        );
      }
    }

    return this.buildIndex(content, sourceId, { documentPath: path, contentHash });
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  /**
   * Run `task` after every earlier task for the same source has settled.
   */
  private async withSourceLock<T>(sourceId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(sourceId) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(sourceId, tail);

    try {
      return await run;
    } finally {
      if (this.locks.get(sourceId) === tail) {
        this.locks.delete(sourceId);
      }
    }
  }

  private parse(rawDocument: string, sourceId: string): ParsedDocument {
    let parsed: ParsedDocument;
    try {
      parsed = parseFilingHtml(rawDocument, { charsPerPage: this.charsPerPage });
    } catch (error) {
      throw new DocumentParseError(sourceId, error instanceof Error ? error.message : String(error));
    }

    if (parsed.wordCount < this.minWords) {
      throw new DocumentParseError(
        sourceId,
        `extracted ${parsed.wordCount} words, expected at least ${this.minWords}`
      );
    }
    return parsed;
  }

  private async build(rawDocument: string, sourceId: string, metadata: BuildMetadata): Promise<IndexSummary> {
    const startTime = Date.now();

    this.onProgress?.({ phase: 'parsing', processed: 0, total: 1 });
    const parsed = this.parse(rawDocument, sourceId);
    this.onProgress?.({ phase: 'parsing', processed: 1, total: 1 });

    const chunks = chunkDocument(parsed, sourceId, this.chunkConfig);
    this.onProgress?.({ phase: 'chunking', processed: chunks.length, total: chunks.length });
    this.logger.debug?.(`Parsed ${parsed.wordCount} words into ${chunks.length} chunks (${parsed.pageStrategy} pages)`);

    const records = await embedChunks(chunks, this.provider, {
      ...this.embedding,
      onProgress: (processed, total) => this.onProgress?.({ phase: 'embedding', processed, total }),
    });

    this.onProgress?.({ phase: 'storing', processed: 0, total: records.length });
    const dimensions = records[0]?.vector.length ?? 0;
    try {
      this.db.replaceSource(
        {
          sourceId,
          documentPath: metadata.documentPath,
          contentHash: metadata.contentHash ?? hashContent(rawDocument),
          embeddingModel: this.provider.id,
          embeddingDimensions: dimensions,
          pageCount: parsed.pageCount,
          pageStrategy: parsed.pageStrategy,
        },
        records.map(({ chunk, vector }) => ({
          chunkIndex: chunk.chunkIndex,
          content: chunk.text,
          section: chunk.section,
          page: chunk.page,
          wordStart: chunk.wordStart,
          wordEnd: chunk.wordEnd,
          embedding: vector,
        }))
      );
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new DatabaseError(`Could not store index for "${sourceId}": ${cause.message}`, cause);
    }
    this.onProgress?.({ phase: 'storing', processed: records.length, total: records.length });

    this.snapshots.set(sourceId, new VectorIndex(sourceId, this.provider.id, records));

    return {
      sourceId,
      chunkCount: records.length,
      pageCount: parsed.pageCount,
      pageStrategy: parsed.pageStrategy,
      sections: parsed.sections,
      embeddingModel: this.provider.id,
      cached: false,
      durationMs: Date.now() - startTime,
    };
  }

  private load(sourceId: string): IndexSummary {
    const startTime = Date.now();

    const source = this.db.getSource(sourceId);
    if (!source) {
      throw new IndexNotBuiltError(sourceId);
    }
    if (source.embeddingModel !== this.provider.id) {
      throw new EmbeddingMismatchError(sourceId, source.embeddingModel, this.provider.id);
    }

    const records: EmbeddingRecord[] = this.db.getChunks(sourceId).map((stored) => ({
      chunk: {
        text: stored.content,
        section: stored.section,
        page: stored.page,
        chunkIndex: stored.chunkIndex,
        sourceId: stored.sourceId,
        wordStart: stored.wordStart,
        wordEnd: stored.wordEnd,
      },
      vector: stored.embedding,
    }));

    if (records.length !== source.chunkCount) {
      this.logger.warn(
        `Index for "${sourceId}" lists ${source.chunkCount} chunks but ${records.length} are stored. Run: fra index --force`
      );
    }

    this.snapshots.set(sourceId, new VectorIndex(sourceId, source.embeddingModel, records));

    return {
      sourceId,
      chunkCount: records.length,
      pageCount: source.pageCount,
      pageStrategy: source.pageStrategy,
      sections: sectionsOf(records.map((record) => record.chunk)),
      embeddingModel: source.embeddingModel,
      cached: true,
      durationMs: Date.now() - startTime,
    };
  }
}
