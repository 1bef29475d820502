/**
 * Chunker Module
 *
 * Word-window chunking for parsed filings.
 */

export { chunkDocument, toWords } from './chunker.js';
export { CHUNK_CONFIG, validateChunkConfig, type ChunkConfig } from './config.js';
