/**
 * Chunker Configuration
 *
 * Window and overlap sizes are counted in words. 500-word windows keep a
 * risk factor or an MD&A discussion point together; 100 shared words keep
 * a sentence that straddles a boundary retrievable from either side.
 */

import { ValidationError } from '../../errors/index.js';

export interface ChunkConfig {
  /** Words per chunk */
  chunkSize: number;
  /** Words shared by consecutive chunks; must be below chunkSize */
  chunkOverlap: number;
}

export const CHUNK_CONFIG: ChunkConfig = {
  chunkSize: 500,
  chunkOverlap: 100,
};

/**
 * Check a chunk configuration.
 *
 * @throws ValidationError when the window would not advance
 */
export function validateChunkConfig(config: ChunkConfig): ChunkConfig {
  const issues: string[] = [];
  if (!Number.isInteger(config.chunkSize) || config.chunkSize < 1) {
    issues.push(`chunkSize must be a positive integer (got ${config.chunkSize})`);
  }
  if (!Number.isInteger(config.chunkOverlap) || config.chunkOverlap < 0) {
    issues.push(`chunkOverlap must be a non-negative integer (got ${config.chunkOverlap})`);
  }
  if (config.chunkOverlap >= config.chunkSize) {
    issues.push(`chunkOverlap (${config.chunkOverlap}) must be smaller than chunkSize (${config.chunkSize})`);
  }
  if (issues.length > 0) {
    throw new ValidationError('Invalid chunk configuration', issues);
  }
  return config;
}
