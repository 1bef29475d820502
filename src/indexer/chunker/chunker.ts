/**
 * Chunker
 *
 * Splits a parsed filing into fixed-size word windows with a fixed overlap.
 * Each chunk takes the section covering most of its words (ties go to the
 * section that appears first in the chunk) and the page of its first word.
 * The last window always ends at the last word.
 */

import type { Chunk, ParsedDocument } from '../types.js';
import { CHUNK_CONFIG, validateChunkConfig, type ChunkConfig } from './config.js';

interface Word {
  text: string;
  section: string;
  page: number;
}

/**
 * Flatten blocks into the document's word sequence.
 */
export function toWords(document: ParsedDocument): Word[] {
  const words: Word[] = [];
  for (const block of document.blocks) {
    for (const text of block.text.split(' ')) {
      if (text.length > 0) {
        words.push({ text, section: block.section, page: block.page });
      }
    }
  }
  return words;
}

/**
 * Section with the most words in the span; earliest wins a tie.
 */
function majoritySection(words: Word[]): string {
  const counts = new Map<string, number>();
  for (const word of words) {
    counts.set(word.section, (counts.get(word.section) ?? 0) + 1);
  }

  let best = '';
  let bestCount = 0;
  // Map iteration follows insertion order, i.e. first appearance
  for (const [section, count] of counts) {
    if (count > bestCount) {
      best = section;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Chunk a parsed document.
 *
 * @example
 * ```typescript
 * const chunks = chunkDocument(parseFilingHtml(html), 'acme-2023', { chunkSize: 500, chunkOverlap: 100 });
 * chunks[1].wordStart; // 400
 * ```
 */
export function chunkDocument(
  document: ParsedDocument,
  sourceId: string,
  config: ChunkConfig = CHUNK_CONFIG
): Chunk[] {
  const { chunkSize, chunkOverlap } = validateChunkConfig(config);
  const step = chunkSize - chunkOverlap;
  const words = toWords(document);
  const chunks: Chunk[] = [];

  for (let start = 0; start < words.length; start += step) {
    const end = Math.min(start + chunkSize, words.length);
    const span = words.slice(start, end);
    const first = span[0];
    if (!first) break;

    chunks.push({
      text: span.map((word) => word.text).join(' '),
      section: majoritySection(span),
      page: first.page,
      chunkIndex: chunks.length,
      sourceId,
      wordStart: start,
      wordEnd: end,
    });

    if (end === words.length) break;
  }

  return chunks;
}
