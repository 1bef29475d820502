/**
 * Retrieval Result Formatter
 *
 * Text and JSON renderings of retrieval results for `fra search`.
 *
 * @example
 * ```typescript
 * formatResult(result);
 * // [0.42] #1 Risk Factors, p. 12 (chunk 37)
 * //   Our operations depend on a limited number of suppliers...
 * ```
 */

import type { RetrievalResult, RetrievalResultJSON } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Default maximum snippet length in characters */
const DEFAULT_SNIPPET_LENGTH = 200;

/** Indent for snippet content in text output */
const SNIPPET_INDENT = '  ';

export interface FormatOptions {
  /** Snippet length in characters */
  snippetLength?: number;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Format a similarity score as a 2-decimal string.
 *
 * @example
 * ```typescript
 * formatScore(0.9234)  // "0.92"
 * formatScore(1)       // "1.00"
 * ```
 */
export function formatScore(score: number): string {
  return score.toFixed(2);
}

/**
 * Collapse whitespace and cut at `maxLength` with an ellipsis.
 *
 * @example
 * ```typescript
 * truncateSnippet("Hello world", 5)  // "Hello..."
 * ```
 */
export function truncateSnippet(content: string, maxLength: number = DEFAULT_SNIPPET_LENGTH): string {
  const normalized = content.replace(/\s+/g, ' ').trim();

  if (normalized.length <= maxLength) {
    return normalized;
  }

  return normalized.slice(0, maxLength) + '...';
}

// ============================================================================
// Text Formatting Functions
// ============================================================================

export function formatResult(result: RetrievalResult, options: FormatOptions = {}): string {
  const { chunk } = result;
  const header = `[${formatScore(result.score)}] #${result.rank} ${chunk.section}, p. ${chunk.page} (chunk ${chunk.chunkIndex})`;
  return `${header}\n${SNIPPET_INDENT}${truncateSnippet(chunk.text, options.snippetLength)}`;
}

/**
 * Results separated by blank lines; '' for none.
 */
export function formatResults(results: RetrievalResult[], options: FormatOptions = {}): string {
  return results.map((result) => formatResult(result, options)).join('\n\n');
}

// ============================================================================
// JSON Formatting Functions
// ============================================================================

export function formatResultJSON(result: RetrievalResult): RetrievalResultJSON {
  return {
    rank: result.rank,
    score: result.score,
    chunkIndex: result.chunk.chunkIndex,
    section: result.chunk.section,
    page: result.chunk.page,
    content: result.chunk.text,
  };
}

export function formatResultsJSON(results: RetrievalResult[]): RetrievalResultJSON[] {
  return results.map(formatResultJSON);
}
