/**
 * Citation Formatter
 *
 * Merges citations from several tool results and renders them for the
 * terminal and for --json output.
 *
 * @example
 * ```typescript
 * const citations = mergeCitations(toolResults);
 * console.log(formatCitations(citations));
 * // [1] 10-K, Risk Factors, p. 14
 * // [2] Quarterly results (https://example.com/msft)
 * ```
 *
 * @packageDocumentation
 */

import type { Citation, ToolResult } from './tools/types.js';

// ============================================================================
// TYPE DEFINITIONS
// ============================================================================

export interface CitationFormatOptions {
  /** Maximum number of citations to display (default: unlimited) */
  limit?: number;

  /** Show "...and N more" when truncated (default: true) */
  showTruncationHint?: boolean;
}

/**
 * JSON output for a single citation: the citation plus its display index.
 */
export type CitationJSON = Citation & { index: number };

export interface CitationsOutputJSON {
  count: number;
  citations: CitationJSON[];
}

// ============================================================================
// MERGING
// ============================================================================

/**
 * Identity of a citation: section+page for the filing, URL for the web.
 */
export function citationKey(citation: Citation): string {
  return citation.sourceType === 'document'
    ? `document:${citation.section}\u0000${citation.page}`
    : `web:${citation.url}`;
}

/**
 * Union of the citations of every result, without duplicates.
 *
 * Document citations come before web citations; within each source the
 * order of first appearance is kept. A web citation seen first without a
 * title takes the title of a later duplicate.
 */
export function mergeCitations(results: ToolResult[]): Citation[] {
  const all = results.flatMap((result) => result.citations);
  const ordered = [
    ...all.filter((c) => c.sourceType === 'document'),
    ...all.filter((c) => c.sourceType === 'web'),
  ];

  const merged = new Map<string, Citation>();
  for (const citation of ordered) {
    const key = citationKey(citation);
    const existing = merged.get(key);
    if (existing === undefined) {
      merged.set(key, { ...citation });
    } else if (existing.sourceType === 'web' && citation.sourceType === 'web' && !existing.title && citation.title) {
      existing.title = citation.title;
    }
  }
  return [...merged.values()];
}

// ============================================================================
// TEXT FORMATTING
// ============================================================================

/**
 * @example
 * ```typescript
 * formatCitation({ sourceType: 'document', section: 'MD&A', page: 31 }, 1);
 * // "[1] 10-K, MD&A, p. 31"
 * formatCitation({ sourceType: 'web', url: 'https://example.com' }, 2);
 * // "[2] https://example.com"
 * ```
 */
export function formatCitation(citation: Citation, index: number): string {
  if (citation.sourceType === 'document') {
    return `[${index}] 10-K, ${citation.section}, p. ${citation.page}`;
  }
  return citation.title ? `[${index}] ${citation.title} (${citation.url})` : `[${index}] ${citation.url}`;
}

export function formatCitations(citations: Citation[], options: CitationFormatOptions = {}): string {
  if (citations.length === 0) {
    return '';
  }

  const limit = options.limit && options.limit > 0 ? options.limit : citations.length;
  const shown = citations.slice(0, limit);
  const lines = shown.map((citation, i) => formatCitation(citation, i + 1));

  const truncated = citations.length - shown.length;
  if (truncated > 0 && (options.showTruncationHint ?? true)) {
    lines.push(`...and ${truncated} more`);
  }

  return lines.join('\n');
}

// ============================================================================
// JSON FORMATTING
// ============================================================================

export function formatCitationsJSON(citations: Citation[]): CitationsOutputJSON {
  return {
    count: citations.length,
    citations: citations.map((citation, i) => ({ index: i + 1, ...citation })),
  };
}
