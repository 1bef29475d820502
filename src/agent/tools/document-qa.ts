/**
 * Document QA Tool
 *
 * Answers from the indexed 10-K: retrieves the top chunks for the question
 * and returns them as evidence passages, each cited by section and page.
 */

import type { Chunk } from '../../indexer/types.js';
import type { RetrievalResult } from '../../search/types.js';
import type { Citation, DocumentCitation, EvidenceTool, EvidencePassage, ToolResult } from './types.js';

/** Characters of each passage quoted in the tool's answer fragment */
const FRAGMENT_LENGTH = 300;

export const NO_DOCUMENT_MATCHES = 'No relevant passages were found in the 10-K filing.';

/**
 * The part of Retriever this tool needs.
 */
export interface ChunkRetriever {
  query(text: string, topK?: number): Promise<RetrievalResult[]>;
}

export interface DocumentQAOptions {
  /** Chunks retrieved per question */
  topK?: number;
}

function toCitation(chunk: Chunk): DocumentCitation {
  return { sourceType: 'document', section: chunk.section, page: chunk.page };
}

function citationKey(citation: DocumentCitation): string {
  return `${citation.section}\u0000${citation.page}`;
}

/**
 * @example
 * ```typescript
 * const tool = new DocumentQATool(retriever, { topK: 5 });
 * const result = await tool.run('What are the main supply chain risks?');
 * result.citations; // [{ sourceType: 'document', section: 'Risk Factors', page: 14 }, ...]
 * ```
 */
export class DocumentQATool implements EvidenceTool {
  readonly name = 'document_qa' as const;

  constructor(
    private readonly retriever: ChunkRetriever,
    private readonly options: DocumentQAOptions = {}
  ) {}

  async run(query: string): Promise<ToolResult> {
    const results = await this.retriever.query(query, this.options.topK);

    const passages: EvidencePassage[] = results.map(({ chunk, score }) => ({
      text: chunk.text,
      citation: toCitation(chunk),
      score,
    }));

    // One citation per (section, page), in rank order
    const seen = new Set<string>();
    const citations: Citation[] = [];
    for (const { chunk } of results) {
      const citation = toCitation(chunk);
      const key = citationKey(citation);
      if (!seen.has(key)) {
        seen.add(key);
        citations.push(citation);
      }
    }

    const answerText =
      results.length === 0
        ? NO_DOCUMENT_MATCHES
        : results
            .map(({ chunk }) => `[${chunk.section}, Page ${chunk.page}]: ${chunk.text.slice(0, FRAGMENT_LENGTH)}`)
            .join('\n\n');

    return { tool: this.name, answerText, citations, passages };
  }
}
