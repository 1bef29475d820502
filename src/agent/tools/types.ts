/**
 * Tool Types
 *
 * The two evidence tools (10-K retrieval and live web search) return the
 * same ToolResult shape, so the synthesizer treats them uniformly.
 */

/** Evidence tools the router can select */
export type ToolName = 'document_qa' | 'web_search';

/** Fixed execution order when both tools are selected */
export const TOOL_ORDER: readonly ToolName[] = ['document_qa', 'web_search'];

/**
 * Where a piece of evidence came from.
 */
export type Citation = DocumentCitation | WebCitation;

export interface DocumentCitation {
  sourceType: 'document';
  section: string;
  page: number;
}

export interface WebCitation {
  sourceType: 'web';
  url: string;
  title?: string;
}

/**
 * One passage of evidence with its own provenance.
 */
export interface EvidencePassage {
  text: string;
  citation: Citation;
  /** Similarity score for document passages */
  score?: number;
}

/**
 * What a tool hands to the synthesizer.
 */
export interface ToolResult {
  tool: ToolName;
  /** Short answer fragment from this tool alone */
  answerText: string;
  citations: Citation[];
  passages: EvidencePassage[];
}

/**
 * Why a selected tool produced no result.
 *
 * - document_unavailable: no index, or the index could not be read
 * - external_search_unavailable: live search exhausted its retries
 * - tool_failed: anything else
 */
export type ToolErrorKind = 'document_unavailable' | 'external_search_unavailable' | 'tool_failed';

/**
 * One tool call made while answering a question.
 */
export interface ToolInvocation {
  toolName: ToolName;
  query: string;
  result?: ToolResult;
  error?: ToolErrorKind;
  /** Message of the underlying error, for --verbose and JSON output */
  errorMessage?: string;
  durationMs: number;
}

/**
 * Anything the orchestrator can run as a tool.
 */
export interface EvidenceTool {
  readonly name: ToolName;
  run(query: string): Promise<ToolResult>;
}
