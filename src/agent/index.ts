/**
 * Agent Module
 *
 * Question answering over one 10-K filing plus live web search.
 *
 * PIPELINE:
 * 1. ToolRouter picks document_qa, web_search or both from keywords
 * 2. Each selected tool runs in turn and returns cited passages
 * 3. Synthesizer asks the model for an answer that cites those passages
 *
 * @example
 * ```typescript
 * import { createResearchAgent } from './agent/index.js';
 * import { loadConfig } from './config/index.js';
 *
 * const agent = createResearchAgent(loadConfig());
 * const answer = await agent.ask("How does the gross margin compare to Microsoft's current margin?");
 *
 * console.log(answer.text);
 * for (const citation of answer.citations) {
 *   console.log(citation.sourceType === 'document' ? citation.section : citation.url);
 * }
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Core Factories
// ============================================================================

export {
  createResearchAgent,
  createDocumentIndexer,
  createRetriever,
  createToolRouter,
  type ResearchAgentFactoryOptions,
  type IndexerFactoryOptions,
  type RetrieverFactoryOptions,
} from './factory.js';

export { ResearchAgent, classifyToolError, type AgentAnswer, type ResearchAgentOptions } from './research-agent.js';

// ============================================================================
// Routing & Synthesis
// ============================================================================

export {
  ToolRouter,
  describePlan,
  loadDefaultKeywords,
  type RoutingDecision,
  type RoutingRule,
  type RoutingKeywords,
  type KeywordCategory,
  type ToolRouterConfig,
} from './tool-router.js';

export {
  Synthesizer,
  tagPassages,
  evidenceOf,
  buildContext,
  NOT_FOUND_ANSWER,
  type FinalAnswer,
  type SynthesizerOptions,
  type TaggedPassage,
} from './synthesizer.js';

export { SYNTHESIS_SYSTEM_PROMPT, buildSynthesisPrompt } from './prompts.js';

export {
  mergeCitations,
  citationKey,
  formatCitation,
  formatCitations,
  formatCitationsJSON,
  type CitationFormatOptions,
  type CitationJSON,
  type CitationsOutputJSON,
} from './citations.js';

// ============================================================================
// Tools & Errors
// ============================================================================

export * from './tools/index.js';
export { SynthesisUnavailableError, AllToolsFailedError } from './errors.js';
