/**
 * Research Agent
 *
 * The single entry point for answering a question:
 *
 *   route → run each selected tool in order → synthesize
 *
 * A tool that fails is recorded on its invocation and the answer is built
 * from the tools that worked, with a note naming each missing source.
 * Only when every selected tool fails does ask() reject.
 *
 * @example
 * ```typescript
 * const agent = new ResearchAgent({ router, tools, synthesizer });
 * const answer = await agent.ask("How does the gross margin compare to Microsoft's?");
 * console.log(answer.plan);   // "Plan: (1) Query 10-K ... (3) Synthesize both sources"
 * console.log(answer.text);
 * ```
 */

import { DatabaseError, IndexNotBuiltError, ValidationError } from '../errors/index.js';
import { EmbeddingMismatchError } from '../search/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { FinalAnswer, Synthesizer } from './synthesizer.js';
import { describePlan, type RoutingDecision, type ToolRouter } from './tool-router.js';
import { ExternalSearchUnavailableError } from './tools/errors.js';
import { AllToolsFailedError } from './errors.js';
import {
  TOOL_ORDER,
  type EvidenceTool,
  type ToolErrorKind,
  type ToolInvocation,
  type ToolName,
  type ToolResult,
} from './tools/types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface AgentAnswer extends FinalAnswer {
  query: string;
  routing: RoutingDecision;
  plan: string;
  /** Tools that returned a result, in execution order */
  toolsUsed: ToolName[];
  /** Selected tools that failed or were disabled */
  unavailableTools: ToolName[];
  invocations: ToolInvocation[];
  /** Degradation notes, also appended to text */
  notes: string[];
  durationMs: number;
}

export interface ResearchAgentOptions {
  router: ToolRouter;
  /** Registered tools; a routed tool missing here counts as unavailable */
  tools: Partial<Record<ToolName, EvidenceTool>>;
  synthesizer: Synthesizer;
  logger?: Logger;
}

// ============================================================================
// CONSTANTS
// ============================================================================

const DEGRADED_NOTES: Record<ToolName, string> = {
  document_qa: 'Note: the 10-K filing index was unavailable, so this answer relies on live web data only.',
  web_search: 'Note: live web data was unavailable, so this answer relies on the 10-K filing only.',
};

const DISABLED_MESSAGES: Record<ToolName, string> = {
  document_qa: 'Document search is not configured',
  web_search: 'Live web search is disabled',
};

/**
 * Map a tool's error to the kind recorded on its invocation.
 */
export function classifyToolError(tool: ToolName, error: unknown): ToolErrorKind {
  if (tool === 'document_qa') {
    if (
      error instanceof IndexNotBuiltError ||
      error instanceof EmbeddingMismatchError ||
      error instanceof DatabaseError
    ) {
      return 'document_unavailable';
    }
    return 'tool_failed';
  }
  return error instanceof ExternalSearchUnavailableError ? 'external_search_unavailable' : 'tool_failed';
}

function unavailableKind(tool: ToolName): ToolErrorKind {
  return tool === 'document_qa' ? 'document_unavailable' : 'external_search_unavailable';
}

// ============================================================================
// ResearchAgent
// ============================================================================

export class ResearchAgent {
  private readonly router: ToolRouter;
  private readonly tools: Partial<Record<ToolName, EvidenceTool>>;
  private readonly synthesizer: Synthesizer;
  private readonly logger: Logger;

  constructor(options: ResearchAgentOptions) {
    this.router = options.router;
    this.tools = options.tools;
    this.synthesizer = options.synthesizer;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Route without running anything.
   */
  plan(query: string): { routing: RoutingDecision; plan: string } {
    const routing = this.router.route(query);
    return { routing, plan: describePlan(routing) };
  }

  /**
   * Answer a question.
   *
   * @throws ValidationError if the question is blank
   * @throws AllToolsFailedError if no selected tool produced a result
   * @throws SynthesisUnavailableError if the model could not be reached
   */
  async ask(query: string): Promise<AgentAnswer> {
    const question = query.trim();
    if (question === '') {
      throw new ValidationError('Question cannot be empty', ['Ask about the filing, e.g. "What are the main risk factors?"']);
    }

    const startTime = performance.now();
    const { routing, plan } = this.plan(question);
    this.logger.debug?.(`Routing rule "${routing.rule}" selected: ${routing.tools.join(', ')}`);

    const invocations: ToolInvocation[] = [];
    const results: ToolResult[] = [];
    const ordered = TOOL_ORDER.filter((tool) => routing.tools.includes(tool));

    // One tool at a time, filing first
    for (const toolName of ordered) {
      const invocation = await this.invoke(toolName, question);
      invocations.push(invocation);
      if (invocation.result) {
        results.push(invocation.result);
      }
    }

    const failed = invocations.filter((inv) => inv.result === undefined);
    if (results.length === 0) {
      throw new AllToolsFailedError(invocations);
    }

    const answer = await this.synthesizer.synthesize(question, results);
    const notes = failed.map((inv) => DEGRADED_NOTES[inv.toolName]);
    const text = notes.length > 0 ? `${answer.text}\n\n${notes.join('\n')}` : answer.text;

    return {
      ...answer,
      text,
      query: question,
      routing,
      plan,
      toolsUsed: results.map((r) => r.tool),
      unavailableTools: failed.map((inv) => inv.toolName),
      invocations,
      notes,
      durationMs: performance.now() - startTime,
    };
  }

  private async invoke(toolName: ToolName, query: string): Promise<ToolInvocation> {
    const tool = this.tools[toolName];
    const start = performance.now();

    if (tool === undefined) {
      this.logger.debug?.(`${toolName}: ${DISABLED_MESSAGES[toolName]}`);
      return { toolName, query, error: unavailableKind(toolName), errorMessage: DISABLED_MESSAGES[toolName], durationMs: 0 };
    }

    try {
      const result = await tool.run(query);
      return { toolName, query, result, durationMs: performance.now() - start };
    } catch (error) {
      const kind = classifyToolError(toolName, error);
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`${toolName} failed: ${message}`);
      return { toolName, query, error: kind, errorMessage: message, durationMs: performance.now() - start };
    }
  }
}
