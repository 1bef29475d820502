/**
 * Answer Renderer
 *
 * Shared by `fra ask` and `fra chat`: turns an AgentAnswer (or the evidence
 * left over when synthesis failed) into terminal lines or a JSON object.
 * Rendering returns lines instead of printing so it can be tested directly.
 */

import chalk from 'chalk';
import { formatCitations, formatCitationsJSON, type CitationJSON } from '../../agent/citations.js';
import type { SynthesisUnavailableError } from '../../agent/errors.js';
import type { AgentAnswer } from '../../agent/research-agent.js';
import type { RoutingRule } from '../../agent/tool-router.js';
import type { ToolName } from '../../agent/tools/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * JSON output for one answered question.
 */
export interface AnswerJSON {
  question: string;
  plan: string;
  answer: string;
  evidenceFound: boolean;
  sources: CitationJSON[];
  routing: {
    rule: RoutingRule;
    tools: ToolName[];
    matchedKeywords: Record<ToolName, string[]>;
  };
  toolsUsed: ToolName[];
  unavailableTools: ToolName[];
  notes: string[];
  metadata: {
    totalMs: number;
    tools: Array<{ tool: ToolName; durationMs: number; error?: string }>;
  };
}

/**
 * JSON output when the model failed but tools returned evidence.
 */
export interface EvidenceJSON {
  error: string;
  evidence: Array<{ tool: ToolName; answerText: string }>;
  sources: CitationJSON[];
}

export interface RenderOptions {
  verbose?: boolean;
}

// ============================================================================
// Text
// ============================================================================

/**
 * @example
 * ```
 * Plan: Query the 10-K filing for requested information
 *
 * Supply constraints are the main risk [S1].
 *
 * Sources:
 *   [1] 10-K, Risk Factors, p. 14
 *
 * Tools used: document_qa
 * ```
 */
export function renderAnswer(answer: AgentAnswer, options: RenderOptions = {}): string[] {
  const lines: string[] = [chalk.dim(answer.plan), '', answer.text];

  if (answer.citations.length > 0) {
    lines.push('');
    lines.push(chalk.bold('Sources:'));
    lines.push(indent(formatCitations(answer.citations)));
  }

  lines.push('');
  lines.push(chalk.dim(`Tools used: ${answer.toolsUsed.join(', ')}`));

  if (options.verbose) {
    for (const invocation of answer.invocations) {
      const status = invocation.result ? 'ok' : `${invocation.error ?? 'failed'}: ${invocation.errorMessage ?? ''}`;
      lines.push(chalk.dim(`  ${invocation.toolName} ${invocation.durationMs.toFixed(0)}ms (${status})`));
    }
    lines.push(chalk.dim(`Total: ${answer.durationMs.toFixed(0)}ms`));
  }

  return lines;
}

/**
 * What the tools found, for when no answer could be written from it.
 */
export function renderEvidence(error: SynthesisUnavailableError): string[] {
  const lines: string[] = [chalk.yellow('The answer could not be written, but this evidence was found:')];

  for (const result of error.toolResults) {
    lines.push('');
    lines.push(chalk.bold(`${result.tool}:`));
    lines.push(indent(result.answerText));
  }

  if (error.citations.length > 0) {
    lines.push('');
    lines.push(chalk.bold('Sources:'));
    lines.push(indent(formatCitations(error.citations)));
  }

  return lines;
}

function indent(text: string): string {
  return text
    .split('\n')
    .map((line) => `  ${line}`)
    .join('\n');
}

// ============================================================================
// JSON
// ============================================================================

export function answerToJSON(answer: AgentAnswer): AnswerJSON {
  return {
    question: answer.query,
    plan: answer.plan,
    answer: answer.text,
    evidenceFound: answer.evidenceFound,
    sources: formatCitationsJSON(answer.citations).citations,
    routing: {
      rule: answer.routing.rule,
      tools: answer.routing.tools,
      matchedKeywords: answer.routing.matchedKeywords,
    },
    toolsUsed: answer.toolsUsed,
    unavailableTools: answer.unavailableTools,
    notes: answer.notes,
    metadata: {
      totalMs: answer.durationMs,
      tools: answer.invocations.map((inv) =>
        inv.errorMessage === undefined
          ? { tool: inv.toolName, durationMs: inv.durationMs }
          : { tool: inv.toolName, durationMs: inv.durationMs, error: inv.errorMessage }
      ),
    },
  };
}

export function evidenceToJSON(error: SynthesisUnavailableError): EvidenceJSON {
  return {
    error: error.message,
    evidence: error.toolResults.map((result) => ({ tool: result.tool, answerText: result.answerText })),
    sources: formatCitationsJSON(error.citations).citations,
  };
}
