/**
 * Agent Errors
 *
 * Failures the caller sees after routing and tool execution. Both carry
 * what was gathered so far, so the CLI can still show the evidence.
 */

import { CLIError, ExitCode } from '../errors/index.js';
import type { Citation, ToolInvocation, ToolResult } from './tools/types.js';

/**
 * The language model could not produce an answer within its retries.
 */
export class SynthesisUnavailableError extends CLIError {
  public readonly cause?: Error;

  constructor(
    reason: string,
    /** Raw evidence from the tools that ran */
    public readonly toolResults: ToolResult[],
    /** Merged citations for that evidence */
    public readonly citations: Citation[],
    cause?: Error
  ) {
    super(
      `Answer synthesis failed: ${reason}`,
      'Check your LLM provider key and network, or switch provider: fra config set default_provider ollama',
      ExitCode.ServiceUnavailable
    );
    this.name = 'SynthesisUnavailableError';
    this.cause = cause;
  }
}

/**
 * Every tool the router selected failed.
 */
export class AllToolsFailedError extends CLIError {
  constructor(public readonly invocations: ToolInvocation[]) {
    const detail = invocations.map((inv) => `${inv.toolName}: ${inv.errorMessage ?? inv.error ?? 'failed'}`).join('; ');
    const needsIndex = invocations.some((inv) => inv.error === 'document_unavailable');
    super(
      `No evidence source could answer the question (${detail})`,
      needsIndex ? 'Build the filing index first: fra index' : 'Check TAVILY_API_KEY and your network connection',
      ExitCode.ServiceUnavailable
    );
    this.name = 'AllToolsFailedError';
  }
}
