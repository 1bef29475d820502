/**
 * Synthesizer
 *
 * Turns tool results into one cited answer:
 *   tag passages → build prompt → complete (timeout + retry) → answer
 *
 * Every passage is tagged with its provenance so the model can cite it:
 *
 * ```
 * [S1] (10-K, Section: Risk Factors, Page: 14)
 * Component shortages could delay shipments...
 *
 * [S2] (Web: https://example.com/msft)
 * Microsoft reported a gross margin of 69%...
 * ```
 *
 * Filing passages always come before web passages.
 */

import type { CompletionProvider } from '../providers/types.js';
import { retryWithBackoff, RetryExhaustedError, withTimeout } from '../utils/retry.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { mergeCitations } from './citations.js';
import { SynthesisUnavailableError } from './errors.js';
import { buildSynthesisPrompt, SYNTHESIS_SYSTEM_PROMPT } from './prompts.js';
import { NO_DOCUMENT_MATCHES } from './tools/document-qa.js';
import type { Citation, EvidencePassage, ToolResult } from './tools/types.js';
import { NO_WEB_RESULTS } from './tools/web-search.js';

// ============================================================================
// TYPES
// ============================================================================

export interface FinalAnswer {
  text: string;
  citations: Citation[];
  /** False when no tool returned any evidence and the model was not called */
  evidenceFound: boolean;
}

export interface SynthesizerOptions {
  maxTokens?: number;
  temperature?: number;
  /** Bound on one model call */
  timeoutMs?: number;
  maxAttempts?: number;
  baseDelayMs?: number;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export interface TaggedPassage extends EvidencePassage {
  tag: string;
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const NOT_FOUND_ANSWER =
  'The requested information was not found in the 10-K filing or the available web sources.';

const DEFAULT_TIMEOUT_MS = 60000;
const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BASE_DELAY_MS = 1000;

// ============================================================================
// CONTEXT
// ============================================================================

/** answerText values that mean a tool found nothing */
const EMPTY_ANSWERS: ReadonlySet<string> = new Set([NO_DOCUMENT_MATCHES, NO_WEB_RESULTS, '']);

/**
 * The evidence a result contributes. A result with no passages but a
 * substantive answerText and a citation contributes that text.
 */
export function evidenceOf(result: ToolResult): EvidencePassage[] {
  if (result.passages.length > 0) {
    return result.passages;
  }
  const text = result.answerText.trim();
  const [citation] = result.citations;
  if (EMPTY_ANSWERS.has(text) || citation === undefined) {
    return [];
  }
  return [{ text, citation }];
}

/**
 * All passages of all results, filing first, each with an [S<n>] tag.
 */
export function tagPassages(results: ToolResult[]): TaggedPassage[] {
  const passages = results.flatMap(evidenceOf);
  const ordered = [
    ...passages.filter((p) => p.citation.sourceType === 'document'),
    ...passages.filter((p) => p.citation.sourceType === 'web'),
  ];
  return ordered.map((passage, i) => ({ ...passage, tag: `S${i + 1}` }));
}

function sourceLabel(passage: EvidencePassage): string {
  const { citation } = passage;
  return citation.sourceType === 'document'
    ? `10-K, Section: ${citation.section}, Page: ${citation.page}`
    : `Web: ${citation.url}`;
}

/**
 * Prompt context for a list of tagged passages.
 */
export function buildContext(passages: TaggedPassage[]): string {
  return passages.map((p) => `[${p.tag}] (${sourceLabel(p)})\n${p.text.trim()}`).join('\n\n');
}

// ============================================================================
// SYNTHESIZER
// ============================================================================

/**
 * @example
 * ```typescript
 * const synthesizer = new Synthesizer(provider, { timeoutMs: 60000, maxAttempts: 3 });
 * const answer = await synthesizer.synthesize(question, [documentResult, webResult]);
 * console.log(answer.text);
 * ```
 */
export class Synthesizer {
  private readonly logger: Logger;

  constructor(
    private readonly provider: CompletionProvider,
    private readonly options: SynthesizerOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * @throws SynthesisUnavailableError when every model call failed
   */
  async synthesize(query: string, toolResults: ToolResult[]): Promise<FinalAnswer> {
    const citations = mergeCitations(toolResults);
    const passages = tagPassages(toolResults);

    if (passages.length === 0) {
      return { text: NOT_FOUND_ANSWER, citations: [], evidenceFound: false };
    }

    const request = {
      system: SYNTHESIS_SYSTEM_PROMPT,
      prompt: buildSynthesisPrompt(query, buildContext(passages)),
      maxTokens: this.options.maxTokens,
      temperature: this.options.temperature,
    };
    const timeoutMs = this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

    this.logger.debug?.(`Synthesizing from ${passages.length} passages with ${this.provider.name}/${this.provider.model}`);

    try {
      const text = await retryWithBackoff(
        async () => {
          const output = await withTimeout(() => this.provider.complete(request), timeoutMs, 'Answer synthesis');
          const trimmed = output.trim();
          if (trimmed === '') {
            throw new Error('Model returned an empty answer');
          }
          return trimmed;
        },
        {
          maxAttempts: this.options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
          baseDelayMs: this.options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS,
          onRetry: (error, attempt, delayMs) =>
            this.logger.debug?.(`Synthesis attempt ${attempt} failed (${error.message}); retrying in ${delayMs}ms`),
          sleep: this.options.sleep,
        }
      );
      return { text, citations, evidenceFound: true };
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw new SynthesisUnavailableError(
          `${error.lastError?.message ?? 'unknown error'} (after ${error.errors.length} attempt(s))`,
          toolResults,
          citations,
          error.lastError
        );
      }
      throw error;
    }
  }
}
