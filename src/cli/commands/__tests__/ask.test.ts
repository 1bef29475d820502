/**
 * Tests for ask command output
 *
 * Tests cover:
 * - Text and JSON rendering of an answer
 * - Evidence printed before a synthesis failure is rethrown
 * - --top-k parsing
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { answerQuestion, MAX_TOP_K } from '../ask.js';
import { parseTopK } from '../../utils/agent-session.js';
import type { CommandContext } from '../../types.js';
import { SynthesisUnavailableError } from '../../../agent/errors.js';
import type { AgentAnswer } from '../../../agent/research-agent.js';
import type { ToolResult } from '../../../agent/tools/types.js';
import { CLIError } from '../../../errors/index.js';

const WEB_RESULT: ToolResult = {
  tool: 'web_search',
  answerText: 'Shares traded at $190.12 [1]',
  citations: [{ sourceType: 'web', url: 'https://example.com/quote', title: 'Quote' }],
  passages: [
    {
      text: 'Shares traded at $190.12',
      citation: { sourceType: 'web', url: 'https://example.com/quote', title: 'Quote' },
    },
  ],
};

const ANSWER: AgentAnswer = {
  text: 'The stock trades at $190.12 [S1].',
  citations: WEB_RESULT.citations,
  evidenceFound: true,
  query: 'What is the current stock price?',
  routing: {
    tools: ['web_search'],
    matchedKeywords: { document_qa: [], web_search: ['current', 'stock price'] },
    matches: { document: [], live: ['current', 'stock price'], comparative: [] },
    rule: 'live_only',
  },
  plan: 'Plan: Search web for current market information',
  toolsUsed: ['web_search'],
  unavailableTools: [],
  invocations: [{ toolName: 'web_search', query: 'What is the current stock price?', result: WEB_RESULT, durationMs: 300 }],
  notes: [],
  durationMs: 1200,
};

describe('answerQuestion', () => {
  let logOutput: string[];
  let consoleOutput: string[];
  let level: typeof chalk.level;

  function context(json: boolean): CommandContext {
    return {
      options: { verbose: false, json },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
  }

  beforeEach(() => {
    logOutput = [];
    consoleOutput = [];
    level = chalk.level;
    chalk.level = 0;
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      consoleOutput.push(args.map(String).join(' '));
    });
  });

  afterEach(() => {
    chalk.level = level;
    vi.restoreAllMocks();
  });

  it('renders the answer as text', async () => {
    await answerQuestion(context(false), () => Promise.resolve(ANSWER), ANSWER.query);

    expect(logOutput).toEqual([
      'Plan: Search web for current market information',
      '',
      'The stock trades at $190.12 [S1].',
      '',
      'Sources:',
      '  [1] Quote (https://example.com/quote)',
      '',
      'Tools used: web_search',
    ]);
    expect(consoleOutput).toEqual([]);
  });

  it('prints one JSON document in --json mode', async () => {
    await answerQuestion(context(true), () => Promise.resolve(ANSWER), ANSWER.query);

    expect(consoleOutput).toHaveLength(1);
    const parsed: Record<string, unknown> = JSON.parse(consoleOutput[0] ?? '{}');
    expect(parsed['question']).toBe('What is the current stock price?');
    expect(parsed['answer']).toBe('The stock trades at $190.12 [S1].');
    expect(parsed['toolsUsed']).toEqual(['web_search']);
    expect(parsed['sources']).toEqual([
      { index: 1, sourceType: 'web', url: 'https://example.com/quote', title: 'Quote' },
    ]);
  });

  it('prints the evidence before rethrowing a synthesis failure', async () => {
    const failure = new SynthesisUnavailableError('timed out', [WEB_RESULT], WEB_RESULT.citations);

    await expect(answerQuestion(context(false), () => Promise.reject(failure), ANSWER.query)).rejects.toBe(failure);

    expect(logOutput).toEqual([
      'The answer could not be written, but this evidence was found:',
      '',
      'web_search:',
      '  Shares traded at $190.12 [1]',
      '',
      'Sources:',
      '  [1] Quote (https://example.com/quote)',
      '',
    ]);
  });

  it('prints the evidence as JSON in --json mode', async () => {
    const failure = new SynthesisUnavailableError('timed out', [WEB_RESULT], WEB_RESULT.citations);

    await expect(answerQuestion(context(true), () => Promise.reject(failure), ANSWER.query)).rejects.toBe(failure);

    const parsed: Record<string, unknown> = JSON.parse(consoleOutput[0] ?? '{}');
    expect(parsed['error']).toBe('Answer synthesis failed: timed out');
  });

  it('rethrows other errors without output', async () => {
    const failure = new Error('boom');

    await expect(answerQuestion(context(false), () => Promise.reject(failure), ANSWER.query)).rejects.toBe(failure);
    expect(logOutput).toEqual([]);
  });
});

describe('parseTopK', () => {
  it('accepts a positive integer up to the maximum', () => {
    expect(parseTopK('8', MAX_TOP_K)).toBe(8);
    expect(parseTopK(String(MAX_TOP_K), MAX_TOP_K)).toBe(MAX_TOP_K);
  });

  it.each(['0', '-3', 'abc', '21'])('rejects "%s"', (value) => {
    expect(() => parseTopK(value, MAX_TOP_K)).toThrow(CLIError);
  });
});
