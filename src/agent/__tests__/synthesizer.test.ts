/**
 * Synthesizer Tests
 *
 * The completion provider is a fake; nothing leaves the process.
 */

import { describe, expect, it, vi, type Mock } from 'vitest';
import { NOT_FOUND_ANSWER, Synthesizer, buildContext, evidenceOf, tagPassages } from '../synthesizer.js';
import { SynthesisUnavailableError } from '../errors.js';
import { SYNTHESIS_SYSTEM_PROMPT } from '../prompts.js';
import type { CompletionProvider, CompletionRequest } from '../../providers/types.js';
import { normalizeSearchResponse } from '../tools/web-search.js';
import type { ToolResult } from '../tools/types.js';

const DOCUMENT_RESULT: ToolResult = {
  tool: 'document_qa',
  answerText: '',
  citations: [{ sourceType: 'document', section: 'Risk Factors', page: 14 }],
  passages: [
    {
      text: 'Component shortages could delay shipments.',
      citation: { sourceType: 'document', section: 'Risk Factors', page: 14 },
      score: 0.8,
    },
  ],
};

const WEB_RESULT: ToolResult = {
  tool: 'web_search',
  answerText: 'Margin is 69%.',
  citations: [{ sourceType: 'web', url: 'https://example.com/msft', title: 'Quarterly results' }],
  passages: [
    {
      text: '  Microsoft gross margin was 69%.  ',
      citation: { sourceType: 'web', url: 'https://example.com/msft', title: 'Quarterly results' },
    },
  ],
};

type CompleteFn = (request: CompletionRequest) => Promise<string>;

function fakeProvider(complete: CompleteFn): CompletionProvider & { complete: Mock<CompleteFn> } {
  return { name: 'fake', model: 'fake-model', complete: vi.fn(complete) };
}

const noSleep = async (): Promise<void> => undefined;

describe('tagPassages', () => {
  it('should tag filing passages before web passages', () => {
    const tagged = tagPassages([WEB_RESULT, DOCUMENT_RESULT]);

    expect(tagged.map((p) => [p.tag, p.citation.sourceType])).toEqual([
      ['S1', 'document'],
      ['S2', 'web'],
    ]);
  });
});

describe('evidenceOf', () => {
  it('should fall back to a cited answerText when a result has no passages', () => {
    expect(evidenceOf({ ...WEB_RESULT, passages: [] })).toEqual([
      { text: 'Margin is 69%.', citation: { sourceType: 'web', url: 'https://example.com/msft', title: 'Quarterly results' } },
    ]);
  });

  it('should ignore the "nothing found" answers and uncited text', () => {
    expect(evidenceOf({ tool: 'web_search', answerText: 'No results found.', citations: [], passages: [] })).toEqual([]);
    expect(evidenceOf({ ...WEB_RESULT, citations: [], passages: [] })).toEqual([]);
  });
});

describe('buildContext', () => {
  it('should label each passage with its source', () => {
    const context = buildContext(tagPassages([DOCUMENT_RESULT, WEB_RESULT]));

    expect(context).toBe(
      '[S1] (10-K, Section: Risk Factors, Page: 14)\nComponent shortages could delay shipments.\n\n' +
        '[S2] (Web: https://example.com/msft)\nMicrosoft gross margin was 69%.'
    );
  });
});

describe('Synthesizer', () => {
  it('should send tagged evidence and the question to the model', async () => {
    const provider = fakeProvider(async () => '  Shipments may slip [S1]; peers run 69% margins [S2].  ');
    const synthesizer = new Synthesizer(provider, { maxTokens: 512, temperature: 0.1 });

    const answer = await synthesizer.synthesize('How do margins compare?', [DOCUMENT_RESULT, WEB_RESULT]);

    expect(answer).toEqual({
      text: 'Shipments may slip [S1]; peers run 69% margins [S2].',
      citations: [
        { sourceType: 'document', section: 'Risk Factors', page: 14 },
        { sourceType: 'web', url: 'https://example.com/msft', title: 'Quarterly results' },
      ],
      evidenceFound: true,
    });

    const request = provider.complete.mock.calls[0]?.[0];
    expect(request?.system).toBe(SYNTHESIS_SYSTEM_PROMPT);
    expect(request?.maxTokens).toBe(512);
    expect(request?.temperature).toBe(0.1);
    expect(request?.prompt).toContain('[S1] (10-K, Section: Risk Factors, Page: 14)');
    expect(request?.prompt).toContain('Question: How do margins compare?');
  });

  it('should answer "not found" without calling the model when there is no evidence', async () => {
    const provider = fakeProvider(async () => 'unused');
    const synthesizer = new Synthesizer(provider);

    const answer = await synthesizer.synthesize('What is the dividend?', [
      { tool: 'document_qa', answerText: 'No relevant passages were found in the 10-K filing.', citations: [], passages: [] },
    ]);

    expect(answer).toEqual({ text: NOT_FOUND_ANSWER, citations: [], evidenceFound: false });
    expect(provider.complete).not.toHaveBeenCalled();
  });

  it("should pass the search provider's answer to the model", async () => {
    const provider = fakeProvider(async () => 'Microsoft runs 69.8% [S1].');
    const synthesizer = new Synthesizer(provider);
    const webResult = normalizeSearchResponse({
      answer: 'Microsoft gross margin is 69.8% for the quarter.',
      results: [{ url: 'https://example.com/a', content: 'Unrelated snippet text.' }],
    });

    await synthesizer.synthesize('What is Microsoft gross margin?', [webResult]);

    expect(provider.complete.mock.calls[0]?.[0].prompt).toBe(
      'Evidence:\n\n' +
        '[S1] (Web: https://example.com/a)\nMicrosoft gross margin is 69.8% for the quarter.\n\n' +
        '[S2] (Web: https://example.com/a)\nUnrelated snippet text.\n\n' +
        'Question: What is Microsoft gross margin?\n\nAnswer using the evidence above and cite passage tags.'
    );
  });

  it('should count a search answer without result text as evidence', async () => {
    const provider = fakeProvider(async () => 'Microsoft runs 69.8% [S1].');
    const synthesizer = new Synthesizer(provider);
    const webResult = normalizeSearchResponse({
      answer: 'Microsoft gross margin is 69.8% for the quarter.',
      results: [{ url: 'https://example.com/a', content: '' }],
    });

    const answer = await synthesizer.synthesize('What is Microsoft gross margin?', [webResult]);

    expect(answer).toEqual({
      text: 'Microsoft runs 69.8% [S1].',
      citations: [{ sourceType: 'web', url: 'https://example.com/a' }],
      evidenceFound: true,
    });
  });

  it('should retry a failing model call', async () => {
    let calls = 0;
    const provider = fakeProvider(async () => {
      calls++;
      if (calls === 1) throw new Error('overloaded');
      return 'Answer [S1].';
    });
    const sleep = vi.fn(noSleep);
    const synthesizer = new Synthesizer(provider, { maxAttempts: 3, baseDelayMs: 50, sleep });

    const answer = await synthesizer.synthesize('q', [DOCUMENT_RESULT]);

    expect(answer.text).toBe('Answer [S1].');
    expect(provider.complete).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(50);
  });

  it('should treat an empty reply as a failure', async () => {
    const provider = fakeProvider(async () => '   ');
    const synthesizer = new Synthesizer(provider, { maxAttempts: 2, baseDelayMs: 0, sleep: noSleep });

    await expect(synthesizer.synthesize('q', [DOCUMENT_RESULT])).rejects.toThrow(
      'Answer synthesis failed: Model returned an empty answer (after 2 attempt(s))'
    );
  });

  it('should attach the evidence when the model stays unavailable', async () => {
    const provider = fakeProvider(async () => Promise.reject(new Error('connection refused')));
    const synthesizer = new Synthesizer(provider, { maxAttempts: 3, baseDelayMs: 0, sleep: noSleep });

    const error = await synthesizer.synthesize('q', [DOCUMENT_RESULT, WEB_RESULT]).catch((e: unknown) => e);

    expect(provider.complete).toHaveBeenCalledTimes(3);
    expect(error).toBeInstanceOf(SynthesisUnavailableError);
    if (error instanceof SynthesisUnavailableError) {
      expect(error.message).toBe('Answer synthesis failed: connection refused (after 3 attempt(s))');
      expect(error.toolResults).toEqual([DOCUMENT_RESULT, WEB_RESULT]);
      expect(error.citations).toHaveLength(2);
      expect(error.cause?.message).toBe('connection refused');
      expect(error.code).toBe(7);
    }
  });

  it('should bound each model call with a timeout', async () => {
    vi.useFakeTimers();
    try {
      const provider = fakeProvider(() => new Promise<string>(() => undefined));
      const synthesizer = new Synthesizer(provider, { timeoutMs: 1000, maxAttempts: 1 });

      const pending = synthesizer.synthesize('q', [DOCUMENT_RESULT]).catch((e: unknown) => e);
      await vi.advanceTimersByTimeAsync(1000);
      const error = await pending;

      expect(error).toBeInstanceOf(SynthesisUnavailableError);
      if (error instanceof SynthesisUnavailableError) {
        expect(error.message).toBe('Answer synthesis failed: Answer synthesis timed out after 1000ms (after 1 attempt(s))');
      }
    } finally {
      vi.useRealTimers();
    }
  });
});
