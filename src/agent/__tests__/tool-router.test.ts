/**
 * Tool Router Tests
 */

import { describe, expect, it } from 'vitest';
import { ToolRouter, describePlan, loadDefaultKeywords } from '../tool-router.js';

describe('ToolRouter', () => {
  const router = new ToolRouter();

  describe('route', () => {
    it('should send a filing-only question to document_qa', () => {
      const decision = router.route(
        "What are Apple's top 3 risk factors mentioned in their latest 10-K, and what percentage of total revenue did they spend on R&D?"
      );

      expect(decision.tools).toEqual(['document_qa']);
      expect(decision.rule).toBe('default');
      expect(decision.matchedKeywords).toEqual({
        document_qa: ['risk factor', '10-k', 'r&d'],
        web_search: [],
      });
    });

    it('should use both tools for a comparison with current data', () => {
      const decision = router.route(
        "How does Apple's gross margin compare to Microsoft's current gross margin, and what reasons does Apple cite in their 10-K for any margin pressure?"
      );

      expect(decision.tools).toEqual(['document_qa', 'web_search']);
      expect(decision.rule).toBe('comparative');
      expect(decision.matches).toEqual({
        document: ['10-k', 'gross margin'],
        live: ['current'],
        comparative: ['compare', 'microsoft'],
      });
      expect(decision.matchedKeywords.web_search).toEqual(['current', 'compare', 'microsoft']);
    });

    it('should use both tools when filing and live keywords appear together', () => {
      const decision = router.route('What was net income last fiscal year and what is the share price today?');

      expect(decision.tools).toEqual(['document_qa', 'web_search']);
      expect(decision.rule).toBe('document_and_live');
      expect(decision.matches.document).toEqual(['fiscal year', 'net income']);
      expect(decision.matches.live).toEqual(['today', 'share price']);
    });

    it('should send a live-only question to web_search', () => {
      const decision = router.route('What is the current stock price?');

      expect(decision.tools).toEqual(['web_search']);
      expect(decision.rule).toBe('live_only');
    });

    it('should default to document_qa when nothing matches', () => {
      const decision = router.route('Who is on the board?');

      expect(decision.tools).toEqual(['document_qa']);
      expect(decision.rule).toBe('default');
      expect(decision.matches).toEqual({ document: [], live: [], comparative: [] });
    });

    it('should accept plural forms', () => {
      expect(router.route('Describe the reportable segments').matches.document).toEqual(['segment']);
      expect(router.route('How do peers price their products?').matches.comparative).toEqual(['peer']);
    });

    it('should only match whole words', () => {
      const decision = router.route('What is known about the headcount at Dellwood?');

      expect(decision.matches.live).toEqual([]);
      expect(decision.matches.comparative).toEqual([]);
    });

    it('should ignore case', () => {
      expect(router.route('MICROSOFT margins').tools).toEqual(['document_qa', 'web_search']);
    });

    it('should return the same decision for the same query', () => {
      const query = 'Compare R&D spending versus peers';

      expect(router.route(query)).toEqual(router.route(query));
    });
  });

  describe('configured keywords', () => {
    it('should append extra keywords to the built-in lists', () => {
      const custom = new ToolRouter({ extraKeywords: { live: ['Breaking'] } });

      const decision = custom.route('Any breaking developments?');

      expect(decision.tools).toEqual(['web_search']);
      expect(decision.matches.live).toEqual(['breaking']);
    });

    it('should drop blank and duplicate keywords', () => {
      const custom = new ToolRouter({
        keywords: { document: ['10-K'], live: [], comparative: [] },
        extraKeywords: { document: ['10-k', '  ', 'proxy'] },
      });

      expect(custom.route('10-K and proxy').matches.document).toEqual(['10-k', 'proxy']);
    });

    it('should treat regex characters in keywords literally', () => {
      const custom = new ToolRouter({ keywords: { document: ['s&p (500)'], live: [], comparative: [] } });

      expect(custom.route('Is it in the S&P (500)?').matches.document).toEqual(['s&p (500)']);
      expect(custom.route('Is it in the S&P 500?').matches.document).toEqual([]);
    });

    it('should ship non-empty built-in lists', () => {
      const keywords = loadDefaultKeywords();

      expect(keywords.document).toContain('10-k');
      expect(keywords.live).toContain('current');
      expect(keywords.comparative).toContain('compare');
    });
  });
});

describe('describePlan', () => {
  it('should describe a two-tool plan step by step', () => {
    expect(describePlan({ tools: ['document_qa', 'web_search'] })).toBe(
      'Plan: (1) Query 10-K for historical data (2) Search web for current data (3) Synthesize both sources'
    );
  });

  it('should describe single-tool plans', () => {
    expect(describePlan({ tools: ['document_qa'] })).toBe('Plan: Query the 10-K filing for requested information');
    expect(describePlan({ tools: ['web_search'] })).toBe('Plan: Search web for current market information');
  });
});
