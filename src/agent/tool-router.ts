/**
 * Tool Router
 *
 * Decides which evidence tools a question needs, from keywords alone.
 * No LLM calls: the same question always gets the same route.
 *
 * Three keyword sets are matched case-insensitively on word boundaries
 * (a trailing "s" or "es" is allowed), then the first matching rule wins:
 *
 * 1. comparative, or document AND live  -> document_qa, web_search
 * 2. live only                          -> web_search
 * 3. anything else                      -> document_qa
 *
 * @example
 * ```typescript
 * const router = new ToolRouter();
 *
 * router.route("How does the gross margin compare to Microsoft's?").tools;
 * // ['document_qa', 'web_search']
 *
 * router.route('What is the current stock price?').tools;
 * // ['web_search']
 * ```
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { ToolName } from './tools/types.js';

// ============================================================================
// TYPES
// ============================================================================

/** Keyword set names */
export type KeywordCategory = 'document' | 'live' | 'comparative';

/**
 * Which rule produced a routing decision.
 *
 * - comparative: the question compares against peers or benchmarks
 * - document_and_live: filing data and current data are both asked for
 * - live_only: only current market data is asked for
 * - default: everything else goes to the filing
 */
export type RoutingRule = 'comparative' | 'document_and_live' | 'live_only' | 'default';

export interface RoutingDecision {
  /** Tools to run, in execution order; never empty */
  tools: ToolName[];
  /** Keywords that argued for each tool */
  matchedKeywords: Record<ToolName, string[]>;
  /** Keywords found per category */
  matches: Record<KeywordCategory, string[]>;
  rule: RoutingRule;
}

export type RoutingKeywords = Record<KeywordCategory, string[]>;

export interface ToolRouterConfig {
  /** Replace the built-in lists (mostly for tests) */
  keywords?: RoutingKeywords;
  /** Appended to the built-in lists */
  extraKeywords?: Partial<RoutingKeywords>;
}

// ============================================================================
// KEYWORD SETS
// ============================================================================

const KeywordFileSchema = z.object({
  document: z.array(z.string()),
  live: z.array(z.string()),
  comparative: z.array(z.string()),
});

const KEYWORDS_URL = new URL('../../data/routing-keywords.json', import.meta.url);

let builtInKeywords: RoutingKeywords | null = null;

/**
 * The shipped keyword lists (data/routing-keywords.json), read once.
 */
export function loadDefaultKeywords(): RoutingKeywords {
  if (builtInKeywords === null) {
    builtInKeywords = KeywordFileSchema.parse(JSON.parse(readFileSync(KEYWORDS_URL, 'utf-8')));
  }
  return builtInKeywords;
}

const CATEGORIES: readonly KeywordCategory[] = ['document', 'live', 'comparative'];

function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

interface KeywordMatcher {
  keyword: string;
  pattern: RegExp;
}

function compile(keywords: Iterable<string>): KeywordMatcher[] {
  const seen = new Set<string>();
  const matchers: KeywordMatcher[] = [];
  for (const raw of keywords) {
    const keyword = raw.trim().toLowerCase();
    if (keyword === '' || seen.has(keyword)) continue;
    seen.add(keyword);
    matchers.push({
      keyword,
      pattern: new RegExp(`(?<![a-z0-9])${escapeRegex(keyword)}(?:s|es)?(?![a-z0-9])`),
    });
  }
  return matchers;
}

// ============================================================================
// ToolRouter
// ============================================================================

export class ToolRouter {
  private readonly matchers: Record<KeywordCategory, KeywordMatcher[]>;

  constructor(config: ToolRouterConfig = {}) {
    const base = config.keywords ?? loadDefaultKeywords();
    const extra = config.extraKeywords ?? {};
    this.matchers = {
      document: compile([...base.document, ...(extra.document ?? [])]),
      live: compile([...base.live, ...(extra.live ?? [])]),
      comparative: compile([...base.comparative, ...(extra.comparative ?? [])]),
    };
  }

  /**
   * Keywords of each category found in the query, in list order.
   */
  match(query: string): Record<KeywordCategory, string[]> {
    const normalized = query.toLowerCase();
    const found: Record<KeywordCategory, string[]> = { document: [], live: [], comparative: [] };
    for (const category of CATEGORIES) {
      for (const { keyword, pattern } of this.matchers[category]) {
        if (pattern.test(normalized)) {
          found[category].push(keyword);
        }
      }
    }
    return found;
  }

  route(query: string): RoutingDecision {
    const matches = this.match(query);
    const hasDocument = matches.document.length > 0;
    const hasLive = matches.live.length > 0;
    const hasComparative = matches.comparative.length > 0;

    let rule: RoutingRule;
    let tools: ToolName[];
    if (hasComparative) {
      rule = 'comparative';
      tools = ['document_qa', 'web_search'];
    } else if (hasDocument && hasLive) {
      rule = 'document_and_live';
      tools = ['document_qa', 'web_search'];
    } else if (hasLive) {
      rule = 'live_only';
      tools = ['web_search'];
    } else {
      rule = 'default';
      tools = ['document_qa'];
    }

    return {
      tools,
      matchedKeywords: {
        document_qa: [...matches.document],
        web_search: [...matches.live, ...matches.comparative],
      },
      matches,
      rule,
    };
  }
}

// ============================================================================
// PLAN
// ============================================================================

const PLAN_STEPS: Record<ToolName, string> = {
  document_qa: 'Query 10-K for historical data',
  web_search: 'Search web for current data',
};

const SINGLE_TOOL_PLANS: Record<ToolName, string> = {
  document_qa: 'Plan: Query the 10-K filing for requested information',
  web_search: 'Plan: Search web for current market information',
};

/**
 * One-line description of what answering will involve.
 *
 * @example
 * ```typescript
 * describePlan({ tools: ['document_qa', 'web_search'], ... });
 * // 'Plan: (1) Query 10-K for historical data (2) Search web for current data (3) Synthesize both sources'
 * ```
 */
export function describePlan(decision: Pick<RoutingDecision, 'tools'>): string {
  const [first] = decision.tools;
  if (decision.tools.length === 1 && first !== undefined) {
    return SINGLE_TOOL_PLANS[first];
  }
  const steps = decision.tools.map((tool, i) => `(${i + 1}) ${PLAN_STEPS[tool]}`);
  steps.push(`(${decision.tools.length + 1}) Synthesize both sources`);
  return `Plan: ${steps.join(' ')}`;
}
