/**
 * Filing HTML Parser
 *
 * Streams the filing through htmlparser2 and produces text blocks tagged
 * with the 10-K section and page they start on.
 *
 * Block boundaries: paragraphs, divs, headings, list items, line breaks
 * and table rows. Inside a table, cells of one row are joined with " | "
 * so figures stay next to their labels.
 *
 * Pages: SEC filings usually mark page ends with `page-break-before` or
 * `page-break-after` styles, or with <hr>. When at least one marker is
 * present, every marker that follows some text starts a new page. When
 * none is present, pages are estimated as fixed runs of `charsPerPage`
 * characters of extracted text. Either way the number is best-effort.
 */

import { Parser } from 'htmlparser2';
import { COVER_SECTION, sectionForHeading } from './sections.js';
import type { ParsedDocument, TextBlock } from '../types.js';

// ============================================================================
// CONSTANTS
// ============================================================================

export const DEFAULT_CHARS_PER_PAGE = 3000;

/** Elements whose content never reaches the index */
const SKIPPED_ELEMENTS = new Set(['script', 'style', 'head', 'title', 'noscript', 'template', 'ix:header']);

/** Elements that end the current text block */
const BLOCK_ELEMENTS = new Set([
  'address', 'article', 'aside', 'blockquote', 'br', 'center', 'dd', 'div', 'dl', 'dt',
  'figcaption', 'figure', 'footer', 'form', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6',
  'header', 'hr', 'li', 'main', 'nav', 'ol', 'p', 'pre', 'section', 'ul',
]);

const CELL_ELEMENTS = new Set(['td', 'th']);

const PAGE_BREAK_BEFORE = /(?:page-break-before\s*:\s*always|break-before\s*:\s*page)/i;
const PAGE_BREAK_AFTER = /(?:page-break-after\s*:\s*always|break-after\s*:\s*page)/i;
const HIDDEN = /display\s*:\s*none/i;

// ============================================================================
// TYPES
// ============================================================================

export interface ParseOptions {
  /** Page length used when the markup carries no page-break markers */
  charsPerPage?: number;
}

interface OpenElement {
  name: string;
  skip: boolean;
  breakAfter: boolean;
}

/** Block before pages and sections are resolved */
interface RawBlock {
  text: string;
  inTable: boolean;
  /** Page-break markers seen before this block */
  markerPage: number;
}

// ============================================================================
// PARSER
// ============================================================================

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Collects raw blocks from htmlparser2 callbacks.
 */
class BlockCollector {
  readonly blocks: RawBlock[] = [];
  markerCount = 0;

  private readonly stack: OpenElement[] = [];
  private skipDepth = 0;
  private tableDepth = 0;
  private cellDepth = 0;
  private buffer = '';
  private markerPage = 1;
  private pageHasText = false;

  onOpenTag(name: string, attribs: Record<string, string>): void {
    const style = attribs['style'] ?? '';
    const skip = SKIPPED_ELEMENTS.has(name) || HIDDEN.test(style);
    const breakBefore = PAGE_BREAK_BEFORE.test(style);
    const breakAfter = PAGE_BREAK_AFTER.test(style) || name === 'hr';

    this.stack.push({ name, skip, breakAfter });
    if (skip) {
      this.skipDepth++;
      return;
    }
    if (this.skipDepth > 0) return;

    if (breakBefore) {
      this.pageBreak();
    }

    if (name === 'table') {
      this.flush();
      this.tableDepth++;
    } else if (name === 'tr') {
      this.flush();
    } else if (CELL_ELEMENTS.has(name)) {
      this.cellDepth++;
      if (this.buffer.trim().length > 0) {
        this.buffer += ' | ';
      }
    } else if (BLOCK_ELEMENTS.has(name)) {
      this.blockBoundary();
    }
  }

  onText(text: string): void {
    if (this.skipDepth === 0) {
      this.buffer += text;
    }
  }

  onCloseTag(): void {
    const element = this.stack.pop();
    if (!element) return;
    const { name } = element;

    if (element.skip) {
      this.skipDepth--;
      return;
    }
    if (this.skipDepth > 0) return;

    if (name === 'table') {
      this.flush();
      this.tableDepth = Math.max(0, this.tableDepth - 1);
    } else if (name === 'tr') {
      this.flush();
    } else if (CELL_ELEMENTS.has(name)) {
      this.cellDepth = Math.max(0, this.cellDepth - 1);
    } else if (BLOCK_ELEMENTS.has(name)) {
      this.blockBoundary();
    }

    if (element.breakAfter) {
      this.pageBreak();
    }
  }

  finish(): void {
    this.flush();
  }

  /** Inside a cell, nested paragraphs only separate words */
  private blockBoundary(): void {
    if (this.cellDepth > 0) {
      this.buffer += ' ';
    } else {
      this.flush();
    }
  }

  private pageBreak(): void {
    this.flush();
    this.markerCount++;
    // Back-to-back markers (an <hr> right after a page-break div) count once
    if (this.pageHasText) {
      this.markerPage++;
      this.pageHasText = false;
    }
  }

  private flush(): void {
    const text = normalizeWhitespace(this.buffer);
    this.buffer = '';
    if (text.length === 0) return;

    this.blocks.push({ text, inTable: this.tableDepth > 0, markerPage: this.markerPage });
    this.pageHasText = true;
  }
}

/**
 * Parse filing HTML into section- and page-tagged text blocks.
 *
 * Never throws on malformed markup; an empty result is left for the
 * caller to reject.
 *
 * @example
 * ```typescript
 * const doc = parseFilingHtml(html, { charsPerPage: 3000 });
 * doc.blocks[0]; // { text: 'UNITED STATES ...', section: 'Cover Page', page: 1, ... }
 * ```
 */
export function parseFilingHtml(html: string, options: ParseOptions = {}): ParsedDocument {
  const charsPerPage = options.charsPerPage ?? DEFAULT_CHARS_PER_PAGE;
  const collector = new BlockCollector();

  const parser = new Parser(
    {
      onopentag: (name, attribs) => collector.onOpenTag(name, attribs),
      ontext: (text) => collector.onText(text),
      onclosetag: () => collector.onCloseTag(),
    },
    { decodeEntities: true, lowerCaseTags: true, lowerCaseAttributeNames: true }
  );
  parser.write(html);
  parser.end();
  collector.finish();

  const useMarkers = collector.markerCount > 0;
  const blocks: TextBlock[] = [];
  const sections: string[] = [];
  let section = COVER_SECTION;
  let offset = 0;
  let wordCount = 0;

  for (const raw of collector.blocks) {
    if (!raw.inTable) {
      const heading = sectionForHeading(raw.text);
      if (heading !== undefined) {
        section = heading;
      }
    }
    if (!sections.includes(section)) {
      sections.push(section);
    }

    const page = useMarkers ? raw.markerPage : Math.floor(offset / charsPerPage) + 1;
    blocks.push({ text: raw.text, section, page, offset, inTable: raw.inTable });

    offset += raw.text.length + 1;
    wordCount += raw.text.split(' ').length;
  }

  const lastBlock = blocks[blocks.length - 1];
  return {
    blocks,
    sections,
    pageCount: lastBlock ? lastBlock.page : 0,
    pageStrategy: useMarkers ? 'markers' : 'estimated',
    wordCount,
  };
}
