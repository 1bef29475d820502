/**
 * Filing HTML Parser Tests
 */

import { describe, it, expect } from 'vitest';

import { parseFilingHtml } from '../parser/html-parser.js';
import { sectionForHeading } from '../parser/sections.js';
import { buildFilingHtml, words } from '../../test-utils/index.js';

describe('sectionForHeading', () => {
  it('should map item headings to section labels', () => {
    expect(sectionForHeading('Item 1A. Risk Factors')).toBe('Risk Factors');
    expect(sectionForHeading("ITEM 7. MANAGEMENT'S DISCUSSION AND ANALYSIS")).toBe('MD&A');
    expect(sectionForHeading('PART II - Item 8: Financial Statements')).toBe('Financial Statements');
    expect(sectionForHeading('Item 7')).toBe('MD&A');
  });

  it('should fall back to the heading text for unknown items', () => {
    expect(sectionForHeading('Item 17. Supplemental Data')).toBe('Supplemental Data');
  });

  it('should ignore references to items inside prose', () => {
    expect(sectionForHeading('Item 7 of this report describes our results')).toBeUndefined();
    expect(sectionForHeading('Revenue grew in fiscal 2023')).toBeUndefined();
  });

  it('should ignore long blocks', () => {
    expect(sectionForHeading(`Item 1A. ${'x'.repeat(200)}`)).toBeUndefined();
  });
});

describe('parseFilingHtml', () => {
  it('should tag blocks with the section they fall under', () => {
    const html = buildFilingHtml({
      cover: ['Annual report cover text'],
      sections: [
        { heading: 'Item 1A. Risk Factors', paragraphs: ['Supply risk paragraph'] },
        { heading: 'Item 7. Management Discussion', paragraphs: ['Revenue grew'] },
      ],
    });

    const doc = parseFilingHtml(html);

    expect(doc.blocks.map((b) => [b.text, b.section])).toEqual([
      ['Annual report cover text', 'Cover Page'],
      ['Item 1A. Risk Factors', 'Risk Factors'],
      ['Supply risk paragraph', 'Risk Factors'],
      ['Item 7. Management Discussion', 'MD&A'],
      ['Revenue grew', 'MD&A'],
    ]);
    expect(doc.sections).toEqual(['Cover Page', 'Risk Factors', 'MD&A']);
    expect(doc.wordCount).toBe(17);
  });

  it('should join table cells and ignore headings inside tables', () => {
    const html =
      '<table><tr><td>Item 1A.</td><td>Risk Factors</td><td>12</td></tr></table>' +
      '<p>Item 1. Business</p><p>We make widgets</p>';

    const doc = parseFilingHtml(html);

    expect(doc.blocks[0]).toMatchObject({ text: 'Item 1A. | Risk Factors | 12', section: 'Cover Page', inTable: true });
    expect(doc.blocks[1]).toMatchObject({ text: 'Item 1. Business', section: 'Business', inTable: false });
    expect(doc.blocks[2]?.section).toBe('Business');
  });

  it('should put each table row in its own block', () => {
    const html = '<table><tr><td>Revenue</td><td>$100</td></tr><tr><td>Net income</td><td>$20</td></tr></table>';

    expect(parseFilingHtml(html).blocks.map((b) => b.text)).toEqual(['Revenue | $100', 'Net income | $20']);
  });

  it('should skip scripts, hidden content and inline XBRL headers', () => {
    const html =
      '<html><head><style>p { color: red }</style></head><body>' +
      '<div style="display:none">hidden facts</div>' +
      '<ix:header>dei data</ix:header>' +
      '<script>var x = 1;</script>' +
      '<p>Visible text</p></body></html>';

    expect(parseFilingHtml(html).blocks.map((b) => b.text)).toEqual(['Visible text']);
  });

  it('should decode entities', () => {
    expect(parseFilingHtml('<p>R&amp;D&nbsp;spending</p>').blocks[0]?.text).toBe('R&D spending');
  });

  it('should start a new page at each page-break marker', () => {
    const html = buildFilingHtml({
      sections: [
        { heading: 'Item 1. Business', paragraphs: ['first page text'] },
        { heading: 'Item 2. Properties', paragraphs: ['second page text'] },
      ],
      pageBreaks: true,
    });

    const doc = parseFilingHtml(html);

    expect(doc.blocks.map((b) => b.page)).toEqual([1, 1, 2, 2]);
    expect(doc.pageStrategy).toBe('markers');
    expect(doc.pageCount).toBe(2);
  });

  it('should count back-to-back markers once', () => {
    const doc = parseFilingHtml('<p>A</p><hr><hr><p>B</p>');

    expect(doc.blocks.map((b) => [b.text, b.page])).toEqual([
      ['A', 1],
      ['B', 2],
    ]);
  });

  it('should estimate pages from text length without markers', () => {
    // Each block is 109 characters, so blocks start at offsets 0, 110, 220
    const html = buildFilingHtml({ cover: [words(30), words(30), words(30)], sections: [] });

    const doc = parseFilingHtml(html, { charsPerPage: 100 });

    expect(doc.blocks.map((b) => b.offset)).toEqual([0, 110, 220]);
    expect(doc.blocks.map((b) => b.page)).toEqual([1, 2, 3]);
    expect(doc.pageStrategy).toBe('estimated');
    expect(doc.pageCount).toBe(3);
  });

  it('should return an empty document for markup without text', () => {
    const doc = parseFilingHtml('<html><body><div></div></body></html>');

    expect(doc).toEqual({ blocks: [], sections: [], pageCount: 0, pageStrategy: 'estimated', wordCount: 0 });
  });
});
