/**
 * Synthetic filing HTML for tests.
 */

export interface FilingSection {
  /** Heading text, e.g. "Item 1A. Risk Factors" */
  heading: string;
  paragraphs: string[];
}

export interface FilingOptions {
  /** Paragraphs before the first heading */
  cover?: string[];
  sections: FilingSection[];
  /** Put a page-break div after each section */
  pageBreaks?: boolean;
}

function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * `count` distinct words: "w0 w1 w2 ...", prefixed when given.
 *
 * @internal
 */
export function words(count: number, prefix = 'w'): string {
  return Array.from({ length: count }, (_, i) => `${prefix}${i}`).join(' ');
}

/**
 * Minimal 10-K shaped document.
 *
 * @internal
 */
export function buildFilingHtml(options: FilingOptions): string {
  const body: string[] = [];
  for (const paragraph of options.cover ?? []) {
    body.push(`<p>${escapeHtml(paragraph)}</p>`);
  }
  for (const section of options.sections) {
    body.push(`<p><b>${escapeHtml(section.heading)}</b></p>`);
    for (const paragraph of section.paragraphs) {
      body.push(`<p>${escapeHtml(paragraph)}</p>`);
    }
    if (options.pageBreaks) {
      body.push('<div style="page-break-after: always"></div>');
    }
  }
  return `<html><head><title>10-K</title></head><body>${body.join('\n')}</body></html>`;
}
