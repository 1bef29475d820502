/**
 * 10-K Section Labels
 *
 * Maps Form 10-K item numbers to the labels chunks are tagged with, and
 * recognizes item headings in extracted text.
 */

/** Label for text before the first item heading */
export const COVER_SECTION = 'Cover Page';

/**
 * Item number (upper-case) -> section label.
 */
export const ITEM_SECTIONS: Readonly<Record<string, string>> = {
  '1': 'Business',
  '1A': 'Risk Factors',
  '1B': 'Unresolved Staff Comments',
  '1C': 'Cybersecurity',
  '2': 'Properties',
  '3': 'Legal Proceedings',
  '4': 'Mine Safety Disclosures',
  '5': 'Market for Common Equity',
  '6': 'Reserved',
  '7': 'MD&A',
  '7A': 'Market Risk Disclosures',
  '8': 'Financial Statements',
  '9': 'Changes in and Disagreements with Accountants',
  '9A': 'Controls and Procedures',
  '9B': 'Other Information',
  '9C': 'Foreign Jurisdiction Disclosure',
  '10': 'Directors and Corporate Governance',
  '11': 'Executive Compensation',
  '12': 'Security Ownership',
  '13': 'Certain Relationships and Related Transactions',
  '14': 'Principal Accountant Fees and Services',
  '15': 'Exhibits and Financial Statement Schedules',
  '16': 'Form 10-K Summary',
};

/** Headings are short; longer blocks that start with "Item" are prose */
export const MAX_HEADING_LENGTH = 200;

// "Item 1A.", "PART II - Item 7:", "ITEM 8 Financial Statements"
const ITEM_HEADING = /^(?:part\s+[ivx]+\s*[.,:\-–—]?\s*)?item\s+(\d{1,2}[a-c]?)\b\s*([.:\-–—])?\s*(.*)$/i;

/**
 * Return the section label a block introduces, or undefined if the block
 * is not an item heading.
 *
 * @example
 * ```typescript
 * sectionForHeading('Item 1A. Risk Factors');          // 'Risk Factors'
 * sectionForHeading('Item 7 of this report covers'); // undefined
 * ```
 */
export function sectionForHeading(text: string): string | undefined {
  if (text.length > MAX_HEADING_LENGTH) {
    return undefined;
  }

  const match = ITEM_HEADING.exec(text.trim());
  if (!match) {
    return undefined;
  }

  const item = (match[1] ?? '').toUpperCase();
  const punctuation = match[2];
  const rest = (match[3] ?? '').trim();

  // "Item 7 of this report" is a reference, not a heading
  const firstChar = rest.charAt(0);
  const looksLikeHeading =
    punctuation !== undefined || rest.length === 0 || firstChar !== firstChar.toLowerCase();
  if (!looksLikeHeading) {
    return undefined;
  }

  return ITEM_SECTIONS[item] ?? (rest.length > 0 ? rest : `Item ${item}`);
}
