/**
 * Test Utilities Module
 *
 * Shared utilities for testing across the codebase.
 *
 * @example
 * ```typescript
 * import { createTestDatabase, buildFilingHtml } from '../../test-utils/index.js';
 *
 * const { db, ops } = createTestDatabase();
 * const html = buildFilingHtml({ sections: [{ heading: 'Item 1A. Risk Factors', paragraphs: ['...'] }] });
 * ```
 */

export { resetAll } from './reset.js';
export { createTestDatabase, type TestDatabase } from './database.js';
export { buildFilingHtml, words, type FilingOptions, type FilingSection } from './filing.js';
