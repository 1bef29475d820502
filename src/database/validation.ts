/**
 * Database Row Validation
 *
 * Zod schemas for validating database reads at runtime, so a stale or
 * hand-edited database fails loudly instead of yielding bad chunks.
 *
 * Usage:
 * ```ts
 * const row = db.prepare('SELECT * FROM sources WHERE source_id = ?').get(id);
 * return row ? validateRow(SourceRowSchema, row, `sources.source_id=${id}`) : undefined;
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { CLIError, ExitCode } from '../errors/types.js';

// ============================================================================
// Row Schemas
// ============================================================================

export const SourceRowSchema = z.object({
  source_id: z.string(),
  document_path: z.string().nullable(),
  content_hash: z.string(),
  embedding_model: z.string(),
  embedding_dimensions: z.number().int().positive(),
  chunk_count: z.number().int().nonnegative(),
  page_count: z.number().int().nonnegative(),
  page_strategy: z.enum(['markers', 'estimated']),
  indexed_at: z.string(),
});

export type SourceRow = z.infer<typeof SourceRowSchema>;

/**
 * `embedding` is a BLOB, which better-sqlite3 returns as a Buffer.
 */
export const ChunkRowSchema = z.object({
  source_id: z.string(),
  chunk_index: z.number().int().nonnegative(),
  content: z.string(),
  section: z.string(),
  page: z.number().int().positive(),
  word_start: z.number().int().nonnegative(),
  word_end: z.number().int().nonnegative(),
  embedding: z.instanceof(Buffer),
});

export type ChunkRow = z.infer<typeof ChunkRowSchema>;

export const CountRowSchema = z.object({ count: z.number().int().nonnegative() });

// ============================================================================
// Error Class
// ============================================================================

/**
 * Thrown when a database row doesn't match its schema.
 */
export class SchemaValidationError extends CLIError {
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const issues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));

    const summary = issues
      .slice(0, 3)
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');
    const more = issues.length > 3 ? `\n  ... and ${issues.length - 3} more` : '';

    super(
      message,
      `Schema validation failed:\n${summary}${more}\n\nRebuild the index with: fra index --force`,
      ExitCode.Database
    );
    this.name = 'SchemaValidationError';
    this.issues = issues;
  }
}

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Validate a single database row against a Zod schema.
 *
 * @throws SchemaValidationError if validation fails
 */
export function validateRow<T extends z.ZodSchema>(schema: T, row: unknown, context: string): z.output<T> {
  const result = schema.safeParse(row);
  if (result.success) {
    return result.data;
  }
  throw new SchemaValidationError(`Database schema mismatch in ${context}`, result.error.issues);
}

/**
 * Validate every row; the first bad row aborts with its index in the message.
 */
export function validateRows<T extends z.ZodSchema>(schema: T, rows: unknown[], context: string): z.output<T>[] {
  return rows.map((row, i) => validateRow(schema, row, `${context}[${i}]`));
}
