/**
 * Box-drawn tables for CLI output (`fra status`).
 *
 * Columns read their cell from the row with an accessor, so rows can be
 * domain records instead of pre-flattened string maps.
 */

import { stripVTControlCharacters } from 'node:util';
import chalk from 'chalk';

export type Alignment = 'left' | 'right';

export interface Column<T> {
  header: string;
  value: (row: T) => string | number;
  /** Default: left */
  align?: Alignment;
  /** Longer cells are cut to this width and end in "…" */
  maxWidth?: number;
}

const BOX = {
  top: ['┌', '┬', '┐'],
  middle: ['├', '┼', '┤'],
  bottom: ['└', '┴', '┘'],
} as const;

function visibleLength(text: string): number {
  return stripVTControlCharacters(text).length;
}

export function truncateCell(text: string, maxWidth: number): string {
  if (maxWidth < 1 || visibleLength(text) <= maxWidth) {
    return text;
  }
  return `${stripVTControlCharacters(text).slice(0, maxWidth - 1)}…`;
}

function pad(text: string, width: number, align: Alignment): string {
  const padding = ' '.repeat(Math.max(0, width - visibleLength(text)));
  return align === 'right' ? padding + text : text + padding;
}

/**
 * @example
 * ```ts
 * formatTable(
 *   [
 *     { header: 'Source', value: (s) => s.sourceId },
 *     { header: 'Chunks', value: (s) => s.chunkCount, align: 'right' },
 *   ],
 *   [{ sourceId: 'filing-10k', chunkCount: 412 }]
 * );
 * // ┌────────────┬────────┐
 * // │ Source     │ Chunks │
 * // ├────────────┼────────┤
 * // │ filing-10k │    412 │
 * // └────────────┴────────┘
 * ```
 */
export function formatTable<T>(columns: Array<Column<T>>, rows: readonly T[]): string {
  if (columns.length === 0) return '';

  const cells = rows.map((row) =>
    columns.map((col) => {
      const text = String(col.value(row));
      return col.maxWidth === undefined ? text : truncateCell(text, col.maxWidth);
    })
  );

  const widths = columns.map((col, i) =>
    Math.max(visibleLength(col.header), ...cells.map((row) => visibleLength(row[i] ?? '')))
  );

  const rule = ([left, join, right]: readonly [string, string, string]): string =>
    left + widths.map((w) => '─'.repeat(w + 2)).join(join) + right;

  const line = (values: string[], header = false): string => {
    const padded = columns.map((col, i) => {
      const text = pad(values[i] ?? '', widths[i] ?? 0, col.align ?? 'left');
      return header ? chalk.bold(text) : text;
    });
    return `│ ${padded.join(' │ ')} │`;
  };

  return [
    rule(BOX.top),
    line(
      columns.map((col) => col.header),
      true
    ),
    rule(BOX.middle),
    ...cells.map((row) => line(row)),
    rule(BOX.bottom),
  ].join('\n');
}
