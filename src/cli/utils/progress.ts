/**
 * Progress Reporter
 *
 * Shows index-build progress. Three output modes:
 * - Interactive: one ora spinner per phase
 * - JSON: NDJSON events on stdout
 * - Text: a line per phase for non-TTY output
 *
 * Spinner updates are throttled to 100ms so embedding batches don't flicker.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { IndexPhase, IndexProgress, IndexSummary } from '../../indexer/types.js';

const PHASE_LABELS: Record<IndexPhase, string> = {
  parsing: 'Parsing',
  chunking: 'Chunking',
  embedding: 'Embedding',
  storing: 'Storing',
};

const PHASE_UNITS: Record<IndexPhase, string> = {
  parsing: 'blocks',
  chunking: 'chunks',
  embedding: 'chunks embedded',
  storing: 'chunks stored',
};

export interface ProgressReporterOptions {
  /** NDJSON events instead of human-readable text */
  json: boolean;
  /** Whether stdout is a TTY (for spinner support) */
  isInteractive: boolean;
}

export type ProgressEventType = 'phase_start' | 'phase_progress' | 'phase_complete' | 'complete';

/**
 * JSON event emitted in --json mode.
 */
export interface ProgressEvent {
  type: ProgressEventType;
  timestamp: string;
  phase?: IndexPhase;
  data: Record<string, unknown>;
}

/**
 * Turns IndexProgress callbacks into terminal output.
 *
 * A new phase closes the previous one, so the indexer only has to report
 * progress; the reporter works out where phases begin and end.
 *
 * @example
 * ```typescript
 * const reporter = new ProgressReporter({ json: false, isInteractive: true });
 * const indexer = createDocumentIndexer(config, { onProgress: (p) => reporter.update(p) });
 * const summary = await indexer.ensureIndex(path, sourceId);
 * reporter.finish(summary);
 * ```
 */
export class ProgressReporter {
  private spinner: Ora | null = null;
  private current: IndexProgress | null = null;
  private lastUpdateTime = 0;

  private static readonly UPDATE_THROTTLE_MS = 100;

  constructor(
    private readonly options: ProgressReporterOptions,
    private readonly emit: (line: string) => void = (line) => console.log(line)
  ) {}

  update(progress: IndexProgress): void {
    if (this.current?.phase !== progress.phase) {
      this.completePhase();
      this.startPhase(progress);
    }
    this.current = progress;

    const now = performance.now();
    if (now - this.lastUpdateTime < ProgressReporter.UPDATE_THROTTLE_MS && progress.processed < progress.total) {
      return;
    }
    this.lastUpdateTime = now;

    if (this.options.json) {
      this.emitJson({
        type: 'phase_progress',
        phase: progress.phase,
        data: { processed: progress.processed, total: progress.total },
      });
    } else if (this.spinner) {
      this.spinner.text = formatCount(progress);
    }
  }

  /**
   * Close the last phase and print the summary.
   */
  finish(summary: IndexSummary): void {
    this.completePhase();

    if (this.options.json) {
      this.emitJson({ type: 'complete', data: { summary } });
      return;
    }

    this.emit('');
    this.emit(chalk.green.bold(summary.cached ? 'Index Loaded ✓' : 'Index Complete ✓'));
    this.emit('');
    this.emit(`  ${chalk.dim('Source:')}         ${summary.sourceId}`);
    this.emit(`  ${chalk.dim('Chunks:')}         ${summary.chunkCount.toLocaleString()}`);
    this.emit(`  ${chalk.dim('Pages:')}          ${summary.pageCount} (${summary.pageStrategy})`);
    this.emit(`  ${chalk.dim('Sections:')}       ${summary.sections.length}`);
    this.emit(`  ${chalk.dim('Embedding:')}      ${summary.embeddingModel}`);
    this.emit(`  ${chalk.dim('Time elapsed:')}   ${formatDuration(summary.durationMs)}`);
  }

  /**
   * Stop any running spinner as failed.
   */
  fail(message: string): void {
    this.spinner?.fail(message);
    this.spinner = null;
    this.current = null;
  }

  private startPhase(progress: IndexProgress): void {
    const label = PHASE_LABELS[progress.phase];

    if (this.options.json) {
      this.emitJson({ type: 'phase_start', phase: progress.phase, data: { total: progress.total } });
    } else if (this.options.isInteractive) {
      this.spinner = ora({ text: `${label}...`, prefixText: chalk.cyan(label.padEnd(12)) }).start();
    } else {
      this.emit(`${label}...`);
    }
  }

  private completePhase(): void {
    const done = this.current;
    if (done === null) return;

    if (this.options.json) {
      this.emitJson({
        type: 'phase_complete',
        phase: done.phase,
        data: { processed: done.processed, total: done.total },
      });
    } else if (this.spinner) {
      this.spinner.succeed(`${done.processed.toLocaleString()} ${PHASE_UNITS[done.phase]}`);
    } else {
      this.emit(`${PHASE_LABELS[done.phase]} complete: ${done.processed.toLocaleString()} ${PHASE_UNITS[done.phase]}`);
    }

    this.spinner = null;
    this.current = null;
  }

  private emitJson(event: Omit<ProgressEvent, 'timestamp'>): void {
    this.emit(JSON.stringify({ ...event, timestamp: new Date().toISOString() }));
  }
}

function formatCount(progress: IndexProgress): string {
  if (progress.total <= 0) {
    return `${progress.processed}`;
  }
  const percentage = Math.round((progress.processed / progress.total) * 100);
  return `${progress.processed}/${progress.total} (${percentage}%)`;
}

/**
 * "850ms", "4.2s" or "2m 05s".
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${String(seconds).padStart(2, '0')}s`;
}
