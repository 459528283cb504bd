/**
 * Progress Reporter
 *
 * Displays pipeline progress while documents are ingested.
 * Supports two output modes:
 * - Interactive: ora spinners with real-time updates
 * - Text: one line per stage for non-TTY environments
 *
 * Design decisions:
 * - Throttles spinner updates to prevent flickering (100ms minimum)
 * - Respects NO_COLOR environment variable
 * - Detects TTY automatically for appropriate output mode
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

import type { RAGPipeline } from '../../pipeline/pipeline.js';
import type { InitializeReport, PipelineStage, StageStats } from '../../pipeline/types.js';
import { formatDuration } from '../../utils/index.js';

/**
 * Human-readable labels for each stage.
 */
const STAGE_LABELS: Record<PipelineStage, string> = {
  loading: 'Loading',
  chunking: 'Chunking',
  embedding: 'Embedding',
  indexing: 'Indexing',
};

/**
 * Configuration options for the ProgressReporter.
 */
export interface ProgressReporterOptions {
  /** Show warnings while a spinner is running */
  verbose: boolean;

  /** Disable colors (respects NO_COLOR env) */
  noColor: boolean;

  /** Whether stdout is a TTY (for spinner support) */
  isInteractive: boolean;
}

/**
 * ProgressReporter manages all progress display during ingestion.
 *
 * Usage:
 * ```typescript
 * const reporter = createProgressReporter({ verbose: false });
 * const detach = attachProgressReporter(pipeline, reporter);
 * const report = await pipeline.initialize();
 * detach();
 * reporter.showSummary(report);
 * ```
 */
export class ProgressReporter {
  private options: ProgressReporterOptions;
  private spinner: Ora | null = null;
  private currentStage: PipelineStage | null = null;
  private currentTotal: number = 0;
  private lastUpdateTime: number = 0;
  private warnings: string[] = [];

  /** Minimum time between spinner updates to prevent flickering */
  private static readonly UPDATE_THROTTLE_MS = 100;

  constructor(options: ProgressReporterOptions) {
    this.options = options;

    // Apply NO_COLOR if set
    if (options.noColor) {
      chalk.level = 0;
    }
  }

  /**
   * Start a new stage.
   *
   * @param total - Expected total items (0 if unknown, like while loading)
   */
  startStage(stage: PipelineStage, total: number = 0): void {
    this.currentStage = stage;
    this.currentTotal = total;

    const label = STAGE_LABELS[stage];
    if (this.options.isInteractive) {
      this.spinner?.stop();
      this.spinner = ora({
        text: `${label}...`,
        prefixText: chalk.cyan(label.padEnd(12)),
      }).start();
    } else {
      console.log(`${label}...`);
    }
  }

  /**
   * Update progress within the current stage.
   */
  updateProgress(processed: number, total: number = this.currentTotal): void {
    if (!this.currentStage || !this.spinner) return;

    // Throttle updates to prevent flickering
    const now = performance.now();
    if (now - this.lastUpdateTime < ProgressReporter.UPDATE_THROTTLE_MS) {
      return;
    }
    this.lastUpdateTime = now;

    const percentage = total > 0 ? Math.round((processed / total) * 100) : 0;
    this.spinner.text = `${processed}/${total} (${percentage}%)`;
  }

  /**
   * Mark the current stage as complete.
   */
  completeStage(stats: StageStats): void {
    const summary = `${stats.count.toLocaleString()} ${getStageUnit(stats.stage)}`;

    if (this.options.isInteractive && this.spinner) {
      this.spinner.succeed(`${summary} ${chalk.dim(formatDuration(stats.durationMs))}`);
    } else {
      console.log(`${STAGE_LABELS[stats.stage]} complete: ${summary}`);
    }

    this.currentStage = null;
    this.spinner = null;
  }

  /**
   * Show a status line (backend selection and similar).
   */
  status(message: string): void {
    if (this.options.isInteractive && this.spinner) {
      this.spinner.text = message;
    } else {
      console.log(chalk.dim(message));
    }
  }

  /**
   * Record a warning. While a spinner runs, warnings only print in verbose
   * mode; the summary counts them either way.
   */
  warn(message: string, context?: string): void {
    const contextStr = context ? ` (${context})` : '';
    this.warnings.push(`${message}${contextStr}`);

    if (this.options.verbose || !this.options.isInteractive) {
      console.warn(chalk.yellow(`Warning: ${message}${contextStr}`));
    }
  }

  /**
   * Stop any running spinner, marking it failed.
   */
  fail(message: string): void {
    if (this.spinner) {
      this.spinner.fail(message);
      this.spinner = null;
    }
    this.currentStage = null;
  }

  /**
   * Display the outcome of pipeline.initialize().
   */
  showSummary(report: InitializeReport): void {
    console.log('');

    if (report.state === 'ready') {
      console.log(chalk.green.bold('Documents indexed ✓'));
    } else {
      console.log(chalk.yellow.bold(`Ingestion stopped (state: ${report.state})`));
    }

    console.log('');
    console.log(`  ${chalk.dim('Documents:')}      ${report.documents.toLocaleString()}`);
    console.log(`  ${chalk.dim('Chunks:')}         ${report.chunks.toLocaleString()}`);
    if (report.degradedChunks > 0) {
      console.log(
        `  ${chalk.dim('Degraded:')}       ${chalk.yellow(report.degradedChunks.toLocaleString())}`
      );
    }
    console.log(`  ${chalk.dim('Time elapsed:')}   ${formatDuration(report.durationMs)}`);

    if (this.warnings.length > 0) {
      console.log('');
      console.log(chalk.yellow(`  ${this.warnings.length} warning(s) during ingestion`));
      if (this.options.verbose) {
        for (const warning of this.warnings.slice(0, 5)) {
          console.log(chalk.dim(`    - ${warning}`));
        }
        if (this.warnings.length > 5) {
          console.log(chalk.dim(`    ... and ${this.warnings.length - 5} more`));
        }
      }
    }

    console.log('');
  }

  get warningCount(): number {
    return this.warnings.length;
  }
}

/**
 * Get the unit name for a stage.
 */
function getStageUnit(stage: PipelineStage): string {
  switch (stage) {
    case 'loading':
      return 'documents';
    case 'chunking':
      return 'chunks';
    case 'embedding':
      return 'chunks embedded';
    case 'indexing':
      return 'chunks indexed';
  }
}

/**
 * Create a ProgressReporter with sensible defaults.
 */
export function createProgressReporter(
  options: Partial<ProgressReporterOptions> = {}
): ProgressReporter {
  return new ProgressReporter({
    verbose: options.verbose ?? false,
    noColor: options.noColor ?? !!process.env['NO_COLOR'],
    isInteractive: options.isInteractive ?? (process.stdout.isTTY ?? false),
  });
}

/**
 * Route a pipeline's progress events to a reporter.
 *
 * @returns A function that removes the listeners
 */
export function attachProgressReporter(
  pipeline: RAGPipeline,
  reporter: ProgressReporter
): () => void {
  const onStart = (stage: PipelineStage, total: number): void => reporter.startStage(stage, total);
  const onProgress = (_stage: PipelineStage, processed: number, total: number): void =>
    reporter.updateProgress(processed, total);
  const onComplete = (_stage: PipelineStage, stats: StageStats): void =>
    reporter.completeStage(stats);
  const onWarning = (message: string, context?: string): void => reporter.warn(message, context);

  pipeline.on('stage:start', onStart);
  pipeline.on('progress', onProgress);
  pipeline.on('stage:complete', onComplete);
  pipeline.on('warning', onWarning);

  return () => {
    pipeline.off('stage:start', onStart);
    pipeline.off('progress', onProgress);
    pipeline.off('stage:complete', onComplete);
    pipeline.off('warning', onWarning);
  };
}
