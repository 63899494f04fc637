/**
 * Progress Reporter
 *
 * Progress display for `radv ingest`. Output modes:
 * - Interactive: ora spinners with real-time updates
 * - JSON: NDJSON event stream for scripts
 * - Text: plain lines for non-TTY environments
 *
 * Spinner updates are throttled to 100ms to prevent flickering.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { IngestResult } from '../../ingest/index.js';

/**
 * Stages of an ingestion run, in order.
 */
export type IngestStage = 'reading' | 'embedding';

const STAGE_LABELS: Record<IngestStage, string> = {
  reading: 'Reading',
  embedding: 'Embedding',
};

const STAGE_UNITS: Record<IngestStage, string> = {
  reading: 'rows read',
  embedding: 'reviews embedded',
};

export interface ProgressReporterOptions {
  /** Output as JSON events instead of human-readable text */
  json: boolean;
  verbose: boolean;
  /** Disable colors (respects NO_COLOR env) */
  noColor: boolean;
  /** Whether stdout is a TTY (for spinner support) */
  isInteractive: boolean;
}

export type ProgressEventType =
  | 'stage_start'
  | 'stage_progress'
  | 'stage_complete'
  | 'warning'
  | 'complete';

/**
 * JSON event emitted in --json mode.
 */
export interface ProgressEvent {
  type: ProgressEventType;
  timestamp: string;
  stage?: IngestStage;
  data: Record<string, unknown>;
}

/**
 * @example
 * ```typescript
 * const reporter = createProgressReporter({ json: false });
 * reporter.startStage('embedding', 1200);
 * reporter.updateProgress(64);
 * reporter.completeStage(1200);
 * reporter.showSummary(result);
 * ```
 */
export class ProgressReporter {
  private spinner: Ora | null = null;
  private currentStage: IngestStage | null = null;
  private currentTotal = 0;
  private lastUpdateTime = 0;

  private static readonly UPDATE_THROTTLE_MS = 100;

  constructor(private readonly options: ProgressReporterOptions) {
    if (options.noColor) {
      chalk.level = 0;
    }
  }

  /**
   * @param total - Expected total items (0 if unknown)
   */
  startStage(stage: IngestStage, total = 0): void {
    this.currentStage = stage;
    this.currentTotal = total;
    this.lastUpdateTime = 0;

    if (this.options.json) {
      this.emitJson({ type: 'stage_start', timestamp: new Date().toISOString(), stage, data: { total } });
      return;
    }

    const label = STAGE_LABELS[stage];
    if (this.options.isInteractive) {
      this.spinner?.stop();
      this.spinner = ora({ text: `${label}...`, prefixText: chalk.cyan(label.padEnd(12)) }).start();
    } else {
      console.log(`${label}...`);
    }
  }

  updateProgress(processed: number): void {
    if (!this.currentStage) return;

    const now = performance.now();
    if (now - this.lastUpdateTime < ProgressReporter.UPDATE_THROTTLE_MS) {
      return;
    }
    this.lastUpdateTime = now;

    if (this.options.json) {
      this.emitJson({
        type: 'stage_progress',
        timestamp: new Date().toISOString(),
        stage: this.currentStage,
        data: { processed, total: this.currentTotal },
      });
      return;
    }

    if (this.spinner && this.currentTotal > 0) {
      const percentage = Math.round((processed / this.currentTotal) * 100);
      this.spinner.text = `${processed}/${this.currentTotal} (${percentage}%)`;
    }
  }

  completeStage(processed: number): void {
    const stage = this.currentStage;
    if (!stage) return;

    if (this.options.json) {
      this.emitJson({
        type: 'stage_complete',
        timestamp: new Date().toISOString(),
        stage,
        data: { processed },
      });
    } else if (this.spinner) {
      this.spinner.succeed(`${processed.toLocaleString()} ${STAGE_UNITS[stage]}`);
    } else {
      console.log(`${STAGE_LABELS[stage]} complete: ${processed.toLocaleString()} ${STAGE_UNITS[stage]}`);
    }

    this.currentStage = null;
    this.spinner = null;
  }

  /**
   * Stop the current spinner with a failure mark.
   */
  fail(message: string): void {
    if (this.spinner) {
      this.spinner.fail(message);
      this.spinner = null;
    }
    this.currentStage = null;
  }

  warn(message: string): void {
    if (this.options.json) {
      this.emitJson({
        type: 'warning',
        timestamp: new Date().toISOString(),
        stage: this.currentStage ?? undefined,
        data: { message },
      });
      return;
    }
    // Keep spinner output clean unless asked for detail
    if (this.options.verbose || !this.options.isInteractive) {
      console.warn(chalk.yellow(`Warning: ${message}`));
    }
  }

  showSummary(result: IngestResult): void {
    if (this.options.json) {
      this.emitJson({ type: 'complete', timestamp: new Date().toISOString(), data: { result } });
      return;
    }

    const title = result.mode === 'loaded' ? 'Index Loaded ✓' : 'Ingest Complete ✓';
    console.log('');
    console.log(chalk.green.bold(title));
    console.log('');
    console.log(`  ${chalk.dim('Reviews indexed:')}  ${result.documentCount.toLocaleString()}`);
    if (result.skippedCount > 0) {
      console.log(`  ${chalk.dim('Rows skipped:')}     ${result.skippedCount.toLocaleString()}`);
    }
    if (result.dimensions !== null) {
      console.log(`  ${chalk.dim('Dimensions:')}       ${result.dimensions}`);
    }
    console.log(`  ${chalk.dim('Time elapsed:')}     ${formatDuration(result.durationMs)}`);
    console.log('');
  }

  private emitJson(event: ProgressEvent): void {
    console.log(JSON.stringify(event));
  }
}

/**
 * Format milliseconds as a human-readable duration.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

export function createProgressReporter(
  options: Partial<ProgressReporterOptions> = {}
): ProgressReporter {
  return new ProgressReporter({
    json: options.json ?? false,
    verbose: options.verbose ?? false,
    noColor: options.noColor ?? !!process.env['NO_COLOR'],
    isInteractive: options.isInteractive ?? (process.stdout.isTTY ?? false),
  });
}
