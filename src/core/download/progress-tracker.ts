/**
 * ProgressTracker
 * Draws a one-line transfer bar and prints the run summary.
 */

import chalk from 'chalk';
import * as logger from '../../utils/logger';
import { formatBytes, formatDuration } from '../../utils/format';
import type { SyncSummary } from '../../interfaces/sync';

type WriteFn = typeof process.stdout.write;

export class ProgressTracker {
  verbosity: number;
  totalFiles: number;
  completedFiles: number;
  failedFiles: number;
  bytesTransferred: number;
  updateInterval: NodeJS.Timeout | null;
  isTrackingActive: boolean;
  hasDrawnProgressBar: boolean;
  private readonly interactive: boolean;
  private readonly originalStdoutWrite: WriteFn;
  private readonly originalStderrWrite: WriteFn;

  /**
   * @param interactive - draw the bar; defaults to whether stdout is a TTY
   */
  constructor(
    verbosity: number = logger.Verbosity.Normal,
    interactive: boolean = Boolean(process.stdout.isTTY),
  ) {
    this.verbosity = verbosity;
    this.totalFiles = 0;
    this.completedFiles = 0;
    this.failedFiles = 0;
    this.bytesTransferred = 0;
    this.updateInterval = null;
    this.isTrackingActive = false;
    this.hasDrawnProgressBar = false;
    this.interactive = interactive && verbosity > logger.Verbosity.Quiet;
    this.originalStdoutWrite = process.stdout.write.bind(process.stdout);
    this.originalStderrWrite = process.stderr.write.bind(process.stderr);
  }

  /**
   * Reset counters. The total grows through `addPending` while the remote
   * tree is still being discovered.
   */
  initialize(totalFiles: number = 0) {
    this.totalFiles = totalFiles;
    this.completedFiles = 0;
    this.failedFiles = 0;
    this.bytesTransferred = 0;
    this.hasDrawnProgressBar = false;
  }

  addPending(count: number = 1) {
    this.totalFiles += count;
  }

  recordSuccess(bytes: number = 0) {
    this.completedFiles++;
    this.bytesTransferred += bytes;
  }

  recordFailure() {
    this.failedFiles++;
  }

  /**
   * Wrap a stream's write so other output clears the bar first and the bar
   * is redrawn below it.
   */
  private intercept(original: WriteFn): WriteFn {
    const tracker = this;
    return function (this: unknown, ...args: Parameters<WriteFn>): boolean {
      if (!tracker.isTrackingActive) {
        return original(...args);
      }
      if (tracker.hasDrawnProgressBar) {
        tracker.originalStdoutWrite('\r\x1B[K');
        tracker.hasDrawnProgressBar = false;
      }
      const result = original(...args);
      if (String(args[0]).includes('\n')) {
        tracker.originalStdoutWrite(tracker.renderBar() + '\x1B[K');
        tracker.hasDrawnProgressBar = true;
      }
      return result;
    } as WriteFn;
  }

  private setupOutputInterception() {
    process.stdout.write = this.intercept(this.originalStdoutWrite);
    process.stderr.write = this.intercept(this.originalStderrWrite);
  }

  private restoreOutput() {
    process.stdout.write = this.originalStdoutWrite;
    process.stderr.write = this.originalStderrWrite;
  }

  /**
   * Progress bar string (pure computation, no I/O)
   */
  renderBar(): string {
    const processed = this.completedFiles + this.failedFiles;
    const percentage = this.getProgressPercentage();
    const barWidth = 30;
    const completeWidth = Math.floor((percentage / 100) * barWidth);
    const bar =
      chalk.green('█'.repeat(completeWidth)) +
      '░'.repeat(barWidth - completeWidth);
    const failed =
      this.failedFiles > 0 ? chalk.red(` | ${this.failedFiles} failed`) : '';
    return `[${bar}] ${percentage}% | ${processed}/${this.totalFiles} | ${formatBytes(this.bytesTransferred)}${failed}`;
  }

  startProgressUpdates(intervalMs = 250) {
    this.stopProgressUpdates();
    if (!this.interactive) {
      return;
    }
    this.isTrackingActive = true;
    this.setupOutputInterception();
    this.updateInterval = setInterval(() => this.displayProgress(), intervalMs);
    this.displayProgress();
  }

  stopProgressUpdates() {
    if (this.updateInterval) {
      clearInterval(this.updateInterval);
      this.updateInterval = null;
    }
    if (!this.isTrackingActive) {
      return;
    }
    this.isTrackingActive = false;
    this.restoreOutput();
    if (this.hasDrawnProgressBar) {
      this.originalStdoutWrite('\r\x1B[K');
      this.hasDrawnProgressBar = false;
    }
  }

  displayProgress() {
    if (!this.isTrackingActive) {
      return;
    }
    this.originalStdoutWrite('\r' + this.renderBar() + '\x1B[K');
    this.hasDrawnProgressBar = true;
  }

  /**
   * Final summary, printed regardless of verbosity
   */
  displaySummary(summary: SyncSummary) {
    this.stopProgressUpdates();

    const counts =
      `${summary.downloaded} downloaded (${formatBytes(summary.bytesTransferred)}), ` +
      `${summary.alreadyPresent} already present, ${summary.skipped} excluded, ` +
      `${summary.failed} failed`;
    const tail = ` in ${formatDuration(summary.durationMs)}`;

    if (summary.cancelled) {
      logger.always(chalk.yellow(`Sync cancelled: ${counts}${tail}`));
    } else if (summary.failed === 0 && summary.unreachable.length === 0) {
      logger.always(chalk.green(`Sync completed: ${counts}${tail}`));
    } else {
      logger.always(chalk.yellow(`Sync completed with issues: ${counts}${tail}`));
    }

    if (summary.unreachable.length > 0) {
      logger.always(
        chalk.red(`${summary.unreachable.length} directories could not be listed:`),
      );
      for (const subtree of summary.unreachable) {
        logger.always(chalk.red(`  - /${subtree.path}: ${subtree.reason}`));
      }
    }
    if (summary.diskFull) {
      logger.always(
        chalk.red.bold('Disk full: free space in the destination and re-run.'),
      );
    }
  }

  getProgressPercentage() {
    const processed = this.completedFiles + this.failedFiles;
    return this.totalFiles > 0
      ? Math.floor((processed / this.totalFiles) * 100)
      : 0;
  }
}

export function createProgressTracker(
  verbosity: number = logger.Verbosity.Normal,
  interactive?: boolean,
): ProgressTracker {
  return new ProgressTracker(verbosity, interactive);
}
