import { Cron } from 'croner';
import * as logger from '../../utils/logger';
import { formatBytes, formatDuration } from '../../utils/format';
import { LockHeldError } from '../../utils/lock';
import { syncArchive } from '../../archive-sync';
import { summaryExitCode } from '../sync/run-summary';
import type { SyncOptions, SyncSummary } from '../../interfaces/sync';

type SignalName = 'SIGINT' | 'SIGTERM';

interface CronJob {
  stop: () => void;
  resume: () => unknown;
  nextRun: () => Date | null;
}

type CronConstructor = new (
  pattern: string,
  options: { name?: string; protect?: boolean; paused?: boolean },
  callback: () => Promise<void>,
) => CronJob;

export type ScheduledRunOutcome =
  | { status: 'completed'; summary: SyncSummary; exitCode: number }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; reason: string };

export interface ScheduledRun {
  startedAt: Date;
  outcome: ScheduledRunOutcome;
}

export interface SyncDaemonConfig {
  destDir: string;
  schedule: string;
  syncOptions: SyncOptions;
}

export interface SyncDaemonOptions {
  verbosity?: number;
  cronConstructor?: CronConstructor;
  syncArchiveFn?: (
    destDir: string,
    options: SyncOptions,
  ) => Promise<SyncSummary>;
  nowDateFn?: () => Date;
  registerSignalHandler?: (
    signal: SignalName,
    handler: () => void,
  ) => () => void;
}

function describeSummary(summary: SyncSummary): string {
  return (
    `${summary.downloaded} downloaded (${formatBytes(summary.bytesTransferred)}), ` +
    `${summary.alreadyPresent} already present, ${summary.failed} failed, ` +
    `${summary.unreachable.length} unreachable directories`
  );
}

/**
 * Exit code of the latest run that got as far as syncing. Skipped ticks
 * leave it unchanged.
 */
export function daemonExitCode(runs: readonly ScheduledRun[]): number {
  for (let i = runs.length - 1; i >= 0; i--) {
    const { outcome } = runs[i];
    if (outcome.status === 'completed') {
      return outcome.exitCode;
    }
    if (outcome.status === 'failed') {
      return 1;
    }
  }
  return 0;
}

/**
 * Keeps one destination mirrored on a cron schedule.
 *
 * A tick that finds a sync of the destination still running, in this
 * process or behind another process's lock, is recorded as skipped. The
 * first SIGINT or SIGTERM stops the schedule and cancels the sync in flight;
 * `start` then resolves with the exit code of the last sync.
 */
export function createSyncDaemon(
  config: SyncDaemonConfig,
  options: SyncDaemonOptions = {},
) {
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;
  const CronImpl: CronConstructor = options.cronConstructor ?? Cron;
  const runSync = options.syncArchiveFn ?? syncArchive;
  const nowDate = options.nowDateFn ?? (() => new Date());
  const registerSignalHandler =
    options.registerSignalHandler ??
    ((signal: SignalName, handler: () => void) => {
      process.on(signal, handler);
      return () => {
        process.off(signal, handler);
      };
    });

  const controller = new AbortController();
  const runs: ScheduledRun[] = [];
  let inFlight: Promise<ScheduledRun> | null = null;

  const execute = async (): Promise<ScheduledRunOutcome> => {
    try {
      const summary = await runSync(config.destDir, {
        ...config.syncOptions,
        signal: controller.signal,
      });
      const exitCode = summaryExitCode(summary);
      const line = `Sync of ${config.destDir} finished in ${formatDuration(summary.durationMs)}: ${describeSummary(summary)}`;
      if (exitCode === 0) {
        logger.success(line, verbosity);
      } else {
        logger.warning(line, verbosity);
      }
      return { status: 'completed', summary, exitCode };
    } catch (error) {
      if (error instanceof LockHeldError) {
        logger.warning(`Skipping sync: ${error.message}`, verbosity);
        return { status: 'skipped', reason: error.message };
      }
      const reason = logger.errorMessage(error);
      logger.error(`Scheduled sync failed: ${reason}`);
      return { status: 'failed', reason };
    }
  };

  const runNow = (): Promise<ScheduledRun> => {
    const startedAt = nowDate();
    if (inFlight !== null) {
      const run: ScheduledRun = {
        startedAt,
        outcome: { status: 'skipped', reason: 'previous sync still running' },
      };
      logger.warning(
        `Skipping sync of ${config.destDir}: previous sync still running`,
        verbosity,
      );
      runs.push(run);
      return Promise.resolve(run);
    }

    logger.info(
      `Sync of ${config.destDir} started at ${startedAt.toISOString()}`,
      verbosity,
    );
    const pending = execute().then((outcome) => {
      const run: ScheduledRun = { startedAt, outcome };
      runs.push(run);
      inFlight = null;
      return run;
    });
    inFlight = pending;
    return pending;
  };

  const start = async (): Promise<number> => {
    let job: CronJob;
    try {
      job = new CronImpl(
        config.schedule,
        { name: `sync ${config.destDir}`, protect: true, paused: true },
        async () => {
          await runNow();
        },
      );
    } catch (error) {
      throw new Error(
        `Invalid cron expression: ${config.schedule} (${logger.errorMessage(error)})`,
      );
    }

    const stopped = new Promise<void>((resolve) => {
      let unregisterSigint: () => void = () => {};
      let unregisterSigterm: () => void = () => {};
      const shutdown = () => {
        if (controller.signal.aborted) {
          return;
        }
        logger.info('\nShutting down sync daemon...', verbosity);
        job.stop();
        controller.abort();
        unregisterSigint();
        unregisterSigterm();
        resolve();
      };
      unregisterSigint = registerSignalHandler('SIGINT', shutdown);
      unregisterSigterm = registerSignalHandler('SIGTERM', shutdown);
    });

    logger.info(
      `Sync daemon for ${config.destDir} on schedule "${config.schedule}"`,
      verbosity,
    );
    await runNow();

    if (!controller.signal.aborted) {
      job.resume();
      logger.info(
        `Next sync at ${job.nextRun()?.toISOString() ?? 'unknown'}`,
        verbosity,
      );
    }

    await stopped;
    await inFlight;
    return daemonExitCode(runs);
  };

  return { start, runNow };
}
