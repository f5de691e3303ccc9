import path from 'node:path';
import { getBaseUrl, getOptimalConcurrency } from './utils/env-utils';
import * as logger from './utils/logger';
import { acquireLock, releaseLock } from './utils/lock';
import { loadExcludeMatcher, type ExcludeMatcher } from './utils/pattern-utils';
import type { HttpClient } from './interfaces/remote-tree';
import type { SyncOptions, SyncSummary } from './interfaces/sync';
import { createHttpClient } from './core/remote/http-client';
import { createTreeWalker, type TreeWalker } from './core/remote/tree-walker';
import {
  DEFAULT_RETRY_POLICY,
  type RetryPolicy,
  type SleepFn,
} from './core/remote/retry';
import { createFileScanner, type FileScanner } from './core/file-scanner';
import { createDiffPlanner, selectDownloads } from './core/plan/diff-planner';
import { createDownloader } from './core/download/downloader';
import { createProgressTracker } from './core/download/progress-tracker';
import { createRunSummary } from './core/sync/run-summary';

export interface SyncDependencies {
  createHttpClient?: typeof createHttpClient;
  createTreeWalker?: typeof createTreeWalker;
  createFileScanner?: typeof createFileScanner;
  createDownloader?: typeof createDownloader;
  createProgressTracker?: typeof createProgressTracker;
  getOptimalConcurrency?: typeof getOptimalConcurrency;
  acquireLock?: (destDir: string) => void;
  releaseLock?: (destDir: string) => void;
  sleepFn?: SleepFn;
}

export interface PreparedRun {
  verbosity: logger.Verbosity;
  baseUrl: string;
  matcher: ExcludeMatcher;
  retryPolicy: RetryPolicy;
  httpClient: HttpClient;
  walker: TreeWalker;
  scanner: FileScanner;
}

export function resolveRetryPolicy(options: SyncOptions): RetryPolicy {
  return {
    ...DEFAULT_RETRY_POLICY,
    retries: options.retries ?? DEFAULT_RETRY_POLICY.retries,
    baseDelayMs: options.retryDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
  };
}

/**
 * Validate configuration and build the discovery side of a run. Throws on
 * bad exclude patterns or base URL before any request is made.
 */
export async function prepareRun(
  destDir: string,
  options: SyncOptions,
  dependencies: SyncDependencies = {},
): Promise<PreparedRun> {
  const makeHttpClient = dependencies.createHttpClient ?? createHttpClient;
  const makeTreeWalker = dependencies.createTreeWalker ?? createTreeWalker;
  const makeFileScanner = dependencies.createFileScanner ?? createFileScanner;

  const verbosity = logger.resolveVerbosity(options);
  const matcher = await loadExcludeMatcher(options);
  const baseUrl = getBaseUrl(options.baseUrl);
  const retryPolicy = resolveRetryPolicy(options);

  if (matcher.rules.length > 0) {
    logger.verbose(
      `Exclude patterns: ${matcher.rules.map((rule) => rule.source).join(', ')}`,
      verbosity,
    );
  }

  const httpClient = makeHttpClient({ timeoutMs: options.timeoutMs });
  const walker = makeTreeWalker(
    { httpClient, sleepFn: dependencies.sleepFn },
    {
      baseUrl,
      listingConcurrency: options.listingConcurrency,
      retryPolicy,
      verbosity,
      signal: options.signal,
      shouldDescend: (dirPath) => !matcher.isExcludedDirectory(dirPath),
    },
  );
  const scanner = makeFileScanner(destDir, verbosity);

  return { verbosity, baseUrl, matcher, retryPolicy, httpClient, walker, scanner };
}

/**
 * Mirror the remote archive into `destDir`. Discovery, the local scan and
 * downloads overlap: transfers start as soon as the first listing is parsed.
 * Resolves with the run summary; partial failure is reported, not thrown.
 */
export async function syncArchive(
  destDir: string,
  options: SyncOptions,
  dependencies: SyncDependencies = {},
): Promise<SyncSummary> {
  const lock = dependencies.acquireLock ?? acquireLock;
  const unlock = dependencies.releaseLock ?? releaseLock;
  const makeDownloader = dependencies.createDownloader ?? createDownloader;
  const makeProgressTracker =
    dependencies.createProgressTracker ?? createProgressTracker;
  const resolveConcurrency =
    dependencies.getOptimalConcurrency ?? getOptimalConcurrency;

  const run = await prepareRun(destDir, options, dependencies);
  const { verbosity, baseUrl, httpClient, walker, scanner, matcher } = run;
  const { signal } = options;

  lock(destDir);
  try {
    const summary = createRunSummary();
    const concurrency = resolveConcurrency(options.cores);

    logger.info(`Mirroring ${baseUrl} into ${path.resolve(destDir)}`, verbosity);

    // Listing requests start here and run while the local tree is scanned
    const nodes = walker.walk();
    const snapshot = await scanner.scan();
    logger.info(`${snapshot.size} files already present locally.`, verbosity);
    const partialFiles = scanner.getPartialFileCount();
    if (partialFiles > 0) {
      logger.warning(
        `Ignoring ${partialFiles} leftover .part files from an interrupted run.`,
        verbosity,
      );
    }

    const planner = createDiffPlanner(snapshot, matcher);
    const progressTracker = makeProgressTracker(verbosity);
    const downloader = makeDownloader(
      { httpClient, progressTracker, sleepFn: dependencies.sleepFn },
      {
        baseUrl,
        destDir,
        retryPolicy: run.retryPolicy,
        verbosity,
        signal,
        onDiskFull: summary.markDiskFull,
      },
    );

    const downloads = selectDownloads(nodes, planner, (action) => {
      summary.recordAction(action);
      if (action.type === 'download') {
        progressTracker.addPending();
      } else if (action.type === 'skip') {
        logger.verbose(`Excluded ${action.path}`, verbosity);
      }
    });

    progressTracker.initialize();
    progressTracker.startProgressUpdates();
    try {
      await downloader.startDownloads(
        downloads,
        concurrency,
        summary.recordTransfer,
      );
    } finally {
      progressTracker.stopProgressUpdates();
    }

    logger.verbose(
      `Discovered ${planner.getSeenFileCount()} remote files in ${walker.getListedDirectoryCount()} directories.`,
      verbosity,
    );
    const unreachable = walker.getUnreachable();
    summary.recordUnreachable(unreachable);
    summary.setExcludedDirectories(walker.getExcludedDirectoryCount());

    if (signal?.aborted) {
      summary.markCancelled();
      logger.warning('Sync cancelled; orphan detection skipped.', verbosity);
    } else {
      const orphans = planner.findOrphans(unreachable);
      summary.setOrphans(orphans);
      if (orphans.length > 0) {
        logger.warning(
          `${orphans.length} local files no longer exist remotely (run "prune" to review them).`,
          verbosity,
        );
        for (const orphan of orphans) {
          logger.verbose(`  - ${orphan}`, verbosity);
        }
      }
    }

    const result = summary.finish();
    progressTracker.displaySummary(result);
    return result;
  } catch (error) {
    logger.error(`Error during sync: ${logger.errorMessage(error)}`);
    throw error;
  } finally {
    unlock(destDir);
  }
}
