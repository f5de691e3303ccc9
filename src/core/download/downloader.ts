import crypto from 'node:crypto';
import { createWriteStream } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import * as logger from '../../utils/logger';
import { formatBytes } from '../../utils/format';
import { resolveLocalPath } from '../../utils/path-utils';
import type { HttpClient } from '../../interfaces/remote-tree';
import type { DownloadAction, TransferResult } from '../../interfaces/sync';
import { processStream } from '../pool/work-pool';
import {
  CancelledError,
  HttpStatusError,
  NetworkError,
  isTransientError,
} from '../remote/http-errors';
import {
  DEFAULT_RETRY_POLICY,
  RetryExhaustedError,
  RetryPolicy,
  SleepFn,
  withRetry,
} from '../remote/retry';
import { buildRemoteUrl } from '../remote/tree-walker';
import type { ProgressTracker } from './progress-tracker';

export class IncompleteTransferError extends Error {
  readonly expected: number;
  readonly received: number;

  constructor(relativePath: string, expected: number, received: number) {
    super(
      `Incomplete transfer of ${relativePath}: received ${received} of ${expected} bytes`,
    );
    this.name = 'IncompleteTransferError';
    this.expected = expected;
    this.received = received;
  }
}

export interface DownloaderDeps {
  httpClient: HttpClient;
  progressTracker?: ProgressTracker;
  sleepFn?: SleepFn;
}

export interface DownloaderOptions {
  baseUrl: string;
  destDir: string;
  retryPolicy?: RetryPolicy;
  verbosity?: number;
  signal?: AbortSignal;
  onDiskFull?: () => void;
}

function isFileSystemError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'syscall' in error;
}

function isRetryableTransferError(error: unknown): boolean {
  return error instanceof IncompleteTransferError || isTransientError(error);
}

export function temporaryPathFor(localPath: string): string {
  return `${localPath}.${crypto.randomBytes(4).toString('hex')}.part`;
}

export function createDownloader(
  deps: DownloaderDeps,
  options: DownloaderOptions,
) {
  const { httpClient, progressTracker } = deps;
  const baseUrl = options.baseUrl.replace(/\/+$/, '');
  const policy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;
  const { signal } = options;

  const createdDirectories = new Set<string>();
  let diskFullReported = false;

  const ensureDirectory = async (directory: string): Promise<void> => {
    if (createdDirectories.has(directory)) {
      return;
    }
    // recursive mkdir is a no-op for existing directories
    await fs.mkdir(directory, { recursive: true });
    createdDirectories.add(directory);
  };

  /**
   * Stream one file body to a temporary path beside the destination, check
   * its size and move it into place. The temporary file never survives a
   * failed attempt.
   */
  const transferOnce = async (
    action: DownloadAction,
    url: string,
    localPath: string,
  ): Promise<number> => {
    const tempPath = temporaryPathFor(localPath);
    try {
      const response = await httpClient.fetchStream(url, signal);
      const expected = action.expectedSize ?? response.contentLength;
      let received = 0;

      await pipeline(
        response.body,
        async function* (source: AsyncIterable<Buffer>) {
          for await (const chunk of source) {
            received += chunk.length;
            yield chunk;
          }
        },
        createWriteStream(tempPath, { flags: 'wx' }),
        { signal },
      );

      if (expected !== undefined && received !== expected) {
        throw new IncompleteTransferError(action.path, expected, received);
      }
      if (response.lastModified) {
        await fs.utimes(tempPath, response.lastModified, response.lastModified);
      }
      await fs.rename(tempPath, localPath);
      return received;
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      if (signal?.aborted) {
        throw new CancelledError(`Transfer cancelled: ${action.path}`);
      }
      if (
        error instanceof HttpStatusError ||
        error instanceof NetworkError ||
        error instanceof CancelledError ||
        error instanceof IncompleteTransferError ||
        isFileSystemError(error)
      ) {
        throw error;
      }
      // Anything else came out of the response body stream
      throw new NetworkError(url, logger.errorMessage(error));
    }
  };

  const failure = (
    action: DownloadAction,
    reason: string,
    attempts: number,
    terminal: boolean,
  ): TransferResult => {
    progressTracker?.recordFailure();
    return {
      path: action.path,
      outcome: { status: 'failed', reason, terminal },
      attempts,
      bytes: 0,
    };
  };

  const downloadFile = async (
    action: DownloadAction,
  ): Promise<TransferResult> => {
    let localPath: string;
    try {
      localPath = resolveLocalPath(options.destDir, action.path);
    } catch (error) {
      logger.error(logger.errorMessage(error));
      return failure(action, logger.errorMessage(error), 0, true);
    }
    const url = buildRemoteUrl(baseUrl, action.path, false);
    let attemptsMade = 0;

    try {
      await ensureDirectory(path.dirname(localPath));
      const { value: bytes, attempts } = await withRetry(
        (attempt) => {
          attemptsMade = attempt;
          return transferOnce(action, url, localPath);
        },
        {
          policy,
          signal,
          sleepFn: deps.sleepFn,
          isRetryable: isRetryableTransferError,
          onRetry: (error, retryNumber, delayMs) => {
            logger.warning(
              `Download of ${action.path} failed (${logger.errorMessage(error)}); ` +
                `retry ${retryNumber} of ${policy.retries} in ${delayMs}ms`,
              verbosity,
            );
          },
        },
      );

      progressTracker?.recordSuccess(bytes);
      logger.verbose(`Downloaded ${action.path} (${formatBytes(bytes)})`, verbosity);
      return {
        path: action.path,
        outcome:
          attempts > 1
            ? { status: 'retried', retries: attempts - 1 }
            : { status: 'success' },
        attempts,
        bytes,
      };
    } catch (error) {
      if (error instanceof CancelledError) {
        return failure(action, 'cancelled', attemptsMade, true);
      }
      if (error instanceof RetryExhaustedError) {
        const reason = logger.errorMessage(error.lastError);
        logger.error(`Failed to download ${action.path} after ${error.attempts} attempts: ${reason}`);
        return failure(action, reason, error.attempts, false);
      }
      if (isFileSystemError(error) && error.code === 'ENOSPC') {
        if (!diskFullReported) {
          diskFullReported = true;
          logger.error(
            `Disk full while writing ${action.path}; further downloads are likely to fail`,
          );
        }
        options.onDiskFull?.();
      } else {
        logger.error(`Failed to download ${action.path}: ${logger.errorMessage(error)}`);
      }
      return failure(action, logger.errorMessage(error), attemptsMade, true);
    }
  };

  /**
   * Drain a stream of download actions with `maxConcurrency` workers.
   */
  const startDownloads = async (
    actions: AsyncIterable<DownloadAction>,
    maxConcurrency: number,
    onResult: (result: TransferResult) => void = () => {},
  ): Promise<void> => {
    logger.info(
      `Starting downloads with ${maxConcurrency} concurrent transfers...`,
      verbosity,
    );
    await processStream(
      actions,
      downloadFile,
      maxConcurrency,
      (result) => {
        if (result.success) {
          onResult(result.value);
        } else {
          onResult(failure(result.item, result.error.message, 0, true));
        }
      },
      signal,
    );
  };

  return { downloadFile, startDownloads };
}

export type Downloader = ReturnType<typeof createDownloader>;
