import * as logger from '../../utils/logger';
import { DEFAULT_LISTING_CONCURRENCY } from '../../utils/env-utils';
import type {
  HttpClient,
  ListingEntry,
  RemoteNode,
  UnreachableSubtree,
} from '../../interfaces/remote-tree';
import { createAsyncChannel } from '../pool/async-channel';
import { CancelledError } from './http-errors';
import { parseListing } from './listing-parser';
import {
  DEFAULT_RETRY_POLICY,
  RetryExhaustedError,
  RetryPolicy,
  SleepFn,
  withRetry,
} from './retry';

export interface TreeWalkerDeps {
  httpClient: HttpClient;
  parseListingFn?: (html: string) => ListingEntry[];
  sleepFn?: SleepFn;
}

export interface TreeWalkerOptions {
  baseUrl: string;
  listingConcurrency?: number;
  retryPolicy?: RetryPolicy;
  verbosity?: number;
  signal?: AbortSignal;
  /** Return false to leave a directory (and everything below it) unlisted. */
  shouldDescend?: (relativeDirPath: string) => boolean;
}

export class ListingCycleError extends Error {
  constructor(dirPath: string, resolvedPath: string) {
    super(
      `Listing of ${displayPath(dirPath)} resolved to already visited ${displayPath(resolvedPath)}`,
    );
    this.name = 'ListingCycleError';
  }
}

export function displayPath(relativePath: string): string {
  return `/${relativePath}`;
}

export function buildRemoteUrl(
  baseUrl: string,
  relativePath: string,
  isDirectory: boolean,
): string {
  const encoded = relativePath
    .split('/')
    .filter((segment) => segment.length > 0)
    .map(encodeURIComponent)
    .join('/');
  const trailing = isDirectory && encoded ? '/' : '';
  return `${baseUrl}/${encoded}${trailing}`;
}

/**
 * Map a fetched URL back to a directory path under the archive root,
 * or null when it lies outside it.
 */
export function relativeDirFromUrl(baseUrl: string, url: string): string | null {
  const prefix = `${baseUrl}/`;
  if (!url.startsWith(prefix)) {
    return null;
  }
  const rest = url.slice(prefix.length).split(/[?#]/)[0].replace(/\/+$/, '');
  try {
    return rest
      .split('/')
      .filter((segment) => segment.length > 0)
      .map(decodeURIComponent)
      .join('/');
  } catch {
    return null;
  }
}

/**
 * Discovers the remote tree by fetching directory listings, with its own
 * bound on concurrent listing requests. File and directory nodes are pushed
 * to the returned stream as soon as their parent listing is parsed.
 */
export function createTreeWalker(
  deps: TreeWalkerDeps,
  options: TreeWalkerOptions,
) {
  const { httpClient } = deps;
  const parse = deps.parseListingFn ?? parseListing;
  const baseUrl = options.baseUrl.replace(/\/+$/, '');
  const policy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
  const concurrency = Math.max(
    1,
    Math.floor(options.listingConcurrency ?? DEFAULT_LISTING_CONCURRENCY),
  );
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;
  const { signal, shouldDescend } = options;

  let unreachable: UnreachableSubtree[] = [];
  let excludedDirectories = 0;
  let listedDirectories = 0;

  const fetchListing = async (
    dirPath: string,
    visited: ReadonlySet<string>,
  ): Promise<ListingEntry[]> => {
    const url = buildRemoteUrl(baseUrl, dirPath, true);
    const { value } = await withRetry(
      () => httpClient.fetchText(url, signal),
      {
        policy,
        signal,
        sleepFn: deps.sleepFn,
        onRetry: (error, retryNumber, delayMs) => {
          logger.warning(
            `Listing ${displayPath(dirPath)} failed (${logger.errorMessage(error)}); ` +
              `retry ${retryNumber} of ${policy.retries} in ${delayMs}ms`,
            verbosity,
          );
        },
      },
    );

    const resolved = relativeDirFromUrl(baseUrl, value.url);
    if (resolved !== null && resolved !== dirPath && visited.has(resolved)) {
      throw new ListingCycleError(dirPath, resolved);
    }
    return parse(value.body);
  };

  const walk = (): AsyncIterable<RemoteNode> => {
    unreachable = [];
    excludedDirectories = 0;
    listedDirectories = 0;

    const channel = createAsyncChannel<RemoteNode>();
    const pending: string[] = [''];
    const visited = new Set<string>(['']);
    let active = 0;

    const listDirectory = async (dirPath: string): Promise<void> => {
      try {
        const entries = await fetchListing(dirPath, visited);
        listedDirectories++;
        logger.verbose(
          `Listed ${displayPath(dirPath)} (${entries.length} entries)`,
          verbosity,
        );

        for (const entry of entries) {
          const childPath = dirPath ? `${dirPath}/${entry.name}` : entry.name;

          if (entry.kind === 'directory') {
            if (visited.has(childPath)) {
              continue;
            }
            visited.add(childPath);
            if (shouldDescend && !shouldDescend(childPath)) {
              excludedDirectories++;
              logger.verbose(
                `Excluded directory ${displayPath(childPath)}`,
                verbosity,
              );
              continue;
            }
            channel.push({ path: childPath, kind: 'directory' });
            pending.push(childPath);
          } else if (entry.size === undefined) {
            channel.push({ path: childPath, kind: 'file' });
          } else {
            channel.push({ path: childPath, kind: 'file', sizeHint: entry.size });
          }
        }
      } catch (error) {
        if (error instanceof CancelledError || signal?.aborted) {
          return;
        }
        const attempts = error instanceof RetryExhaustedError ? error.attempts : 1;
        const reason = logger.errorMessage(
          error instanceof RetryExhaustedError ? error.lastError : error,
        );
        unreachable.push({ path: dirPath, reason, attempts });
        logger.warning(
          `Skipping unreachable directory ${displayPath(dirPath)}: ${reason}`,
          verbosity,
        );
      }
    };

    const pump = (): void => {
      while (active < concurrency && !signal?.aborted) {
        const dirPath = pending.pop();
        if (dirPath === undefined) {
          break;
        }
        active++;
        listDirectory(dirPath)
          .finally(() => {
            active--;
            pump();
          })
          .catch((error: unknown) => {
            channel.fail(
              error instanceof Error ? error : new Error(String(error)),
            );
          });
      }
      if (active === 0 && (pending.length === 0 || signal?.aborted)) {
        channel.close();
      }
    };

    pump();
    return channel;
  };

  return {
    walk,
    getUnreachable: (): UnreachableSubtree[] => [...unreachable],
    getExcludedDirectoryCount: () => excludedDirectories,
    getListedDirectoryCount: () => listedDirectories,
  };
}

export type TreeWalker = ReturnType<typeof createTreeWalker>;
