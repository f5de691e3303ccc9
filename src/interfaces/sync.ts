/**
 * Sync planning, transfer and summary interfaces
 */

/**
 * A regular file already present in the destination directory
 */
export interface LocalEntry {
  readonly path: string;
  readonly sizeOnDisk: number;
  readonly exists: true;
}

export type LocalSnapshot = ReadonlyMap<string, LocalEntry>;

export interface DownloadAction {
  type: 'download';
  path: string;
  expectedSize?: number;
}

export interface SkipAction {
  type: 'skip';
  path: string;
}

export interface AlreadyExistsAction {
  type: 'already-exists';
  path: string;
}

export type SyncAction = DownloadAction | SkipAction | AlreadyExistsAction;

export type TransferOutcome =
  | { status: 'success' }
  | { status: 'retried'; retries: number }
  | { status: 'failed'; reason: string; terminal: boolean };

export interface TransferResult {
  path: string;
  outcome: TransferOutcome;
  attempts: number;
  bytes: number;
}

export interface SyncSummary {
  downloaded: number;
  retried: number;
  failed: number;
  skipped: number;
  alreadyPresent: number;
  bytesTransferred: number;
  excludedDirectories: number;
  failedPaths: string[];
  unreachable: Array<{ path: string; reason: string; attempts: number }>;
  orphans: string[];
  diskFull: boolean;
  cancelled: boolean;
  durationMs: number;
}

export interface SyncOptions {
  baseUrl?: string;
  excludes?: string[];
  excludeFiles?: string[];
  cores?: number;
  listingConcurrency?: number;
  retries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  quiet?: boolean;
  verbose?: boolean;
  signal?: AbortSignal;
}

export interface PruneOptions extends SyncOptions {
  confirm?: boolean;
}

export interface PruneResult {
  orphans: string[];
  deleted: string[];
  failed: string[];
}
