import type { UnreachableSubtree } from '../../interfaces/remote-tree';
import type {
  SyncAction,
  SyncSummary,
  TransferResult,
} from '../../interfaces/sync';

/**
 * Run-scoped aggregator for action counts and transfer outcomes. One is
 * created per run and handed to the planner and the workers.
 */
export function createRunSummary(now: () => number = () => Date.now()) {
  const startedAt = now();
  const state: SyncSummary = {
    downloaded: 0,
    retried: 0,
    failed: 0,
    skipped: 0,
    alreadyPresent: 0,
    bytesTransferred: 0,
    excludedDirectories: 0,
    failedPaths: [],
    unreachable: [],
    orphans: [],
    diskFull: false,
    cancelled: false,
    durationMs: 0,
  };

  const recordAction = (action: SyncAction): void => {
    switch (action.type) {
      case 'skip':
        state.skipped++;
        break;
      case 'already-exists':
        state.alreadyPresent++;
        break;
      case 'download':
        break;
    }
  };

  const recordTransfer = (result: TransferResult): void => {
    state.bytesTransferred += result.bytes;
    switch (result.outcome.status) {
      case 'success':
        state.downloaded++;
        break;
      case 'retried':
        state.downloaded++;
        state.retried++;
        break;
      case 'failed':
        state.failed++;
        state.failedPaths.push(result.path);
        break;
    }
  };

  const recordUnreachable = (subtrees: readonly UnreachableSubtree[]): void => {
    state.unreachable.push(...subtrees);
  };

  const finish = (): SyncSummary => ({
    ...state,
    failedPaths: [...state.failedPaths].sort(),
    unreachable: [...state.unreachable],
    orphans: [...state.orphans],
    durationMs: now() - startedAt,
  });

  return {
    recordAction,
    recordTransfer,
    recordUnreachable,
    setExcludedDirectories: (count: number) => {
      state.excludedDirectories = count;
    },
    setOrphans: (orphans: readonly string[]) => {
      state.orphans = [...orphans];
    },
    markDiskFull: () => {
      state.diskFull = true;
    },
    markCancelled: () => {
      state.cancelled = true;
    },
    finish,
  };
}

export type RunSummary = ReturnType<typeof createRunSummary>;

/**
 * Process exit code for a finished run: nonzero when any file failed
 * terminally or any subtree could not be listed.
 */
export function summaryExitCode(summary: SyncSummary): number {
  return summary.failed > 0 ||
    summary.unreachable.length > 0 ||
    summary.cancelled
    ? 1
    : 0;
}
