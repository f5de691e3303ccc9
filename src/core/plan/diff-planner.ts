import type { RemoteNode, UnreachableSubtree } from '../../interfaces/remote-tree';
import type {
  DownloadAction,
  LocalSnapshot,
  SyncAction,
} from '../../interfaces/sync';
import type { ExcludeMatcher } from '../../utils/pattern-utils';

/**
 * Decide what to do with one remote file. Presence locally is enough for
 * `already-exists`; sizes are not compared.
 */
export function planAction(
  node: RemoteNode,
  snapshot: LocalSnapshot,
  matcher: ExcludeMatcher,
): SyncAction {
  if (matcher.isExcluded(node.path)) {
    return { type: 'skip', path: node.path };
  }
  if (snapshot.has(node.path)) {
    return { type: 'already-exists', path: node.path };
  }
  return node.sizeHint === undefined
    ? { type: 'download', path: node.path }
    : { type: 'download', path: node.path, expectedSize: node.sizeHint };
}

function isWithin(relativePath: string, dirPath: string): boolean {
  return dirPath === '' || relativePath.startsWith(`${dirPath}/`);
}

export function createDiffPlanner(
  snapshot: LocalSnapshot,
  matcher: ExcludeMatcher,
) {
  const seenRemoteFiles = new Set<string>();

  /** Returns null for directory nodes, which never produce an action. */
  const plan = (node: RemoteNode): SyncAction | null => {
    if (node.kind !== 'file') {
      return null;
    }
    seenRemoteFiles.add(node.path);
    return planAction(node, snapshot, matcher);
  };

  /**
   * Local files with no remote counterpart. Excluded paths and paths under
   * a subtree that could not be listed are never orphans.
   */
  const findOrphans = (
    unreachable: readonly UnreachableSubtree[] = [],
  ): string[] => {
    const orphans: string[] = [];
    for (const entry of snapshot.values()) {
      if (seenRemoteFiles.has(entry.path) || matcher.isExcluded(entry.path)) {
        continue;
      }
      if (unreachable.some((subtree) => isWithin(entry.path, subtree.path))) {
        continue;
      }
      orphans.push(entry.path);
    }
    return orphans.sort();
  };

  return {
    plan,
    findOrphans,
    getSeenFileCount: () => seenRemoteFiles.size,
  };
}

export type DiffPlanner = ReturnType<typeof createDiffPlanner>;

/**
 * Map the remote node stream to the stream of downloads, reporting every
 * action (including skips) to `onAction` as it is decided.
 */
export async function* selectDownloads(
  nodes: AsyncIterable<RemoteNode>,
  planner: DiffPlanner,
  onAction: (action: SyncAction) => void = () => {},
): AsyncGenerator<DownloadAction> {
  for await (const node of nodes) {
    const action = planner.plan(node);
    if (!action) {
      continue;
    }
    onAction(action);
    if (action.type === 'download') {
      yield action;
    }
  }
}
