import { describe, it, expect } from 'vitest';
import type { RemoteNode } from '../../interfaces/remote-tree';
import type { DownloadAction, LocalEntry, SyncAction } from '../../interfaces/sync';
import { compileExcludes } from '../../utils/pattern-utils';
import { createDiffPlanner, planAction, selectDownloads } from './diff-planner';

function snapshotOf(...paths: string[]): Map<string, LocalEntry> {
  return new Map(paths.map((p) => [p, { path: p, sizeOnDisk: 1, exists: true }]));
}

function file(filePath: string, sizeHint?: number): RemoteNode {
  return sizeHint === undefined
    ? { path: filePath, kind: 'file' }
    : { path: filePath, kind: 'file', sizeHint };
}

async function* nodesOf(nodes: RemoteNode[]): AsyncGenerator<RemoteNode> {
  yield* nodes;
}

describe('planAction', () => {
  const noExcludes = compileExcludes([]);

  it('should download files missing locally with their expected size', () => {
    expect(planAction(file('a.zip', 5), snapshotOf(), noExcludes)).toEqual({
      type: 'download',
      path: 'a.zip',
      expectedSize: 5,
    });
    expect(planAction(file('a.zip'), snapshotOf(), noExcludes)).toEqual({
      type: 'download',
      path: 'a.zip',
    });
  });

  it('should treat any local file at the path as already present', () => {
    expect(planAction(file('x/y/z.bin', 999), snapshotOf('x/y/z.bin'), noExcludes)).toEqual({
      type: 'already-exists',
      path: 'x/y/z.bin',
    });
  });

  it('should skip excluded files even when present locally', () => {
    const matcher = compileExcludes(['*.zip']);
    expect(planAction(file('b/d.zip'), snapshotOf('b/d.zip'), matcher)).toEqual({
      type: 'skip',
      path: 'b/d.zip',
    });
  });
});

describe('createDiffPlanner', () => {
  it('should ignore directory nodes', () => {
    const planner = createDiffPlanner(snapshotOf(), compileExcludes([]));
    expect(planner.plan({ path: 'b', kind: 'directory' })).toBeNull();
    expect(planner.getSeenFileCount()).toBe(0);
  });

  it('should decide exactly one action per remote file', async () => {
    const planner = createDiffPlanner(snapshotOf('b/c.rom'), compileExcludes(['*.zip']));
    const actions: SyncAction[] = [];

    const downloads: DownloadAction[] = [];
    for await (const download of selectDownloads(
      nodesOf([
        file('a.zip'),
        { path: 'b', kind: 'directory' },
        file('b/c.rom'),
        file('b/d.zip'),
        file('b/e.bin', 3),
      ]),
      planner,
      (action) => actions.push(action),
    )) {
      downloads.push(download);
    }

    expect(actions.map((action) => `${action.type}:${action.path}`)).toEqual([
      'skip:a.zip',
      'already-exists:b/c.rom',
      'skip:b/d.zip',
      'download:b/e.bin',
    ]);
    expect(downloads).toEqual([{ type: 'download', path: 'b/e.bin', expectedSize: 3 }]);
    expect(planner.getSeenFileCount()).toBe(4);
  });

  it('should report local files missing remotely as sorted orphans', () => {
    const planner = createDiffPlanner(
      snapshotOf('z-old.bin', 'keep.bin', 'a-old.bin'),
      compileExcludes([]),
    );
    planner.plan(file('keep.bin'));

    expect(planner.findOrphans()).toEqual(['a-old.bin', 'z-old.bin']);
  });

  it('should not report excluded files as orphans', () => {
    const planner = createDiffPlanner(snapshotOf('notes.txt', 'old.bin'), compileExcludes(['*.txt']));

    expect(planner.findOrphans()).toEqual(['old.bin']);
  });

  it('should not report files under unreachable subtrees as orphans', () => {
    const planner = createDiffPlanner(
      snapshotOf('b/c.rom', 'bb/d.rom', 'e.bin'),
      compileExcludes([]),
    );

    expect(planner.findOrphans([{ path: 'b', reason: 'HTTP 404', attempts: 1 }])).toEqual([
      'bb/d.rom',
      'e.bin',
    ]);
    expect(planner.findOrphans([{ path: '', reason: 'HTTP 404', attempts: 1 }])).toEqual([]);
  });
});
