import fs from 'node:fs/promises';
import path from 'node:path';
import * as logger from './utils/logger';
import { acquireLock, releaseLock } from './utils/lock';
import { resolveLocalPath } from './utils/path-utils';
import type { PruneOptions, PruneResult } from './interfaces/sync';
import { createDiffPlanner } from './core/plan/diff-planner';
import { processPool } from './core/pool/work-pool';
import { prepareRun, type SyncDependencies } from './archive-sync';

const DELETE_CONCURRENCY = 4;

/**
 * Remove directories left empty by deletions, deepest first, stopping at
 * `rootDir`.
 */
async function removeEmptyParents(
  rootDir: string,
  deletedFiles: readonly string[],
): Promise<void> {
  const root = path.resolve(rootDir);
  const candidates = new Set<string>();
  for (const file of deletedFiles) {
    let dir = path.dirname(file);
    while (dir.startsWith(root + path.sep)) {
      candidates.add(dir);
      dir = path.dirname(dir);
    }
  }

  const deepestFirst = [...candidates].sort((a, b) => b.length - a.length);
  for (const dir of deepestFirst) {
    try {
      await fs.rmdir(dir);
    } catch (error) {
      const code = logger.errorCode(error);
      if (code !== 'ENOTEMPTY' && code !== 'EEXIST' && code !== 'ENOENT') {
        throw error;
      }
    }
  }
}

/**
 * List local files that no longer exist in the archive and, only when
 * `confirm` is set, delete them. A sync run never deletes anything itself.
 */
export async function pruneOrphans(
  destDir: string,
  options: PruneOptions,
  dependencies: SyncDependencies = {},
): Promise<PruneResult> {
  const lock = dependencies.acquireLock ?? acquireLock;
  const unlock = dependencies.releaseLock ?? releaseLock;

  const run = await prepareRun(destDir, options, dependencies);
  const { verbosity, walker, scanner, matcher } = run;

  lock(destDir);
  try {
    logger.info(`Comparing ${path.resolve(destDir)} with ${run.baseUrl}`, verbosity);
    const nodes = walker.walk();
    const snapshot = await scanner.scan();
    const planner = createDiffPlanner(snapshot, matcher);

    for await (const node of nodes) {
      planner.plan(node);
    }

    if (options.signal?.aborted) {
      throw new Error('Prune cancelled before discovery finished');
    }

    const unreachable = walker.getUnreachable();
    if (unreachable.some((subtree) => subtree.path === '')) {
      throw new Error(
        'The archive root could not be listed; refusing to look for orphans',
      );
    }
    if (unreachable.length > 0) {
      logger.warning(
        `${unreachable.length} directories could not be listed; files under them are kept.`,
        verbosity,
      );
    }

    const orphans = planner.findOrphans(unreachable);
    if (orphans.length === 0) {
      logger.success('No orphaned local files found.', verbosity);
      return { orphans, deleted: [], failed: [] };
    }

    logger.always(`${orphans.length} local files no longer exist remotely:`);
    for (const orphan of orphans) {
      logger.always(`  - ${orphan}`);
    }

    if (!options.confirm) {
      logger.info('Nothing deleted. Re-run with --yes to delete these files.', verbosity);
      return { orphans, deleted: [], failed: [] };
    }

    const results = await processPool(
      orphans,
      async (orphan) => {
        const localPath = resolveLocalPath(destDir, orphan);
        await fs.unlink(localPath);
        return localPath;
      },
      DELETE_CONCURRENCY,
    );

    const deleted: string[] = [];
    const failed: string[] = [];
    const deletedPaths: string[] = [];
    for (const result of results) {
      if (result.success) {
        deleted.push(result.item);
        deletedPaths.push(result.value);
        logger.verbose(`Deleted ${result.item}`, verbosity);
      } else {
        failed.push(result.item);
        logger.error(`Could not delete ${result.item}: ${result.error.message}`);
      }
    }

    await removeEmptyParents(destDir, deletedPaths);
    logger.success(`Deleted ${deleted.length} orphaned files.`, verbosity);
    return { orphans, deleted, failed };
  } finally {
    unlock(destDir);
  }
}
