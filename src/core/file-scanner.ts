import type { Dirent } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import * as logger from '../utils/logger';
import type { LocalEntry, LocalSnapshot } from '../interfaces/sync';

/** Suffix of the temporary files a transfer writes before renaming. */
export const PARTIAL_FILE_RE = /\.[0-9a-f]{8}\.part$/;

export function isPartialFileName(name: string): boolean {
  return PARTIAL_FILE_RE.test(name);
}

/**
 * Builds the inventory of regular files under the destination directory.
 * Presence and size only; symlinks and other non-regular entries are not
 * counted as present.
 */
export function createFileScanner(
  rootDir: string,
  verbosity: number = logger.Verbosity.Normal,
) {
  const resolvedRoot = path.resolve(rootDir);
  let partialFiles = 0;

  const scanDirectory = async (
    dir: string,
    entries: Map<string, LocalEntry>,
  ): Promise<void> => {
    let dirents: Dirent[];
    try {
      dirents = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      const code = logger.errorCode(error);
      if (code === 'ENOENT' && dir === resolvedRoot) {
        logger.verbose(`Destination ${dir} does not exist yet`, verbosity);
        return;
      }
      logger.warning(
        `Cannot read directory ${dir}: ${logger.errorMessage(error)}`,
        verbosity,
      );
      return;
    }

    for (const dirent of dirents) {
      const fullPath = path.join(dir, dirent.name);

      if (dirent.isDirectory()) {
        await scanDirectory(fullPath, entries);
        continue;
      }
      if (!dirent.isFile()) {
        continue;
      }
      if (isPartialFileName(dirent.name)) {
        partialFiles++;
        logger.verbose(`Ignoring partial download ${fullPath}`, verbosity);
        continue;
      }

      const relativePath = path
        .relative(resolvedRoot, fullPath)
        .split(path.sep)
        .join('/');
      try {
        const stats = await fs.stat(fullPath);
        entries.set(relativePath, {
          path: relativePath,
          sizeOnDisk: stats.size,
          exists: true,
        });
      } catch (error) {
        logger.warning(
          `Cannot stat ${fullPath}: ${logger.errorMessage(error)}`,
          verbosity,
        );
      }
    }
  };

  const scan = async (): Promise<LocalSnapshot> => {
    partialFiles = 0;
    const entries = new Map<string, LocalEntry>();
    await scanDirectory(resolvedRoot, entries);
    logger.verbose(
      `Found ${entries.size} local files in ${resolvedRoot}`,
      verbosity,
    );
    return entries;
  };

  return {
    scan,
    getRootDir: () => resolvedRoot,
    getPartialFileCount: () => partialFiles,
  };
}

export type FileScanner = ReturnType<typeof createFileScanner>;
