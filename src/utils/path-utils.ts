import path from 'node:path';

/**
 * Normalize a remote relative path, rejecting anything that would escape
 * the destination root.
 */
export function normalizeSafeRelativePath(relativePath: string): string {
  const normalized = path.posix.normalize(
    relativePath.replace(/\\/g, '/').replace(/^\/+/, ''),
  );
  if (
    normalized === '' ||
    normalized === '.' ||
    normalized === '..' ||
    normalized.startsWith('../') ||
    path.posix.isAbsolute(normalized)
  ) {
    throw new Error(`Path traversal detected: ${relativePath}`);
  }
  return normalized;
}

/**
 * Absolute local path for a remote relative path under `rootDir`.
 */
export function resolveLocalPath(rootDir: string, relativePath: string): string {
  const normalized = normalizeSafeRelativePath(relativePath);
  return path.join(path.resolve(rootDir), ...normalized.split('/'));
}
