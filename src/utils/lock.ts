import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import { errorCode } from './logger';
import { getStateDir } from './state-dir';

/**
 * Another live process is syncing the same destination.
 */
export class LockHeldError extends Error {
  readonly pid: number;
  readonly lockPath: string;

  constructor(destDir: string, pid: number, lockPath: string) {
    super(
      `Another sync of ${destDir} is already running (PID: ${pid}). ` +
        `Delete ${lockPath} if the process is no longer running.`,
    );
    this.name = 'LockHeldError';
    this.pid = pid;
    this.lockPath = lockPath;
  }
}

const activeLocks = new Set<string>();
let cleanupRegistered = false;

function removeOwnedLock(lockPath: string): void {
  try {
    if (!fs.existsSync(lockPath)) {
      return;
    }
    const pid = Number.parseInt(fs.readFileSync(lockPath, 'utf8').trim(), 10);
    if (!Number.isNaN(pid) && pid !== process.pid) {
      return;
    }
    fs.unlinkSync(lockPath);
  } catch {
    // Best effort on exit; a stale lock is replaced on the next run
  }
}

function cleanupAllLocks(): void {
  for (const lockPath of activeLocks) {
    removeOwnedLock(lockPath);
  }
  activeLocks.clear();
}

function registerCleanupHandler(): void {
  if (cleanupRegistered) {
    return;
  }
  process.once('exit', cleanupAllLocks);
  cleanupRegistered = true;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    return errorCode(e) === 'EPERM';
  }
}

function tryCreateLockFile(lockPath: string): boolean {
  try {
    const fd = fs.openSync(lockPath, 'wx', 0o600);
    try {
      fs.writeFileSync(fd, String(process.pid));
    } finally {
      fs.closeSync(fd);
    }
    return true;
  } catch (e) {
    if (errorCode(e) === 'EEXIST') {
      return false;
    }
    throw e;
  }
}

function readLockPid(lockPath: string): number | null | 'missing' {
  try {
    const parsed = Number.parseInt(
      fs.readFileSync(lockPath, 'utf8').trim(),
      10,
    );
    return Number.isNaN(parsed) ? null : parsed;
  } catch (e) {
    if (errorCode(e) === 'ENOENT') {
      return 'missing';
    }
    throw e;
  }
}

/**
 * Lock file path for one destination directory. Runs against different
 * destinations do not block each other.
 */
export function getLockPath(
  destDir: string,
  stateDir: string = getStateDir(),
): string {
  const digest = crypto
    .createHash('sha256')
    .update(path.resolve(destDir))
    .digest('hex')
    .slice(0, 16);
  return path.join(stateDir, `lock-${digest}`);
}

export function acquireLock(
  destDir: string,
  stateDir: string = getStateDir(),
): void {
  registerCleanupHandler();

  const lockPath = getLockPath(destDir, stateDir);
  if (activeLocks.has(lockPath)) {
    return;
  }
  fs.mkdirSync(stateDir, { recursive: true, mode: 0o700 });

  for (let attempt = 0; attempt < 3; attempt++) {
    if (tryCreateLockFile(lockPath)) {
      activeLocks.add(lockPath);
      return;
    }

    const pid = readLockPid(lockPath);
    if (pid === 'missing') {
      continue;
    }

    if (pid === process.pid) {
      activeLocks.add(lockPath);
      return;
    }

    if (pid !== null && isProcessAlive(pid)) {
      throw new LockHeldError(destDir, pid, lockPath);
    }

    try {
      fs.unlinkSync(lockPath);
    } catch (e) {
      if (errorCode(e) !== 'ENOENT') {
        throw e;
      }
    }
  }

  throw new Error(
    `Failed to acquire lock at ${lockPath}. Please retry the sync command.`,
  );
}

export function releaseLock(
  destDir: string,
  stateDir: string = getStateDir(),
): void {
  const lockPath = getLockPath(destDir, stateDir);
  if (!activeLocks.has(lockPath)) {
    return;
  }
  removeOwnedLock(lockPath);
  activeLocks.delete(lockPath);
}
