import os from 'node:os';
import path from 'node:path';
import fs from 'node:fs';

export const STATE_DIR_ENV = 'ARCHIVE_MIRROR_STATE_DIR';

export function getStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const dir = env[STATE_DIR_ENV] || path.join(os.homedir(), '.archive-mirror');
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  const stats = fs.statSync(dir);
  if (!stats.isDirectory()) {
    throw new Error(`State path is not a directory: ${dir}`);
  }
  return dir;
}
