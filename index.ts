#!/usr/bin/env tsx

import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';
import { syncArchive } from './src/archive-sync';
import { pruneOrphans } from './src/orphan-prune';
import { createSyncDaemon } from './src/core/scheduler/scheduler';
import { summaryExitCode } from './src/core/sync/run-summary';
import { parseIntegerFlag } from './src/utils/env-utils';
import { bold, red, resolveVerbosity, yellow } from './src/utils/logger';
import type { SyncOptions } from './src/interfaces/sync';

function readVersion(): string {
  try {
    const raw = fs.readFileSync(new URL('./package.json', import.meta.url), 'utf8');
    const parsed: unknown = JSON.parse(raw);
    if (
      typeof parsed === 'object' &&
      parsed !== null &&
      'version' in parsed &&
      typeof parsed.version === 'string'
    ) {
      return parsed.version;
    }
  } catch {
    // fall through to 'unknown'
  }
  return 'unknown';
}

const sharedOptions = {
  'base-url': { type: 'string' },
  exclude: { type: 'string', multiple: true },
  'exclude-file': { type: 'string', multiple: true },
  'listing-concurrency': { type: 'string' },
  retries: { type: 'string' },
  'retry-delay': { type: 'string' },
  timeout: { type: 'string' },
  quiet: { type: 'boolean' },
  verbose: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

export function parseSyncArgs(args: string[]) {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...sharedOptions,
      cores: { type: 'string' },
      schedule: { type: 'string' },
      daemon: { type: 'boolean' },
      version: { type: 'boolean', short: 'v' },
    },
    allowPositionals: true,
  });

  return { ...values, destDir: positionals[0] };
}

export function parsePruneArgs(args: string[]) {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...sharedOptions,
      yes: { type: 'boolean', short: 'y' },
    },
    allowPositionals: true,
  });

  return { ...values, destDir: positionals[0] };
}

type SharedValues = {
  'base-url'?: string;
  exclude?: string[];
  'exclude-file'?: string[];
  'listing-concurrency'?: string;
  retries?: string;
  'retry-delay'?: string;
  timeout?: string;
  quiet?: boolean;
  verbose?: boolean;
};

export function toSyncOptions(values: SharedValues & { cores?: string }): SyncOptions {
  return {
    baseUrl: values['base-url'],
    excludes: values.exclude ?? [],
    excludeFiles: values['exclude-file'] ?? [],
    cores: parseIntegerFlag(values.cores, 'cores', 1),
    listingConcurrency: parseIntegerFlag(
      values['listing-concurrency'],
      'listing-concurrency',
      1,
    ),
    retries: parseIntegerFlag(values.retries, 'retries'),
    retryDelayMs: parseIntegerFlag(values['retry-delay'], 'retry-delay'),
    timeoutMs: parseIntegerFlag(values.timeout, 'timeout', 1),
    quiet: values.quiet,
    verbose: values.verbose,
  };
}

function showHelp(version: string) {
  console.log(`
${bold(`archive-mirror v${version} - Mirror an HTTP file archive into a local directory`)}

${bold('Usage: archive-mirror [sync] <dest-dir> [options]')}
${bold('       archive-mirror prune <dest-dir> [options] [--yes]')}

${bold('Sync Options:')}
  --base-url=<url>            Archive root URL (default: $ARCHIVE_MIRROR_BASE_URL or the built-in archive)
  --exclude=<pattern>         Exclude paths matching a glob pattern (repeatable)
  --exclude-file=<file>       Read exclude patterns from a file, one per line (repeatable)
  --cores=<number>            Number of concurrent downloads (default: 2/3 of CPU cores)
  --listing-concurrency=<n>   Number of concurrent directory listing requests (default: 4)
  --retries=<number>          Retries for transient failures (default: 3)
  --retry-delay=<ms>          Initial retry delay in milliseconds, doubled per retry (default: 2000)
  --timeout=<ms>              Time to wait for a response (default: 30000)
  --schedule=<cron>           Cron expression for scheduled syncs (e.g., "0 3 * * *")
  --daemon                    Run as a daemon with scheduled syncs
  --quiet                     Show minimal output (only errors and the summary)
  --verbose                   Show detailed output including per-file operations
  --help, -h                  Show this help message
  --version, -v               Show version information

${bold('Prune Options:')}
  --yes, -y                   Delete the listed orphaned files (without it, only list them)

${bold('Exclude patterns:')}
  *.zip                       Any file or directory named *.zip, at any depth
  /Sega/*                     Everything directly under the top-level Sega directory
  No-Intro/Nintendo - */      Matching directories only, anchored at the archive root

${bold('Examples:')}
  archive-mirror /mnt/mirror --exclude='*.zip' --exclude-file=excludes.txt
  archive-mirror /mnt/mirror --cores=8 --schedule="0 3 * * *" --daemon
  archive-mirror prune /mnt/mirror --exclude-file=excludes.txt --yes
`);
}

/**
 * Run the CLI and resolve with the process exit code.
 */
export async function main(rawArgs: string[]): Promise<number> {
  const version = readVersion();

  if (rawArgs.length === 0) {
    showHelp(version);
    return 0;
  }

  const controller = new AbortController();
  let interrupted = false;
  const onInterrupt = () => {
    if (interrupted) {
      process.exit(130);
    }
    interrupted = true;
    console.error(yellow('\nAborting: finishing in-flight work. Press Ctrl+C again to force quit.'));
    controller.abort();
  };

  try {
    if (rawArgs[0] === 'prune') {
      const args = parsePruneArgs(rawArgs.slice(1));
      if (args.help) {
        showHelp(version);
        return 0;
      }
      if (!args.destDir) {
        console.error(red('Error: Destination directory is required'));
        return 1;
      }
      process.on('SIGINT', onInterrupt);
      const result = await pruneOrphans(args.destDir, {
        ...toSyncOptions(args),
        confirm: args.yes,
        signal: controller.signal,
      });
      return result.failed.length > 0 ? 1 : 0;
    }

    const args = parseSyncArgs(rawArgs[0] === 'sync' ? rawArgs.slice(1) : rawArgs);
    if (args.help) {
      showHelp(version);
      return 0;
    }
    if (args.version) {
      console.log(`archive-mirror v${version}`);
      return 0;
    }
    if (!args.destDir) {
      console.error(red('Error: Destination directory is required'));
      showHelp(version);
      return 1;
    }

    const syncOptions = toSyncOptions(args);

    if (args.daemon) {
      if (!args.schedule) {
        console.error(red('Error: --daemon requires --schedule'));
        return 1;
      }
      const daemon = createSyncDaemon(
        { destDir: args.destDir, schedule: args.schedule, syncOptions },
        { verbosity: resolveVerbosity(args) },
      );
      return await daemon.start();
    }

    process.on('SIGINT', onInterrupt);
    const summary = await syncArchive(args.destDir, {
      ...syncOptions,
      signal: controller.signal,
    });
    return summaryExitCode(summary);
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    console.error(red(`Error: ${errorMessage}`));
    return 1;
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

function isEntryPoint(): boolean {
  const invoked = process.argv[1];
  if (!invoked) {
    return false;
  }
  try {
    return fs.realpathSync(invoked) === fs.realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2)).then(
    (code) => process.exit(code),
    (err: unknown) => {
      const errorMessage = err instanceof Error ? err.message : String(err);
      console.error(red(`Error: ${errorMessage}`));
      process.exit(1);
    },
  );
}
