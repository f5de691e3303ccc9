import chalk from 'chalk';
import { Verbosity } from '../interfaces/logger';

export { Verbosity };

export const red = (text: string): string => chalk.red(text);
export const green = (text: string): string => chalk.green(text);
export const yellow = (text: string): string => chalk.yellow(text);
export const blue = (text: string): string => chalk.blue(text);
export const bold = (text: string): string => chalk.bold(text);

// Identical non-duplicate messages are dropped for this long
const DUPLICATE_WINDOW_MS = 1000;
const MAX_RECENT_MESSAGES = 50;
const recentMessages = new Map<string, number>();

function isRecentDuplicate(message: string): boolean {
  const now = Date.now();
  const seenAt = recentMessages.get(message);
  if (seenAt !== undefined && now - seenAt < DUPLICATE_WINDOW_MS) {
    return true;
  }
  if (recentMessages.size >= MAX_RECENT_MESSAGES) {
    recentMessages.clear();
  }
  recentMessages.set(message, now);
  return false;
}

function write(stream: NodeJS.WriteStream, message: string): void {
  stream.write(message.endsWith('\n') ? message : message + '\n');
}

export function log(
  message: string,
  level: Verbosity,
  currentVerbosity: number,
  allowDuplicates: boolean = true,
): void {
  if (currentVerbosity < level) {
    return;
  }
  if (!allowDuplicates && isRecentDuplicate(message)) {
    return;
  }
  write(process.stdout, message);
}

export function error(message: string): void {
  write(process.stderr, red(`❌ ${message}`));
}

export function warning(message: string, currentVerbosity: number): void {
  log(yellow(`⚠️ ${message}`), Verbosity.Normal, currentVerbosity, false);
}

export function info(message: string, currentVerbosity: number): void {
  log(blue(`ℹ️  ${message}`), Verbosity.Normal, currentVerbosity, false);
}

export function success(message: string, currentVerbosity: number): void {
  log(green(`✅ ${message}`), Verbosity.Normal, currentVerbosity, true);
}

export function verbose(message: string, currentVerbosity: number): void {
  log(message, Verbosity.Verbose, currentVerbosity, true);
}

export function always(message: string): void {
  write(process.stdout, message);
}

export function resolveVerbosity(options: {
  quiet?: boolean;
  verbose?: boolean;
}): Verbosity {
  if (options.quiet) {
    return Verbosity.Quiet;
  }
  return options.verbose ? Verbosity.Verbose : Verbosity.Normal;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * The `code` of a Node.js system error, if it carries one.
 */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
