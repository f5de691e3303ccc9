import os from 'node:os';

export const DEFAULT_BASE_URL = 'https://myrient.erista.me/files';
export const BASE_URL_ENV = 'ARCHIVE_MIRROR_BASE_URL';
export const DEFAULT_LISTING_CONCURRENCY = 4;

/**
 * Number of concurrent transfers: the user's value when valid,
 * otherwise two thirds of the available cores (at least 1).
 */
export function getOptimalConcurrency(userSpecified?: number): number {
  if (
    userSpecified !== undefined &&
    Number.isInteger(userSpecified) &&
    userSpecified > 0
  ) {
    return userSpecified;
  }
  return Math.max(1, Math.floor((os.availableParallelism() * 2) / 3));
}

export function getBaseUrl(
  userSpecified?: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const raw = userSpecified || env[BASE_URL_ENV] || DEFAULT_BASE_URL;
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    throw new Error(`Invalid base URL: ${raw}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error(`Unsupported base URL protocol: ${parsed.protocol}`);
  }
  return parsed.toString().replace(/\/+$/, '');
}

/**
 * Parse an integer CLI value, or undefined when the flag is absent.
 */
export function parseIntegerFlag(
  value: string | undefined,
  flag: string,
  min: number = 0,
): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  const parsed = Number.parseInt(trimmed, 10);
  if (String(parsed) !== trimmed || parsed < min) {
    throw new Error(`Invalid value for --${flag}: ${value}`);
  }
  return parsed;
}
