/**
 * Shared test fakes.
 *
 * `createFakeArchive` serves an in-memory file tree through a `fetch`
 * replacement: directory URLs (ending in `/`) return an HTML index page,
 * file URLs return the file body.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ReadableStream } from 'node:stream/web';
import zlib from 'node:zlib';
import { vi } from 'vitest';
import { ProgressTracker } from '../../src/core/download/progress-tracker';
import type { FetchFn } from '../../src/core/remote/http-client';

export const TEST_BASE_URL = 'https://archive.test/files';

export interface FakeArchiveOptions {
  baseUrl?: string;
  /** Put exact byte counts in the listing's size column (default true). */
  exposeSizes?: boolean;
  /**
   * Status codes answered, in order, before a path is served normally.
   * Keys are '' for the root, 'dir/' for directories, 'dir/file' for files.
   */
  statusSequences?: Record<string, number[]>;
  /** Number of times a file is answered with only half its body. */
  truncations?: Record<string, number>;
  /** Number of times a file body errors out after the first chunk. */
  streamErrors?: Record<string, number>;
  /** Files whose body sends one chunk and then never finishes. */
  stalledFiles?: string[];
  /** Directory keys whose listing appears to come from another URL. */
  redirects?: Record<string, string>;
  /**
   * Files answered as a server that ignores Accept-Encoding would: gzip
   * headers with the compressed length, and the body already decoded the
   * way `fetch` hands it back.
   */
  gzipFiles?: string[];
  lastModified?: string;
  latencyMs?: number;
}

export interface FakeArchive {
  baseUrl: string;
  fetchFn: FetchFn;
  /** Decoded relative keys of every request, in arrival order. */
  requests: string[];
  maxInFlight: () => number;
  /** Resolves once a request for `key` has arrived. */
  requested: (key: string) => Promise<void>;
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function childrenOf(
  files: Record<string, string>,
  dirKey: string,
): Array<{ name: string; isDirectory: boolean; size: number }> {
  const children = new Map<string, { name: string; isDirectory: boolean; size: number }>();
  for (const [filePath, content] of Object.entries(files)) {
    if (!filePath.startsWith(dirKey)) {
      continue;
    }
    const rest = filePath.slice(dirKey.length);
    const slash = rest.indexOf('/');
    if (slash === -1) {
      children.set(rest, { name: rest, isDirectory: false, size: Buffer.byteLength(content) });
    } else {
      const name = rest.slice(0, slash);
      children.set(name, { name, isDirectory: true, size: 0 });
    }
  }
  return [...children.values()];
}

export function renderListing(
  files: Record<string, string>,
  dirKey: string,
  exposeSizes: boolean = true,
): string {
  const rows = childrenOf(files, dirKey).map((child) => {
    const href = encodeURIComponent(child.name) + (child.isDirectory ? '/' : '');
    const label = escapeHtml(child.name) + (child.isDirectory ? '/' : '');
    const size = child.isDirectory ? '-' : exposeSizes ? String(child.size) : `${(child.size / 1024).toFixed(1)} KiB`;
    return `<tr><td class="link"><a href="${escapeHtml(href)}" title="${escapeHtml(child.name)}">${label}</a></td><td class="size">${size}</td><td class="date">19-Oct-2026 10:00</td></tr>`;
  });
  return [
    '<html><body><table id="list">',
    '<thead><tr><th><a href="?C=N&amp;O=A">File Name</a></th><th><a href="?C=S&amp;O=A">File Size</a></th></tr></thead>',
    '<tbody>',
    '<tr><td class="link"><a href="../">Parent directory/</a></td><td class="size">-</td><td class="date">-</td></tr>',
    ...rows,
    '</tbody></table></body></html>',
  ].join('\n');
}

function waitFor(ms: number, signal?: AbortSignal | null): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(signal.reason);
      },
      { once: true },
    );
  });
}

function requestUrl(input: Parameters<FetchFn>[0]): string {
  if (typeof input === 'string') {
    return input;
  }
  return input instanceof URL ? input.href : input.url;
}

export function createFakeArchive(
  files: Record<string, string>,
  options: FakeArchiveOptions = {},
): FakeArchive {
  const baseUrl = options.baseUrl ?? TEST_BASE_URL;
  const exposeSizes = options.exposeSizes ?? true;
  const statusSequences = new Map(
    Object.entries(options.statusSequences ?? {}).map(([key, codes]) => [key, [...codes]]),
  );
  const truncations = new Map(Object.entries(options.truncations ?? {}));
  const streamErrors = new Map(Object.entries(options.streamErrors ?? {}));
  const stalled = new Set(options.stalledFiles ?? []);
  const requests: string[] = [];
  const waiters = new Map<string, Array<() => void>>();
  let inFlight = 0;
  let maxInFlight = 0;

  const notify = (key: string) => {
    for (const resolve of waiters.get(key) ?? []) {
      resolve();
    }
    waiters.delete(key);
  };

  const serve = async (key: string, url: string): Promise<Response> => {
    const pendingStatuses = statusSequences.get(key);
    if (pendingStatuses && pendingStatuses.length > 0) {
      const status = pendingStatuses.shift() ?? 500;
      return new Response(null, {
        status,
        statusText: status === 404 ? 'Not Found' : status === 503 ? 'Service Unavailable' : '',
      });
    }

    if (key === '' || key.endsWith('/')) {
      const known = key === '' || Object.keys(files).some((file) => file.startsWith(key));
      if (!known) {
        return new Response(null, { status: 404, statusText: 'Not Found' });
      }
      const response = new Response(renderListing(files, key, exposeSizes), {
        status: 200,
        headers: { 'content-type': 'text/html' },
      });
      const redirectTarget = options.redirects?.[key];
      if (redirectTarget !== undefined) {
        Object.defineProperty(response, 'url', { value: redirectTarget });
      } else {
        Object.defineProperty(response, 'url', { value: url });
      }
      return response;
    }

    const content = files[key];
    if (content === undefined) {
      return new Response(null, { status: 404, statusText: 'Not Found' });
    }
    const bytes = new Uint8Array(Buffer.from(content));
    const headers: Record<string, string> = {
      'content-length': String(bytes.length),
    };
    if (options.lastModified) {
      headers['last-modified'] = options.lastModified;
    }
    if (options.gzipFiles?.includes(key)) {
      headers['content-encoding'] = 'gzip';
      headers['content-length'] = String(zlib.gzipSync(bytes).length);
    }

    const truncateCount = truncations.get(key) ?? 0;
    if (truncateCount > 0) {
      truncations.set(key, truncateCount - 1);
      return new Response(bytes.slice(0, Math.floor(bytes.length / 2)), {
        status: 200,
        headers,
      });
    }

    const errorCount = streamErrors.get(key) ?? 0;
    if (errorCount > 0 || stalled.has(key)) {
      if (errorCount > 0) {
        streamErrors.set(key, errorCount - 1);
      }
      const failing = errorCount > 0;
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(bytes.slice(0, 1));
          if (failing) {
            controller.error(new Error('socket hang up'));
          }
        },
        pull() {
          return new Promise<void>(() => {});
        },
      });
      return new Response(body, { status: 200, headers });
    }

    return new Response(bytes, { status: 200, headers });
  };

  const fetchFn: FetchFn = async (input, init) => {
    const url = requestUrl(input);
    const prefix = `${baseUrl}/`;
    if (!url.startsWith(prefix)) {
      return new Response(null, { status: 404, statusText: 'Not Found' });
    }
    const key = url
      .slice(prefix.length)
      .split('/')
      .map(decodeURIComponent)
      .join('/');
    requests.push(key);
    notify(key);

    inFlight++;
    maxInFlight = Math.max(maxInFlight, inFlight);
    try {
      await waitFor(options.latencyMs ?? 0, init?.signal);
      return await serve(key, url);
    } finally {
      inFlight--;
    }
  };

  return {
    baseUrl,
    fetchFn,
    requests,
    maxInFlight: () => maxInFlight,
    requested: (key) =>
      requests.includes(key)
        ? Promise.resolve()
        : new Promise((resolve) => {
            waiters.set(key, [...(waiters.get(key) ?? []), resolve]);
          }),
  };
}

/**
 * Progress tracker that never draws a bar.
 */
export function createQuietProgressTracker(): ProgressTracker {
  return new ProgressTracker(0, false);
}

export function makeTempDir(prefix: string = 'archive-mirror-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Every file under `dir`, as sorted `/`-separated relative paths.
 */
export function listFiles(dir: string): string[] {
  const result: string[] = [];
  const visit = (current: string) => {
    for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        visit(full);
      } else {
        result.push(path.relative(dir, full).split(path.sep).join('/'));
      }
    }
  };
  if (fs.existsSync(dir)) {
    visit(dir);
  }
  return result.sort();
}

export function writeFiles(dir: string, files: Record<string, string>): void {
  for (const [relativePath, content] of Object.entries(files)) {
    const full = path.join(dir, ...relativePath.split('/'));
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, content);
  }
}

/**
 * Swallow stdout/stderr for the duration of a test.
 */
export function silenceOutput() {
  const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  return {
    stdout,
    stderr,
    restore: () => {
      stdout.mockRestore();
      stderr.mockRestore();
    },
  };
}
